import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logger';
import { StateFile } from './state-file';

const CURSOR_FILE = 'telegram-offset.json';
const BINDING_FILE = 'chat-binding.json';

const CursorSchema = z.number().int().min(0);

const ChatBindingSchema = z
  .object({
    owner: z.string().min(1),
    chatId: z.number().int(),
    boundAt: z.string(),
  })
  .nullable();

export type ChatBinding = NonNullable<z.infer<typeof ChatBindingSchema>>;

/** Last processed inbound-update cursor; 0 when absent or corrupt */
export function createCursorFile(stateDir: string, logger: Logger): StateFile<number> {
  return new StateFile(join(stateDir, CURSOR_FILE), CursorSchema, 0, logger);
}

/** The chat currently bound to the terminal session */
export function createChatBindingFile(stateDir: string, logger: Logger): StateFile<ChatBinding | null> {
  return new StateFile<ChatBinding | null>(join(stateDir, BINDING_FILE), ChatBindingSchema, null, logger);
}
