import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import pino from 'pino';
import type { Logger } from '../src/logger';

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function createTempDir(prefix = 'bridge-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** One JSONL line as the agent writes it for an assistant turn */
export function assistantLine(content: string | unknown[]): string {
  return `${JSON.stringify({ type: 'assistant', message: { role: 'assistant', content } })}\n`;
}

export function userLine(text: string): string {
  return `${JSON.stringify({ type: 'user', message: { role: 'user', content: text } })}\n`;
}
