import type { TmuxConfig } from '../config';
import { TerminalUnavailableError } from '../errors';
import type { Logger } from '../logger';
import type { ChatTransport } from '../telegram/transport';
import { sleep, type TerminalDriver } from '../terminal/tmux';
import type { ResponseCoordinator } from './coordinator';
import type { DispatchItem } from './dispatch-queue';
import { LOOP_MAX_ITERATIONS } from './payload-templates';
import type { PromptBuilder } from './prompt-builder';
import type { SessionContexts } from './session-context';
import type { TypingIndicator } from './typing-indicator';

export interface DispatcherDeps {
  terminal: TerminalDriver;
  transport: ChatTransport;
  coordinator: ResponseCoordinator;
  sessions: SessionContexts;
  prompts: PromptBuilder;
  typing: TypingIndicator;
  logger: Logger;
}

/**
 * Hands one queued item to the terminal: builds its payload, marks a reply
 * as pending, then types it in.
 */
export class Dispatcher {
  constructor(
    private config: TmuxConfig,
    private deps: DispatcherDeps,
  ) {}

  /** DispatchQueue processor; a missing terminal becomes a chat reply */
  process = async (item: DispatchItem): Promise<void> => {
    try {
      await this.dispatch(item);
    } catch (err) {
      if (err instanceof TerminalUnavailableError) {
        await this.deps.transport.sendText(item.chatId, err.message);
        return;
      }
      throw err;
    }
  };

  async dispatch(item: DispatchItem): Promise<void> {
    const { terminal, transport, coordinator, sessions, prompts, typing, logger } = this.deps;

    if (!(await terminal.exists())) {
      throw new TerminalUnavailableError(terminal.session);
    }

    const payload = prompts.build(item.kind, item.owner, item.text);
    sessions.recordDispatch(item.owner, item.chatId, item.text, payload);
    coordinator.markPending(item.owner);
    typing.start(item.owner, item.chatId);

    if (item.messageId !== undefined) {
      transport.react(item.chatId, item.messageId, '👍').catch((err) => {
        logger.debug({ err, messageId: item.messageId }, 'Failed to set message reaction');
      });
    }

    try {
      await terminal.sendLiteralText(payload);
      if (item.kind !== 'plain') await sleep(this.config.keyDelayMs);
      await terminal.sendEnter();
    } catch (err) {
      coordinator.cancelPending(item.owner);
      typing.stop(item.owner);
      throw err;
    }

    logger.info(
      { owner: item.owner, kind: item.kind, chars: payload.length, waitedMs: Date.now() - item.enqueuedAt },
      'Dispatched to terminal',
    );

    if (item.kind === 'loop') {
      await transport.sendText(item.chatId, `Loop started (max ${LOOP_MAX_ITERATIONS} iterations)`);
    } else if (item.kind === 'metaLoop') {
      await transport.sendText(item.chatId, `Meta loop started (auto-memory enabled, max ${LOOP_MAX_ITERATIONS} iterations)`);
    }
  }
}
