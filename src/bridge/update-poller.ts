import type { Update } from 'grammy/types';
import type { Logger } from '../logger';
import type { ChatTransport } from '../telegram/transport';
import type { StateFile } from './state-file';

export type UpdateHandler = (update: Update) => Promise<void>;

export interface UpdatePollerOptions {
  retryDelayMs: number;
}

/**
 * Long-polls the chat for updates. The cursor is saved after every update so
 * a restart resumes after the last one handled; a failing update is logged
 * and skipped.
 */
export class UpdatePoller {
  private offset = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private retryTimer: ReturnType<typeof setTimeout> | null = null;
  private wakeRetry: (() => void) | null = null;

  constructor(
    private transport: ChatTransport,
    private cursor: StateFile<number>,
    private handler: UpdateHandler,
    private options: UpdatePollerOptions,
    private logger: Logger,
  ) {}

  get currentOffset(): number {
    return this.offset;
  }

  start(): void {
    if (this.running) return;
    this.offset = this.cursor.load();
    this.running = true;
    this.loop = this.run();
    this.logger.info({ offset: this.offset }, 'Update polling started');
  }

  async stop(): Promise<void> {
    this.running = false;
    this.abort?.abort();
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = null;
    }
    this.wakeRetry?.();
    await this.loop;
    this.loop = null;
    this.logger.info('Update polling stopped');
  }

  /** One fetch-and-handle round; resolves with the number of updates seen */
  async pollOnce(): Promise<number> {
    this.abort = new AbortController();
    const updates = await this.transport.getUpdates(this.offset, this.abort.signal);
    this.abort = null;

    for (const update of updates) {
      try {
        await this.handler(update);
      } catch (err) {
        this.logger.error({ err, updateId: update.update_id }, 'Update handler failed');
      }
      this.advance(update.update_id + 1);
    }
    return updates.length;
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (err) {
        if (!this.running) break;
        this.logger.warn({ err, retryDelayMs: this.options.retryDelayMs }, 'Polling failed, retrying');
        await this.delay(this.options.retryDelayMs);
      }
    }
  }

  private advance(offset: number): void {
    if (offset <= this.offset) return;
    this.offset = offset;
    try {
      this.cursor.save(offset);
    } catch (err) {
      this.logger.warn({ err, offset }, 'Failed to persist update cursor');
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.wakeRetry = () => {
        this.wakeRetry = null;
        resolve();
      };
      this.retryTimer = setTimeout(() => {
        this.retryTimer = null;
        this.wakeRetry?.();
      }, ms);
    });
  }
}
