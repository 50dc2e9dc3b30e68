import type { Logger } from '../logger';
import type { ChatTransport } from '../telegram/transport';
import type { PendingMarker } from './pending-marker';

/**
 * Keeps the chat's "typing…" status alive while a reply is awaited.
 * Each owner's ticker stops by itself once its pending marker clears.
 */
export class TypingIndicator {
  private timers = new Map<string, ReturnType<typeof setInterval>>();

  constructor(
    private transport: ChatTransport,
    private marker: PendingMarker,
    private intervalMs: number,
    private logger: Logger,
  ) {}

  start(owner: string, chatId: number): void {
    this.stop(owner);
    this.tick(owner, chatId);

    const timer = setInterval(() => {
      if (!this.marker.isSet(owner)) {
        this.stop(owner);
        return;
      }
      this.tick(owner, chatId);
    }, this.intervalMs);
    this.timers.set(owner, timer);
  }

  stop(owner: string): void {
    const timer = this.timers.get(owner);
    if (!timer) return;
    clearInterval(timer);
    this.timers.delete(owner);
  }

  isActive(owner: string): boolean {
    return this.timers.has(owner);
  }

  dispose(): void {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
  }

  private tick(owner: string, chatId: number): void {
    this.transport.sendTyping(chatId).catch((err) => {
      // Ignore errors from typing indicator
      this.logger.debug({ err, owner }, 'Typing indicator failed');
    });
  }
}
