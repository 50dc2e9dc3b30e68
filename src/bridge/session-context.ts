export interface SessionContext {
  owner: string;
  chatId: number;
  /** What the user typed, as stored alongside the reply */
  lastUserText?: string;
  /** What was actually sent to the terminal (memory block, meta prompt included) */
  lastPrompt?: string;
  lastDispatchAt?: number;
}

/**
 * Per-owner conversation state handed through the dispatcher and coordinator.
 */
export class SessionContexts {
  private contexts = new Map<string, SessionContext>();

  get(owner: string): SessionContext | undefined {
    return this.contexts.get(owner);
  }

  getOrCreate(owner: string, chatId: number): SessionContext {
    let ctx = this.contexts.get(owner);
    if (!ctx) {
      ctx = { owner, chatId };
      this.contexts.set(owner, ctx);
    }
    return ctx;
  }

  recordDispatch(owner: string, chatId: number, userText: string, prompt: string, at = Date.now()): SessionContext {
    const ctx = this.getOrCreate(owner, chatId);
    ctx.chatId = chatId;
    ctx.lastUserText = userText;
    ctx.lastPrompt = prompt;
    ctx.lastDispatchAt = at;
    return ctx;
  }

  /** Forget the in-flight exchange once its reply has been stored */
  completeExchange(owner: string): void {
    const ctx = this.contexts.get(owner);
    if (!ctx) return;
    ctx.lastUserText = undefined;
    ctx.lastPrompt = undefined;
  }
}
