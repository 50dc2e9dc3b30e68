/**
 * User-facing error classes. Their messages are safe to show in the chat.
 */
export class TerminalUnavailableError extends Error {
  constructor(public readonly session: string) {
    super(`tmux session '${session}' not found`);
    this.name = 'TerminalUnavailableError';
  }
}
