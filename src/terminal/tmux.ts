import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { TmuxConfig } from '../config';
import type { Logger } from '../logger';

const execFileAsync = promisify(execFile);

const TMUX_TIMEOUT_MS = 5_000;

/** The terminal the agent runs in, reduced to the keystrokes the bridge needs */
export interface TerminalDriver {
  readonly session: string;
  exists(): Promise<boolean>;
  /** Types text without interpreting key names */
  sendLiteralText(text: string): Promise<void>;
  sendEnter(): Promise<void>;
  sendEscape(): Promise<void>;
}

export class TmuxDriver implements TerminalDriver {
  constructor(
    private config: TmuxConfig,
    private logger: Logger,
  ) {}

  get session(): string {
    return this.config.session;
  }

  async exists(): Promise<boolean> {
    try {
      await this.tmux(['has-session', '-t', this.config.session]);
      return true;
    } catch {
      return false;
    }
  }

  async sendLiteralText(text: string): Promise<void> {
    await this.tmux(['send-keys', '-t', this.config.session, '-l', text]);
  }

  async sendEnter(): Promise<void> {
    await this.tmux(['send-keys', '-t', this.config.session, 'Enter']);
  }

  async sendEscape(): Promise<void> {
    await this.tmux(['send-keys', '-t', this.config.session, 'Escape']);
  }

  private async tmux(args: string[]): Promise<void> {
    try {
      await execFileAsync('tmux', args, { timeout: TMUX_TIMEOUT_MS });
    } catch (err) {
      this.logger.debug({ err, command: args[0] }, 'tmux command failed');
      throw err;
    }
  }
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Insert a flag right after the agent's executable:
 * `claude --dangerously-skip-permissions` + `--continue` becomes
 * `claude --continue --dangerously-skip-permissions`.
 */
export function withAgentFlag(agentCommand: string, flag: string): string {
  const trimmed = agentCommand.trim();
  const space = trimmed.indexOf(' ');
  if (space === -1) return `${trimmed} ${flag}`;
  return `${trimmed.slice(0, space)} ${flag}${trimmed.slice(space)}`;
}

/**
 * Leave the running agent and start it again with extra flags.
 */
export async function restartAgent(
  terminal: TerminalDriver,
  config: TmuxConfig,
  flag: string,
): Promise<void> {
  await terminal.sendEscape();
  await sleep(config.keyDelayMs);
  await terminal.sendLiteralText('/exit');
  await terminal.sendEnter();
  await sleep(config.restartDelayMs);
  await terminal.sendLiteralText(withAgentFlag(config.agentCommand, flag));
  await terminal.sendEnter();
}
