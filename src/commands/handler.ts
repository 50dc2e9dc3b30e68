import type { BotCommand, Update } from 'grammy/types';
import type { TmuxConfig } from '../config';
import { TerminalUnavailableError } from '../errors';
import type { Logger } from '../logger';
import type { MemoryStore } from '../memory/store';
import type { ChatBinding } from '../bridge/bridge-state';
import type { ResponseCoordinator } from '../bridge/coordinator';
import type { DispatchQueue } from '../bridge/dispatch-queue';
import type { PendingMarker } from '../bridge/pending-marker';
import type { StateFile } from '../bridge/state-file';
import type { TypingIndicator } from '../bridge/typing-indicator';
import { listResumableSessions } from '../terminal/claude-sessions';
import { restartAgent, sleep, type TerminalDriver } from '../terminal/tmux';
import { parseCommand } from '../telegram/telegram-utils';
import type { ChatTransport, MenuButton } from '../telegram/transport';

export const BOT_COMMANDS: BotCommand[] = [
  { command: 'clear', description: 'Clear conversation' },
  { command: 'resume', description: 'Resume session (shows picker)' },
  { command: 'continue_', description: 'Continue most recent session' },
  { command: 'loop', description: 'Iterative loop: /loop <prompt>' },
  { command: 'meta_loop', description: 'Loop with auto-memory: /meta_loop <prompt>' },
  { command: 'stop', description: 'Interrupt the agent (Escape)' },
  { command: 'status', description: 'Check tmux status' },
  { command: 'remember', description: 'Save to memory: /remember <text>' },
  { command: 'recall', description: 'Search memories: /recall <query>' },
  { command: 'forget', description: "Delete memories: /forget <query|all>" },
  { command: 'memstats', description: 'Memory statistics' },
  { command: 'metamem', description: 'View auto-update memories' },
];

/** Agent verbs that open interactive screens the chat cannot drive */
export const BLOCKED_COMMANDS = new Set([
  '/mcp', '/help', '/settings', '/config', '/model', '/compact', '/cost',
  '/doctor', '/init', '/login', '/logout', '/memory', '/permissions',
  '/pr', '/review', '/terminal', '/vim', '/approved-tools', '/listen',
]);

const RECALL_LIMIT = 10;
const METAMEM_LIMIT = 5;

export interface CommandHandlerDeps {
  transport: ChatTransport;
  terminal: TerminalDriver;
  coordinator: ResponseCoordinator;
  queue: DispatchQueue;
  marker: PendingMarker;
  typing: TypingIndicator;
  binding: StateFile<ChatBinding | null>;
  memory: MemoryStore | null;
  logger: Logger;
}

export interface CommandHandlerOptions {
  tmux: TmuxConfig;
  claudeHome: string;
  allowedChats?: number[];
}

interface CommandContext {
  owner: string;
  chatId: number;
  args: string;
}

type CommandFn = (ctx: CommandContext) => Promise<void>;

export function ownerFor(chatId: number): string {
  return String(chatId);
}

function preview(content: string, max: number): string {
  return content.length > max ? `${content.slice(0, max)}...` : content;
}

/**
 * Routes inbound chat updates: verbs are handled here, plain text goes to
 * the dispatch queue, button presses restart the agent.
 */
export class CommandHandler {
  private commands: Map<string, CommandFn>;
  private boundChatId: number | null;

  constructor(
    private options: CommandHandlerOptions,
    private deps: CommandHandlerDeps,
  ) {
    this.boundChatId = deps.binding.load()?.chatId ?? null;
    this.commands = new Map<string, CommandFn>([
      ['/status', (ctx) => this.status(ctx)],
      ['/stop', (ctx) => this.stop(ctx)],
      ['/clear', (ctx) => this.clear(ctx)],
      ['/continue_', (ctx) => this.continueRecent(ctx)],
      ['/loop', (ctx) => this.loop(ctx, 'loop')],
      ['/meta_loop', (ctx) => this.loop(ctx, 'metaLoop')],
      ['/resume', (ctx) => this.resume(ctx)],
      ['/remember', (ctx) => this.remember(ctx)],
      ['/recall', (ctx) => this.recall(ctx)],
      ['/forget', (ctx) => this.forget(ctx)],
      ['/memstats', (ctx) => this.memstats(ctx)],
      ['/metamem', (ctx) => this.metamem(ctx)],
    ]);
  }

  async handleUpdate(update: Update): Promise<void> {
    if (update.callback_query) {
      const query = update.callback_query;
      await this.handleCallback(query.id, query.message?.chat.id, query.data);
      return;
    }

    const message = update.message;
    if (message?.text) {
      await this.handleMessage(message.chat.id, message.text, message.message_id);
    }
  }

  async handleMessage(chatId: number, text: string, messageId?: number): Promise<void> {
    if (!this.isAllowed(chatId)) {
      this.deps.logger.warn({ chatId }, 'Message from unlisted chat ignored');
      return;
    }

    const owner = ownerFor(chatId);
    this.bindChat(owner, chatId);

    const parsed = parseCommand(text);
    if (!parsed) {
      this.deps.logger.info({ chatId, preview: text.slice(0, 50) }, 'Message received');
      this.deps.queue.enqueue({ owner, chatId, text, kind: 'plain', messageId, enqueuedAt: Date.now() });
      return;
    }

    const command = this.commands.get(parsed.command);
    if (command) {
      await this.replyOnTerminalError(chatId, () => command({ owner, chatId, args: parsed.args }));
    } else if (BLOCKED_COMMANDS.has(parsed.command)) {
      await this.reply(chatId, `'${parsed.command}' not supported (interactive)`);
    } else {
      this.deps.logger.debug({ command: parsed.command }, 'Unknown command ignored');
    }
  }

  async handleCallback(queryId: string, chatId: number | undefined, data: string | undefined): Promise<void> {
    const { transport, terminal, logger } = this.deps;

    try {
      await transport.answerInteraction(queryId);
    } catch (err) {
      logger.debug({ err, queryId }, 'Failed to answer callback query');
    }

    if (chatId === undefined || !data || !this.isAllowed(chatId)) return;
    logger.info({ chatId, data }, 'Callback query received');

    await this.replyOnTerminalError(chatId, async () => {
      if (data.startsWith('resume:')) {
        const sessionId = data.slice('resume:'.length);
        if (!sessionId) return;
        await this.requireTerminal();
        await restartAgent(terminal, this.options.tmux, `--resume ${sessionId}`);
        await this.reply(chatId, `Resuming: ${sessionId.slice(0, 8)}...`);
      } else if (data === 'continue_recent') {
        await this.requireTerminal();
        await restartAgent(terminal, this.options.tmux, '--continue');
        await this.reply(chatId, 'Continuing...');
      } else {
        logger.warn({ data }, 'Unknown callback data');
      }
    });
  }

  // --- Terminal verbs ---

  private async status({ owner, chatId }: CommandContext): Promise<void> {
    const { terminal, marker, coordinator } = this.deps;
    const running = await terminal.exists();
    const lines = [`tmux '${terminal.session}': ${running ? 'running' : 'not found'}`];
    if (marker.isSet(owner)) {
      lines.push(`Waiting for reply: ${Math.round(marker.age() / 1000)}s`);
    } else {
      lines.push(`State: ${coordinator.state}`);
    }
    await this.reply(chatId, lines.join('\n'));
  }

  private async stop({ owner, chatId }: CommandContext): Promise<void> {
    const { terminal, coordinator, typing } = this.deps;
    if (await terminal.exists()) {
      await terminal.sendEscape();
    }
    await coordinator.salvage(owner);
    typing.stop(owner);
    await this.reply(chatId, 'Interrupted');
  }

  private async clear({ chatId }: CommandContext): Promise<void> {
    const { terminal } = this.deps;
    await this.requireTerminal();
    await terminal.sendEscape();
    await sleep(this.options.tmux.keyDelayMs);
    await terminal.sendLiteralText('/clear');
    await terminal.sendEnter();
    await this.reply(chatId, 'Cleared');
  }

  private async continueRecent({ chatId }: CommandContext): Promise<void> {
    await this.requireTerminal();
    await restartAgent(this.deps.terminal, this.options.tmux, '--continue');
    await this.reply(chatId, 'Continuing...');
  }

  private async loop({ owner, chatId, args }: CommandContext, kind: 'loop' | 'metaLoop'): Promise<void> {
    if (!args) {
      await this.reply(chatId, `Usage: /${kind === 'loop' ? 'loop' : 'meta_loop'} <prompt>`);
      return;
    }
    this.deps.queue.enqueue({ owner, chatId, text: args, kind, enqueuedAt: Date.now() });
  }

  private async resume({ chatId }: CommandContext): Promise<void> {
    const sessions = listResumableSessions(this.options.claudeHome);
    if (sessions.length === 0) {
      await this.reply(chatId, 'No sessions');
      return;
    }

    const rows: MenuButton[][] = [[{ text: 'Continue most recent', data: 'continue_recent' }]];
    for (const session of sessions) {
      rows.push([{ text: session.label, data: `resume:${session.sessionId}` }]);
    }
    await this.deps.transport.sendMenu(chatId, 'Select session:', rows);
  }

  // --- Memory verbs ---

  private async remember({ owner, chatId, args }: CommandContext): Promise<void> {
    const memory = await this.requireMemory(chatId);
    if (!memory) return;
    if (!args) {
      await this.reply(chatId, 'Usage: /remember <text>');
      return;
    }

    const saved = memory.add(owner, args, { source: 'manual' }, 'manual-note');
    await this.reply(chatId, saved ? '✅ Saved to memory' : '❌ Failed to save');
  }

  private async recall({ owner, chatId, args }: CommandContext): Promise<void> {
    const memory = await this.requireMemory(chatId);
    if (!memory) return;

    const results = args ? memory.search(owner, args, RECALL_LIMIT) : memory.getRecent(owner, RECALL_LIMIT);
    if (results.length === 0) {
      await this.reply(chatId, 'No memories found');
      return;
    }

    const lines = ['📚 Your memories:', ''];
    results.forEach((record, i) => lines.push(`${i + 1}. ${preview(record.content, 100)}`));
    await this.reply(chatId, lines.join('\n'));
  }

  private async forget({ owner, chatId, args }: CommandContext): Promise<void> {
    const memory = await this.requireMemory(chatId);
    if (!memory) return;
    if (!args) {
      await this.reply(chatId, "Usage: /forget <query or 'all'>");
      return;
    }

    if (args.toLowerCase() === 'all') {
      await this.reply(chatId, memory.clearAll(owner) ? '🗑️ All memories cleared' : '❌ Failed to clear');
      return;
    }

    const count = memory.deleteByQuery(owner, args);
    await this.reply(chatId, `🗑️ Deleted ${count} memory(s)`);
  }

  private async memstats({ owner, chatId }: CommandContext): Promise<void> {
    const memory = await this.requireMemory(chatId);
    if (!memory) return;

    const stats = memory.stats(owner);
    const byKind = Object.entries(stats.countsByKind)
      .map(([kind, count]) => `  ${kind}: ${count}`)
      .join('\n');
    await this.reply(
      chatId,
      `📊 Memory Stats:\n` +
        `Total: ${stats.count} memories\n` +
        `Newest: ${stats.newest ?? 'N/A'}\n` +
        `Oldest: ${stats.oldest ?? 'N/A'}\n` +
        `By kind:\n${byKind || '  N/A'}`,
    );
  }

  private async metamem({ owner, chatId }: CommandContext): Promise<void> {
    const memory = await this.requireMemory(chatId);
    if (!memory) return;

    const results = memory.getByKind(owner, 'auto-update', METAMEM_LIMIT);
    if (results.length === 0) {
      await this.reply(chatId, 'No auto-update memories found');
      return;
    }

    const lines = ['🔄 Auto-update memories:', ''];
    results.forEach((record, i) => lines.push(`${i + 1}. [${record.createdAt}] ${preview(record.content, 150)}`));
    await this.reply(chatId, lines.join('\n'));
  }

  // --- Helpers ---

  private isAllowed(chatId: number): boolean {
    const allowed = this.options.allowedChats;
    return !allowed || allowed.length === 0 || allowed.includes(chatId);
  }

  private bindChat(owner: string, chatId: number): void {
    if (this.boundChatId === chatId) return;
    try {
      this.deps.binding.save({ owner, chatId, boundAt: new Date().toISOString() });
      this.boundChatId = chatId;
      this.deps.logger.info({ chatId }, 'Chat bound to terminal session');
    } catch (err) {
      this.deps.logger.warn({ err, chatId }, 'Failed to persist chat binding');
    }
  }

  private async requireTerminal(): Promise<void> {
    if (!(await this.deps.terminal.exists())) {
      throw new TerminalUnavailableError(this.deps.terminal.session);
    }
  }

  private async requireMemory(chatId: number): Promise<MemoryStore | null> {
    if (!this.deps.memory) {
      await this.reply(chatId, 'Memory is disabled');
      return null;
    }
    return this.deps.memory;
  }

  private async replyOnTerminalError(chatId: number, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (err) {
      if (err instanceof TerminalUnavailableError) {
        await this.reply(chatId, err.message);
        return;
      }
      throw err;
    }
  }

  private async reply(chatId: number, text: string): Promise<void> {
    await this.deps.transport.sendText(chatId, text);
  }
}
