import type { BotCommand, Update } from 'grammy/types';
import type { ChatTransport, MenuButton, ReactionEmoji } from '../src/telegram/transport';
import type { TerminalDriver } from '../src/terminal/tmux';

export interface SentMessage {
  chatId: number;
  text: string;
}

/** In-process chat: records everything sent, serves queued updates */
export class FakeTransport implements ChatTransport {
  sent: SentMessage[] = [];
  menus: { chatId: number; prompt: string; rows: MenuButton[][] }[] = [];
  typing: number[] = [];
  answered: string[] = [];
  reactions: { chatId: number; messageId: number; emoji: ReactionEmoji }[] = [];
  commands: BotCommand[] = [];
  batches: Update[][] = [];
  offsets: number[] = [];

  async getUpdates(offset: number): Promise<Update[]> {
    this.offsets.push(offset);
    const batch = this.batches.shift();
    if (batch) return batch;
    // Stand-in for the long-poll wait
    await new Promise((resolve) => setTimeout(resolve, 5));
    return [];
  }

  async sendText(chatId: number, text: string): Promise<void> {
    this.sent.push({ chatId, text });
  }

  async sendTyping(chatId: number): Promise<void> {
    this.typing.push(chatId);
  }

  async answerInteraction(queryId: string): Promise<void> {
    this.answered.push(queryId);
  }

  async sendMenu(chatId: number, prompt: string, rows: MenuButton[][]): Promise<void> {
    this.menus.push({ chatId, prompt, rows });
  }

  async react(chatId: number, messageId: number, emoji: ReactionEmoji): Promise<void> {
    this.reactions.push({ chatId, messageId, emoji });
  }

  async setCommands(commands: BotCommand[]): Promise<void> {
    this.commands = commands;
  }

  texts(): string[] {
    return this.sent.map((m) => m.text);
  }
}

/** In-process terminal: records keystrokes as `text:<...>`, `Enter`, `Escape` */
export class FakeTerminal implements TerminalDriver {
  readonly session = 'claude';
  running = true;
  keys: string[] = [];
  failNextText = false;

  async exists(): Promise<boolean> {
    return this.running;
  }

  async sendLiteralText(text: string): Promise<void> {
    if (this.failNextText) {
      this.failNextText = false;
      throw new Error('send-keys failed');
    }
    this.keys.push(`text:${text}`);
  }

  async sendEnter(): Promise<void> {
    this.keys.push('Enter');
  }

  async sendEscape(): Promise<void> {
    this.keys.push('Escape');
  }

  typed(): string[] {
    return this.keys.filter((k) => k.startsWith('text:')).map((k) => k.slice('text:'.length));
  }
}

let updateId = 100;

export function textUpdate(chatId: number, text: string, messageId = updateId): Update {
  updateId++;
  return {
    update_id: updateId,
    message: {
      message_id: messageId,
      date: 0,
      chat: { id: chatId, type: 'private', first_name: 'Test' },
      text,
    },
  };
}

export function callbackUpdate(chatId: number, data: string): Update {
  updateId++;
  return {
    update_id: updateId,
    callback_query: {
      id: `cb-${updateId}`,
      from: { id: chatId, is_bot: false, first_name: 'Test' },
      chat_instance: 'test',
      data,
      message: {
        message_id: 1,
        date: 0,
        chat: { id: chatId, type: 'private', first_name: 'Test' },
        text: 'Select session:',
      },
    },
  };
}
