import { Api, InlineKeyboard } from 'grammy';
import type { BotCommand, ReactionTypeEmoji, Update } from 'grammy/types';
import type { TelegramConfig } from '../config';
import type { Logger } from '../logger';
import { splitLabelled } from './telegram-utils';

export type ReactionEmoji = ReactionTypeEmoji['emoji'];

export interface MenuButton {
  text: string;
  data: string;
}

/** The remote chat, as the bridge uses it */
export interface ChatTransport {
  getUpdates(offset: number, signal?: AbortSignal): Promise<Update[]>;
  sendText(chatId: number, text: string): Promise<void>;
  sendTyping(chatId: number): Promise<void>;
  answerInteraction(queryId: string, text?: string): Promise<void>;
  sendMenu(chatId: number, prompt: string, rows: MenuButton[][]): Promise<void>;
  react(chatId: number, messageId: number, emoji: ReactionEmoji): Promise<void>;
  setCommands(commands: BotCommand[]): Promise<void>;
}

export class TelegramTransport implements ChatTransport {
  private api: Api;

  constructor(
    private config: TelegramConfig,
    private logger: Logger,
    api?: Api,
  ) {
    this.api = api ?? new Api(config.token);
  }

  async getUpdates(offset: number, signal?: AbortSignal): Promise<Update[]> {
    return this.api.getUpdates(
      { offset, timeout: this.config.pollTimeoutSec, allowed_updates: ['message', 'callback_query'] },
      signal,
    );
  }

  async sendText(chatId: number, text: string): Promise<void> {
    if (!text.trim()) return;

    const parts = splitLabelled(text, this.config.maxMessageLength);
    for (const [index, part] of parts.entries()) {
      try {
        await this.api.sendMessage(chatId, part);
      } catch (err) {
        // Parts before this one are already in the chat; a retry sends them again
        this.logger.warn({ err, chatId, part: index + 1, parts: parts.length }, 'Failed to send message part');
        throw err;
      }
    }
    if (parts.length > 1) {
      this.logger.debug({ chatId, parts: parts.length }, 'Sent long message in parts');
    }
  }

  async sendTyping(chatId: number): Promise<void> {
    await this.api.sendChatAction(chatId, 'typing');
  }

  async answerInteraction(queryId: string, text?: string): Promise<void> {
    await this.api.answerCallbackQuery(queryId, text ? { text } : undefined);
  }

  async sendMenu(chatId: number, prompt: string, rows: MenuButton[][]): Promise<void> {
    const keyboard = new InlineKeyboard();
    for (const row of rows) {
      for (const button of row) keyboard.text(button.text, button.data);
      keyboard.row();
    }
    await this.api.sendMessage(chatId, prompt, { reply_markup: keyboard });
  }

  async react(chatId: number, messageId: number, emoji: ReactionEmoji): Promise<void> {
    await this.api.setMessageReaction(chatId, messageId, [{ type: 'emoji', emoji }]);
  }

  async setCommands(commands: BotCommand[]): Promise<void> {
    await this.api.setMyCommands(commands);
  }
}
