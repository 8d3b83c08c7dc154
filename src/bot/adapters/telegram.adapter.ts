import { Inject, Injectable, Logger } from '@nestjs/common';
import TelegramBot from 'node-telegram-bot-api';
import { BotCommand, DomainMessage, SenderIdentity } from '../contracts';
import { TELEGRAM_BOT, TelegramClient } from '../telegram.provider';

/**
 * Stable backend key for a Telegram sender. Tries username, then user id,
 * then chat id; zero ids count as missing.
 */
export function deriveUserId(identity: SenderIdentity): string {
  if (identity.username) return `tg_${identity.username}`;
  if (identity.id) return `tg_id_${identity.id}`;
  if (identity.chatId) return `tg_chat_${identity.chatId}`;
  return 'tg_unknown';
}

@Injectable()
export class TelegramAdapter {
  private readonly log = new Logger(TelegramAdapter.name);
  private username: string | undefined;

  constructor(@Inject(TELEGRAM_BOT) private readonly bot: TelegramClient) {}

  /** Looks up the bot's own username so `/cmd@name` can be matched. */
  async identify(): Promise<void> {
    const me = await this.bot.getMe();
    this.username = me.username?.toLowerCase();
    this.log.log(`Running as @${me.username ?? me.id}`);
  }

  /**
   * Leading bot command, e.g. `start` for `/start` or `/Start@art_compass_bot arg`.
   * `null` when the message does not start with one.
   */
  commandOf(msg: TelegramBot.Message): BotCommand | null {
    const entity = msg.entities?.[0];
    if (!msg.text || entity?.type !== 'bot_command' || entity.offset !== 0) {
      return null;
    }
    const [name, mention] = msg.text.substring(1, entity.length).split('@');
    return {
      name: name.toLowerCase(),
      forThisBot:
        mention === undefined ||
        this.username === undefined ||
        mention.toLowerCase() === this.username,
    };
  }

  fromIncoming(msg: TelegramBot.Message): DomainMessage | null {
    if (!msg.text) {
      this.log.debug('Telegram update without text');
      return null;
    }

    const domainMessage: DomainMessage = {
      chatId: msg.chat.id,
      platformMessageId: String(msg.message_id),
      userId: deriveUserId({
        username: msg.from?.username,
        id: msg.from?.id,
        chatId: msg.chat.id,
      }),
      text: msg.text.trim(),
    };
    this.log.debug(
      `[fromIncoming] TG message ${domainMessage.platformMessageId} from ${domainMessage.userId}`,
    );
    return domainMessage;
  }

  /** Shows "typing..." in the chat. Failures are logged, never thrown. */
  async sendTyping(chatId: number): Promise<void> {
    try {
      await this.bot.sendChatAction(chatId, 'typing');
    } catch (err) {
      this.log.warn(
        `Typing indicator failed for chat ${chatId}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }

  async sendReply(chatId: number, text: string): Promise<void> {
    await this.bot.sendMessage(chatId, text);
    this.log.debug(`TG message sent to ${chatId}`);
  }
}
