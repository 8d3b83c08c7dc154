import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import TelegramBot from 'node-telegram-bot-api';
import { BotService } from './bot.service';
import { BotCommand } from './contracts';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { TELEGRAM_BOT, TelegramClient } from './telegram.provider';

/**
 * Routes Telegram updates to {@link BotService} and sends the replies.
 *
 * The Bot API client emits one `message` event per update and does not wait
 * for the previous handler, so updates are processed concurrently. Nothing
 * here keeps state between updates.
 */
@Injectable()
export class TelegramListener
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly log = new Logger(TelegramListener.name);

  constructor(
    @Inject(TELEGRAM_BOT) private readonly bot: TelegramClient,
    private readonly tg: TelegramAdapter,
    private readonly botService: BotService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    this.bot.on('message', (msg: TelegramBot.Message) => {
      this.dispatch(msg).catch((err: unknown) => {
        this.log.error(
          `[TG] Update ${msg.message_id} failed: ${err instanceof Error ? err.message : String(err)}`,
          err instanceof Error ? err.stack : undefined,
        );
      });
    });
    this.bot.on('polling_error', (err: Error) => {
      this.log.error(`[TG] Polling error: ${err.message}`);
    });

    await this.tg.identify();
    await this.bot.startPolling();
    this.log.log('Polling Telegram for updates');
  }

  async onApplicationShutdown(): Promise<void> {
    await this.bot.stopPolling();
  }

  async dispatch(msg: TelegramBot.Message): Promise<void> {
    const command = this.tg.commandOf(msg);
    if (command) {
      await this.runCommand(command, msg);
      return;
    }

    const dm = this.tg.fromIncoming(msg);
    if (!dm) return;

    await this.tg.sendTyping(dm.chatId);
    const reply = await this.botService.handle(dm);
    await this.tg.sendReply(dm.chatId, reply);
    this.log.log('Message sent successfully');
  }

  private async runCommand(
    command: BotCommand,
    msg: TelegramBot.Message,
  ): Promise<void> {
    if (!command.forThisBot) {
      this.log.debug(`[TG] Ignoring /${command.name} addressed to another bot`);
      return;
    }

    switch (command.name) {
      case 'start':
        await this.tg.sendReply(
          msg.chat.id,
          this.botService.handleStart(msg.from?.first_name),
        );
        return;
      case 'help':
        await this.tg.sendReply(msg.chat.id, this.botService.handleHelp());
        return;
      default:
        this.log.debug(`[TG] Ignoring unknown command /${command.name}`);
    }
  }
}
