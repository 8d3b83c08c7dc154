import { Provider } from '@nestjs/common';
import TelegramBot from 'node-telegram-bot-api';
import { RELAY_CONFIG, RelayConfig } from '../config/relay-config';

export const TELEGRAM_BOT = 'TELEGRAM_BOT';

/** The parts of the Bot API client the relay talks to. */
export type TelegramClient = Pick<
  TelegramBot,
  | 'on'
  | 'getMe'
  | 'startPolling'
  | 'stopPolling'
  | 'sendMessage'
  | 'sendChatAction'
>;

// Polling starts from TelegramListener once the app has bootstrapped.
export const telegramBotProvider: Provider = {
  provide: TELEGRAM_BOT,
  inject: [RELAY_CONFIG],
  useFactory: (cfg: RelayConfig): TelegramClient =>
    new TelegramBot(cfg.telegramToken, { polling: false }),
};
