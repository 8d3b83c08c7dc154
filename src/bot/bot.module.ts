import { Module } from '@nestjs/common';
import { BotService } from './bot.service';
import { TelegramAdapter } from './adapters/telegram.adapter';
import { TelegramListener } from './telegram.listener';
import { telegramBotProvider } from './telegram.provider';
import { CompassClient } from './services/compass.client';

@Module({
  providers: [
    telegramBotProvider,
    BotService,
    TelegramAdapter,
    TelegramListener,
    CompassClient,
  ],
})
export class BotModule {}
