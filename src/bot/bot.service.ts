import { Injectable, Logger } from '@nestjs/common';
import { DomainMessage } from './contracts';
import {
  BACKEND_UNAVAILABLE_REPLY,
  HELP_REPLY,
  NO_RESPONSE_REPLY,
  startReply,
} from './bot.replies';
import { CompassClient } from './services/compass.client';
import {
  formatForDisplay,
  truncateForTelegram,
} from './formatting/display-format';

@Injectable()
export class BotService {
  private readonly log = new Logger(BotService.name);

  constructor(private readonly compass: CompassClient) {}

  handleStart(firstName?: string): string {
    return startReply(firstName);
  }

  handleHelp(): string {
    return HELP_REPLY;
  }

  /** Builds the reply for a free-text message. */
  async handle(m: DomainMessage): Promise<string> {
    this.log.log(
      `Calling BCN API for user ${m.userId} with message: ${m.text.substring(0, 50)}`,
    );
    const answer = await this.askCompass(m.userId, m.text);
    this.log.log(`Received response of length ${answer.length}`);

    return truncateForTelegram(formatForDisplay(answer));
  }

  /**
   * Asks the backend and always resolves to text the user can read:
   * the backend's answer, or a fixed fallback when it had nothing to say
   * or could not be reached.
   */
  async askCompass(userId: string, message: string): Promise<string> {
    const outcome = await this.compass.chat(userId, message);
    if (!outcome.ok) return BACKEND_UNAVAILABLE_REPLY;
    return outcome.reply ?? NO_RESPONSE_REPLY;
  }
}
