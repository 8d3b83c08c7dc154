export interface DomainMessage {
  chatId: number;
  platformMessageId: string;
  userId: string; // opaque key sent to the backend
  text: string; // trimmed
}

export interface SenderIdentity {
  username?: string;
  id?: number;
  chatId?: number;
}

export interface BotCommand {
  name: string; // lower-cased, without the slash
  forThisBot: boolean; // false for /cmd@other_bot
}
