import TelegramBot from 'node-telegram-bot-api';

export function fakeTelegramBot() {
  return {
    on: jest.fn(),
    getMe: jest.fn().mockResolvedValue(compassBot()),
    startPolling: jest.fn().mockResolvedValue(undefined),
    stopPolling: jest.fn().mockResolvedValue(undefined),
    sendMessage: jest.fn().mockResolvedValue({}),
    sendChatAction: jest.fn().mockResolvedValue(true),
  };
}

export function compassBot(): TelegramBot.User {
  return { id: 99, is_bot: true, first_name: 'Art Compass', username: 'Art_Compass_Bot' };
}

export function alice(): TelegramBot.User {
  return { id: 42, is_bot: false, first_name: 'Alice', username: 'alice' };
}

export function telegramMessage(
  overrides: Partial<TelegramBot.Message> = {},
): TelegramBot.Message {
  return {
    message_id: 1,
    date: 1_700_000_000,
    chat: { id: 7, type: 'private' },
    ...overrides,
  };
}

export function commandMessage(
  text: string,
  overrides: Partial<TelegramBot.Message> = {},
): TelegramBot.Message {
  const length = text.split(' ')[0].length;
  return telegramMessage({
    text,
    entities: [{ type: 'bot_command', offset: 0, length }],
    ...overrides,
  });
}
