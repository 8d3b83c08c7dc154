import { Logger } from '@nestjs/common';
import {
  alice,
  commandMessage,
  fakeTelegramBot,
  telegramMessage,
} from '../testing/telegram.fixtures';
import { deriveUserId, TelegramAdapter } from './telegram.adapter';

describe('deriveUserId', () => {
  it('prefers the username', () => {
    expect(deriveUserId({ username: 'alice', id: 42, chatId: 7 })).toBe('tg_alice');
  });

  it('falls back to the numeric user id', () => {
    expect(deriveUserId({ id: 42 })).toBe('tg_id_42');
  });

  it('falls back to the chat id', () => {
    expect(deriveUserId({ chatId: 7 })).toBe('tg_chat_7');
    expect(deriveUserId({ id: 0, chatId: 7 })).toBe('tg_chat_7');
  });

  it('uses a sentinel when nothing is known', () => {
    expect(deriveUserId({})).toBe('tg_unknown');
  });
});

describe('TelegramAdapter', () => {
  let bot: ReturnType<typeof fakeTelegramBot>;
  let adapter: TelegramAdapter;

  beforeEach(() => {
    bot = fakeTelegramBot();
    adapter = new TelegramAdapter(bot);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('identify', () => {
    it('asks Telegram who the bot is', async () => {
      jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

      await adapter.identify();

      expect(bot.getMe).toHaveBeenCalledTimes(1);
    });
  });

  describe('commandOf', () => {
    it('reads a leading bot command', () => {
      expect(adapter.commandOf(commandMessage('/start'))).toEqual({
        name: 'start',
        forThisBot: true,
      });
    });

    it('accepts any mention before the bot username is known', () => {
      expect(adapter.commandOf(commandMessage('/start@other_bot'))).toEqual({
        name: 'start',
        forThisBot: true,
      });
    });

    describe('once identified', () => {
      beforeEach(async () => {
        jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
        await adapter.identify();
      });

      it('matches its own mention case-insensitively and lower-cases the name', () => {
        expect(adapter.commandOf(commandMessage('/Help@art_compass_bot now'))).toEqual({
          name: 'help',
          forThisBot: true,
        });
      });

      it('flags commands addressed to another bot', () => {
        expect(adapter.commandOf(commandMessage('/start@other_bot'))).toEqual({
          name: 'start',
          forThisBot: false,
        });
      });
    });

    it('ignores plain text and commands that are not at the start', () => {
      expect(adapter.commandOf(telegramMessage({ text: 'hello' }))).toBeNull();
      expect(
        adapter.commandOf(
          telegramMessage({
            text: 'see /start',
            entities: [{ type: 'bot_command', offset: 4, length: 6 }],
          }),
        ),
      ).toBeNull();
    });
  });

  describe('fromIncoming', () => {
    it('returns null when there is no text', () => {
      expect(adapter.fromIncoming(telegramMessage({ from: alice() }))).toBeNull();
    });

    it('builds a trimmed domain message with a derived user id', () => {
      const dm = adapter.fromIncoming(
        telegramMessage({ from: alice(), text: '  sculpture near Gràcia  ' }),
      );

      expect(dm).toEqual({
        chatId: 7,
        platformMessageId: '1',
        userId: 'tg_alice',
        text: 'sculpture near Gràcia',
      });
    });

    it('uses the chat id when the sender is unknown', () => {
      const dm = adapter.fromIncoming(telegramMessage({ text: 'hi' }));
      expect(dm?.userId).toBe('tg_chat_7');
    });
  });

  describe('sendTyping', () => {
    it('sends the typing action to the chat', async () => {
      await adapter.sendTyping(7);
      expect(bot.sendChatAction).toHaveBeenCalledWith(7, 'typing');
    });

    it('logs and swallows failures', async () => {
      const warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);
      bot.sendChatAction.mockRejectedValue(new Error('Too Many Requests'));

      await expect(adapter.sendTyping(7)).resolves.toBeUndefined();
      expect(warn).toHaveBeenCalledWith(
        'Typing indicator failed for chat 7: Too Many Requests',
      );
    });
  });

  it('sendReply sends plain text to the chat', async () => {
    await adapter.sendReply(7, 'hello');
    expect(bot.sendMessage).toHaveBeenCalledWith(7, 'hello');
  });
});
