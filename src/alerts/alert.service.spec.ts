import { AlertService } from '@alerts/alert.service';
import { NotificationError } from '@common/utils/error-handler';
import { ConfigService } from '@config/config.service';
import axios from 'axios';
import TelegramBot from 'node-telegram-bot-api';

const env = {
  GETH_URL: 'http://localhost:8545',
  BOT_TOKEN: 'test-token',
  CHECK_INTERVAL: '1s',
  REPORT_INTERVAL: '5s',
  ALERT_GROUP: '-1001',
};

function connectFailure(code: string): Error {
  const cause = Object.assign(new Error(`connect ${code} 127.0.0.1:443`), { code });
  return Object.assign(new Error(`EFATAL: ${cause.message}`), { code: 'EFATAL', cause });
}

const sentMessage: TelegramBot.Message = {
  message_id: 7,
  date: 0,
  chat: { id: -1001, type: 'group' },
};

describe('AlertService', () => {
  let service: AlertService;
  let sendMessage: jest.SpyInstance;
  let post: jest.SpyInstance;

  beforeEach(() => {
    sendMessage = jest.spyOn(TelegramBot.prototype, 'sendMessage');
    post = jest.spyOn(axios, 'post');
    service = new AlertService(new ConfigService(env));
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  describe('sendMessage', () => {
    it('sends the text verbatim through the bot library', async () => {
      sendMessage.mockResolvedValue(sentMessage);

      await service.sendMessage(-1001, '🟢 your node is back in sync');

      expect(sendMessage).toHaveBeenCalledWith(-1001, '🟢 your node is back in sync');
      expect(post).not.toHaveBeenCalled();
    });

    it('falls back to the Bot API over HTTP when the library cannot connect', async () => {
      sendMessage.mockRejectedValue(connectFailure('ECONNREFUSED'));
      post.mockResolvedValue({ status: 200, data: { ok: true } });

      await service.sendMessage(-1001, 'hello');

      expect(post).toHaveBeenCalledWith(
        'https://api.telegram.org/bottest-token/sendMessage',
        { chat_id: -1001, text: 'hello', disable_web_page_preview: true },
        { timeout: 10000 },
      );
    });

    it('throws a NotificationError when the fallback is rejected too', async () => {
      sendMessage.mockRejectedValue(connectFailure('ENOTFOUND'));
      post.mockResolvedValue({ status: 200, data: { ok: false, description: 'Bad Request: chat not found' } });

      const failure = service.sendMessage(-1001, 'hello');

      await expect(failure).rejects.toBeInstanceOf(NotificationError);
      await expect(failure).rejects.toMatchObject({
        message: 'Failed to send Telegram message: Bad Request: chat not found',
        destination: -1001,
      });
    });

    it('throws a NotificationError when the fallback request fails', async () => {
      sendMessage.mockRejectedValue(connectFailure('EAI_AGAIN'));
      post.mockRejectedValue(new Error('timeout of 10000ms exceeded'));

      await expect(service.sendMessage(-1001, 'hello')).rejects.toThrow(
        'Failed to send Telegram message: timeout of 10000ms exceeded',
      );
    });

    it('does not resend when Telegram rejected the message', async () => {
      sendMessage.mockRejectedValue(
        Object.assign(new Error('ETELEGRAM: 400 Bad Request: chat not found'), { code: 'ETELEGRAM' }),
      );

      await expect(service.sendMessage(-1001, 'hello')).rejects.toMatchObject({
        message: 'Failed to send Telegram message: ETELEGRAM: 400 Bad Request: chat not found',
        destination: -1001,
      });
      expect(post).not.toHaveBeenCalled();
    });

    it('does not resend after a failure once the request was under way', async () => {
      sendMessage.mockRejectedValue(Object.assign(new Error('EFATAL: socket hang up'), { code: 'EFATAL' }));

      await expect(service.sendMessage(-1001, 'hello')).rejects.toBeInstanceOf(NotificationError);
      expect(post).not.toHaveBeenCalled();
    });

    it('gives up on a send that does not answer in time', async () => {
      jest.useFakeTimers();
      sendMessage.mockReturnValue(new Promise(() => undefined));

      const failure = service.sendMessage(-1001, 'hello');
      const assertion = expect(failure).rejects.toThrow(
        'Failed to send Telegram message: Telegram sendMessage timed out after 10s',
      );
      await jest.advanceTimersByTimeAsync(10000);

      await assertion;
      expect(post).not.toHaveBeenCalled();
    });
  });

  describe('verifyCredentials', () => {
    it('returns the bot username', async () => {
      jest.spyOn(TelegramBot.prototype, 'getMe').mockResolvedValue({
        id: 1,
        is_bot: true,
        first_name: 'Sync Monitor',
        username: 'sync_monitor_bot',
      });

      await expect(service.verifyCredentials()).resolves.toBe('@sync_monitor_bot');
    });

    it('throws a NotificationError for a rejected token', async () => {
      jest.spyOn(TelegramBot.prototype, 'getMe').mockRejectedValue(new Error('ETELEGRAM: 401 Unauthorized'));

      await expect(service.verifyCredentials()).rejects.toThrow(
        'Telegram bot authentication failed: ETELEGRAM: 401 Unauthorized',
      );
    });
  });
});
