import { TELEGRAM } from '@common/constants/config';
import { Notifier } from '@common/interfaces';
import { NotificationError, getErrorMessage } from '@common/utils/error-handler';
import { withTimeout } from '@common/utils/timeout';
import { ConfigService } from '@config/config.service';
import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import axios from 'axios';
import TelegramBot from 'node-telegram-bot-api';

interface TelegramApiResponse {
  ok: boolean;
  description?: string;
}

// Socket errors raised before the request was written
const CONNECT_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ENETUNREACH', 'EHOSTUNREACH']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * The bot library reports transport failures as `EFATAL` with the socket error as `cause`
 */
function isConnectFailure(error: unknown): boolean {
  if (!(error instanceof Error) || errorCode(error) !== 'EFATAL') {
    return false;
  }
  return CONNECT_ERROR_CODES.has(errorCode(error.cause) ?? '');
}

/**
 * Delivers alert messages to a Telegram chat
 */
@Injectable()
export class AlertService implements Notifier, OnModuleInit {
  private readonly logger = new Logger(AlertService.name);
  private readonly bot: TelegramBot;
  private readonly botToken: string;

  constructor(configService: ConfigService) {
    this.botToken = configService.getSyncMonitorConfig().botToken;
    this.bot = new TelegramBot(this.botToken, { polling: false });
  }

  /**
   * A bot that cannot authenticate aborts startup
   */
  async onModuleInit(): Promise<void> {
    await this.verifyCredentials();
  }

  /**
   * Check the bot token against the Bot API
   * @throws NotificationError when the token is rejected or the API cannot be reached
   */
  async verifyCredentials(): Promise<string> {
    try {
      const me = await this.bot.getMe();
      const name = me.username ? `@${me.username}` : me.first_name;
      this.logger.log(`Telegram bot authenticated as ${name}`);
      return name;
    } catch (error) {
      throw new NotificationError(`Telegram bot authentication failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Send plain text to a chat. The text is sent verbatim, without a parse mode.
   * The HTTP fallback is only tried when the bot library could not connect.
   * @throws NotificationError when the message could not be delivered
   */
  async sendMessage(destination: number, text: string): Promise<void> {
    try {
      const message = await withTimeout(
        this.bot.sendMessage(destination, text),
        TELEGRAM.REQUEST_TIMEOUT_MS,
        'Telegram sendMessage',
      );
      this.logger.debug(`Telegram message sent to ${destination}, message ID: ${message.message_id}`);
      return;
    } catch (error) {
      if (!isConnectFailure(error)) {
        throw new NotificationError(`Failed to send Telegram message: ${getErrorMessage(error)}`, destination);
      }
      this.logger.warn(`Could not reach Telegram for ${destination}: ${getErrorMessage(error)}`);
    }

    // Fallback: call the Bot API directly
    try {
      await this.sendViaHttp(destination, text);
      this.logger.debug(`Telegram message sent to ${destination} using fallback HTTP method`);
    } catch (error) {
      throw new NotificationError(`Failed to send Telegram message: ${getErrorMessage(error)}`, destination);
    }
  }

  private async sendViaHttp(destination: number, text: string): Promise<void> {
    const response = await axios.post<TelegramApiResponse>(
      `${TELEGRAM.API_URL}/bot${this.botToken}/sendMessage`,
      {
        chat_id: destination,
        text,
        disable_web_page_preview: true,
      },
      { timeout: TELEGRAM.REQUEST_TIMEOUT_MS },
    );

    if (!response.data.ok) {
      throw new Error(response.data.description || `Bot API answered with status ${response.status}`);
    }
  }
}
