import axios from 'axios';
import { CONFIG } from '../config';
import { logger } from '../utils/logger';
import { formatError } from '../utils/formatError';
import { retry } from '../utils/retry';

export interface TelegramUpdate {
  update_id: number;
  message?: {
    message_id: number;
    chat: { id: number | string };
    text?: string;
  };
}

interface TelegramUpdatesResponse {
  ok: boolean;
  result?: TelegramUpdate[];
  description?: string;
}

interface TelegramErrorBody {
  ok: false;
  description?: string;
  parameters?: { retry_after?: number };
}

function botUrl(token: string, method: string) {
  return `https://api.telegram.org/bot${token}/${method}`;
}

// 429 and 5xx are transient; any other 4xx fails the same way every time.
function isTransient(error: unknown) {
  if (!axios.isAxiosError(error) || !error.response) return true;
  const { status } = error.response;
  return status === 429 || status >= 500;
}

function retryAfterMs(error: unknown): number | undefined {
  if (!axios.isAxiosError<TelegramErrorBody>(error)) return undefined;
  const seconds = error.response?.data?.parameters?.retry_after;
  return typeof seconds === 'number' ? seconds * 1000 : undefined;
}

export const Telegram = {
  isConfigured() {
    return Boolean(CONFIG.TELEGRAM_TOKEN && CONFIG.TELEGRAM_CHAT_ID);
  },

  async sendMessage(msg: string, chatId?: string) {
    const token = CONFIG.TELEGRAM_TOKEN;
    const targetChat = chatId || CONFIG.TELEGRAM_CHAT_ID;
    if (!token || !targetChat) return;
    await retry(
      () => axios.post(botUrl(token, 'sendMessage'), { chat_id: targetChat, text: msg }),
      {
        attempts: 3,
        delayMs: 500,
        backoffFactor: 2,
        maxDelayMs: 30_000,
        shouldRetry: isTransient,
        retryAfterMs,
        onRetry: (error, attempt, waitMs) => {
          logger.warn('telegram_send_retry', {
            event: 'telegram_send_retry',
            attempt,
            waitMs,
            error: formatError(error),
            chatId: targetChat,
          });
        },
      }
    ).catch((error) => {
      logger.warn('telegram_send_failed', {
        event: 'telegram_send_failed',
        error: formatError(error),
        chatId: targetChat,
      });
    });
  },

  /** Long-polls for bot updates after `offset`. Rejects on transport errors. */
  async getUpdates(offset: number, timeoutSec = 0): Promise<TelegramUpdate[]> {
    const token = CONFIG.TELEGRAM_TOKEN;
    if (!token) return [];
    const response = await axios.get<TelegramUpdatesResponse>(botUrl(token, 'getUpdates'), {
      params: { offset, timeout: timeoutSec, allowed_updates: JSON.stringify(['message']) },
      timeout: (timeoutSec + 10) * 1000,
    });
    if (!response.data.ok) {
      throw new Error(`telegram_get_updates_failed:${response.data.description ?? 'unknown'}`);
    }
    return response.data.result ?? [];
  },
};
