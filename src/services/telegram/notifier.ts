// Telegram notifications for signal outcomes and admin actions

import type { TelegramConfig } from '../../lib/config';
import { errorMessage, logger } from '../../lib/logger';
import type { Notifier } from '../../bot/types';

export const TELEGRAM_MAX_LENGTH = 4096;
const TELEGRAM_TIMEOUT_MS = 10_000;

export function truncateForTelegram(text: string): string {
  return text.length > TELEGRAM_MAX_LENGTH ? `${text.slice(0, TELEGRAM_MAX_LENGTH - 3)}...` : text;
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly token: string,
    private readonly chatId: string,
    private readonly timeoutMs = TELEGRAM_TIMEOUT_MS
  ) {}

  async notify(text: string): Promise<boolean> {
    if (!text.trim()) {
      logger.warn('Empty notification skipped');
      return false;
    }

    try {
      const response = await fetch(`https://api.telegram.org/bot${this.token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: this.chatId, text: truncateForTelegram(text) }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        logger.error('Telegram send failed', { status: response.status });
        return false;
      }
      logger.debug('Telegram message sent');
      return true;
    } catch (error) {
      logger.error('Telegram send error', { error: errorMessage(error) });
      return false;
    }
  }
}

/** Used when no bot token or chat id is configured */
export class LogNotifier implements Notifier {
  async notify(text: string): Promise<boolean> {
    logger.info('Notification', { text });
    return true;
  }
}

export function createNotifier(config: TelegramConfig): Notifier {
  if (config.token && config.chatId) {
    return new TelegramNotifier(config.token, config.chatId);
  }
  logger.warn('Telegram not configured, notifications go to the log only');
  return new LogNotifier();
}
