import axios from 'axios';
import { Notifier } from '../interfaces/Notifier';
import { NotificationType } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { formatError } from '../utils/errors';

export type WebhookPayload = { text: string } | { content: string };

/**
 * Body for the webhook flavour: Slack reads `text`, Discord reads `content`
 */
export function buildWebhookPayload(type: NotificationType, message: string): WebhookPayload {
  return type === 'discord' ? { content: message } : { text: message };
}

/**
 * Posts failure summaries to a Slack or Discord incoming webhook
 */
export class NotificationClient implements Notifier {
  constructor(
    private readonly webhookUrl: string | undefined,
    private readonly type: NotificationType,
    private readonly logger: Logger,
    private readonly timeoutMs: number = 10000
  ) {}

  async notify(message: string): Promise<void> {
    if (!this.webhookUrl) {
      this.logger.debug('No notification webhook configured, skipping', { message });
      return;
    }

    try {
      await axios.post(this.webhookUrl, buildWebhookPayload(this.type, message), {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.timeoutMs,
      });
    } catch (error) {
      // Delivery is best effort
      this.logger.debug(`Notification delivery failed: ${formatError(error)}`, { type: this.type });
    }
  }
}
