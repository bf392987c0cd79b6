import { getLogger } from '../../utils/logger.js';
import type { Config } from '../../config.js';

export interface NotificationSink {
  readonly name: string;
  send(message: string): Promise<void>;
}

/**
 * Posts alerts to a Slack incoming webhook.
 */
export class SlackNotifier implements NotificationSink {
  readonly name = 'slack';
  private log = getLogger();
  private webhookUrl: string;

  constructor(webhookUrl: string) {
    this.webhookUrl = webhookUrl;
  }

  get isConfigured(): boolean {
    return Boolean(this.webhookUrl);
  }

  async send(message: string): Promise<void> {
    if (!this.isConfigured) {
      throw new Error('Slack webhook URL is not configured');
    }

    const res = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: message }),
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Slack webhook failed: ${res.status} ${body}`);
    }

    this.log.info('Slack alert sent');
  }
}

/**
 * Fallback when no webhook is set: the alert only goes to the log.
 */
export class LogNotifier implements NotificationSink {
  readonly name = 'log';
  private log = getLogger();

  async send(message: string): Promise<void> {
    this.log.warn({ alert: message }, 'Slack disabled, alert not delivered');
  }
}

export function createNotifier(config: Pick<Config, 'slackWebhookUrl'>): NotificationSink {
  const slack = new SlackNotifier(config.slackWebhookUrl);
  return slack.isConfigured ? slack : new LogNotifier();
}
