import { afterEach, describe, expect, it, vi } from 'vitest';
import { createNotifier, LogNotifier, SlackNotifier } from './slack.js';

const WEBHOOK = 'https://hooks.example.test/services/test-webhook';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('SlackNotifier', () => {
  it('posts the message as JSON text', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response('ok', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    await new SlackNotifier(WEBHOOK).send('🔥 High Performing Post!');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(WEBHOOK, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"text":"🔥 High Performing Post!"}',
    });
  });

  it('throws when the webhook rejects the message', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('invalid_payload', { status: 400 })));

    await expect(new SlackNotifier(WEBHOOK).send('hello')).rejects.toThrow('Slack webhook failed: 400 invalid_payload');
  });

  it('refuses to send without a URL', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    await expect(new SlackNotifier('').send('hello')).rejects.toThrow('Slack webhook URL is not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('createNotifier', () => {
  it('uses Slack when a webhook is configured', () => {
    expect(createNotifier({ slackWebhookUrl: WEBHOOK }).name).toBe('slack');
  });

  it('falls back to the log', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const notifier = createNotifier({ slackWebhookUrl: '' });
    expect(notifier).toBeInstanceOf(LogNotifier);
    await notifier.send('hello');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
