import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { SlackHttpError, SlackWebApiClient } from '../../src/infrastructure/slack/web-api-client.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function makeClient(baseUrl?: string): SlackWebApiClient {
  return new SlackWebApiClient({
    appToken: 'test-app-token',
    botToken: 'test-bot-token',
    baseUrl,
  });
}

describe('SlackWebApiClient', () => {
  let mockFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('opens a connection with the app token and no body', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ ok: true, url: 'wss://example.test/link/?ticket=t1' }));

    const response = await makeClient().openConnection();

    expect(response.ok).toBe(true);
    expect(response.url).toBe('wss://example.test/link/?ticket=t1');
    expect(mockFetch).toHaveBeenCalledWith('https://slack.com/api/apps.connections.open', {
      method: 'POST',
      headers: { Authorization: 'Bearer test-app-token' },
    });
  });

  it('sends getPermalink as a form with the bot token', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ ok: true, channel: 'C1', permalink: 'https://example.test/p1' }));

    const response = await makeClient().getPermalink({ channel: 'C1', message_ts: '1700000100.000200' });

    expect(response.permalink).toBe('https://example.test/p1');
    expect(mockFetch).toHaveBeenCalledWith('https://slack.com/api/chat.getPermalink', {
      method: 'POST',
      headers: {
        Authorization: 'Bearer test-bot-token',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: 'channel=C1&message_ts=1700000100.000200',
    });
  });

  it('sends postMessage as JSON with the bot token', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ ok: true, channel: 'C1', ts: '9.9' }));

    const response = await makeClient().postMessage({ channel: 'C1', text: 'https://example.test/p1' });

    expect(response.ts).toBe('9.9');
    expect(mockFetch).toHaveBeenCalledWith('https://slack.com/api/chat.postMessage', {
      method: 'POST',
      headers: {
        Authorization: 'Bearer test-bot-token',
        'Content-Type': 'application/json; charset=utf-8',
      },
      body: '{"channel":"C1","text":"https://example.test/p1"}',
    });
  });

  it('returns ok:false bodies untouched, extra fields included', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ ok: false, error: 'invalid_auth', warning: 'superfluous_charset' }));

    const response = await makeClient().openConnection();

    expect(response).toEqual({ ok: false, error: 'invalid_auth', warning: 'superfluous_charset' });
  });

  it('uses a custom base url without a trailing slash', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ ok: true, url: 'wss://example.test/' }));

    await makeClient('http://localhost:9999/api/').openConnection();

    expect(mockFetch.mock.calls[0]?.[0]).toBe('http://localhost:9999/api/apps.connections.open');
  });

  it('throws SlackHttpError on a non-2xx status', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ ok: false }, 429));

    const call = makeClient().getPermalink({ channel: 'C1', message_ts: '1.1' });

    await expect(call).rejects.toBeInstanceOf(SlackHttpError);
    await expect(call).rejects.toMatchObject({
      method: 'chat.getPermalink',
      status: 429,
      message: 'chat.getPermalink returned HTTP 429',
    });
  });

  it('throws SlackHttpError when the body lacks ok', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ permalink: 'https://example.test/p1' }));

    await expect(makeClient().getPermalink({ channel: 'C1', message_ts: '1.1' }))
      .rejects.toThrow('chat.getPermalink returned an unexpected body');
  });

  it('propagates transport errors', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(makeClient().postMessage({ channel: 'C1', text: 'x' })).rejects.toThrow('fetch failed');
  });
});
