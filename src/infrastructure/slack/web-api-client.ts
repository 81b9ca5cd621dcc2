import { z } from 'zod';

export const DEFAULT_SLACK_API_BASE_URL = 'https://slack.com/api';

/**
 * Response bodies keep unknown keys (`error`, `warning`, `response_metadata`)
 * so failures can be logged in full.
 */
const openConnectionResponseSchema = z.object({
  ok: z.boolean(),
  url: z.string().optional(),
  error: z.string().optional(),
}).passthrough();

const permalinkResponseSchema = z.object({
  ok: z.boolean(),
  permalink: z.string().optional(),
  error: z.string().optional(),
}).passthrough();

const postMessageResponseSchema = z.object({
  ok: z.boolean(),
  ts: z.string().optional(),
  error: z.string().optional(),
}).passthrough();

export type OpenConnectionResponse = z.infer<typeof openConnectionResponseSchema>;
export type PermalinkResponse = z.infer<typeof permalinkResponseSchema>;
export type PostMessageResponse = z.infer<typeof postMessageResponseSchema>;

export interface PermalinkRequest {
  channel: string;
  message_ts: string;
}

export interface PostMessageRequest {
  channel: string;
  text: string;
}

/** Thrown when Slack answers with a non-2xx status or an unexpected body. */
export class SlackHttpError extends Error {
  readonly method: string;
  readonly status: number;

  constructor(method: string, status: number, message: string) {
    super(message);
    this.name = 'SlackHttpError';
    this.method = method;
    this.status = status;
  }
}

/** The two REST calls the reaction path depends on. */
export interface SlackMessagingApi {
  getPermalink(request: PermalinkRequest): Promise<PermalinkResponse>;
  postMessage(request: PostMessageRequest): Promise<PostMessageResponse>;
}

/** The handshake call that yields a fresh Socket Mode URL. */
export interface SlackConnectionsApi {
  openConnection(): Promise<OpenConnectionResponse>;
}

export interface SlackWebApiClientOptions {
  /** App-level token (`xapp-`), used only for `apps.connections.open`. */
  appToken: string;
  /** Bot token (`xoxb-`), used for chat methods. */
  botToken: string;
  baseUrl?: string | undefined;
}

/**
 * Thin Slack Web API client over the global `fetch`.
 *
 * `ok: false` responses are returned as-is; deciding what they mean is left
 * to the caller. Only transport-level problems throw.
 */
export class SlackWebApiClient implements SlackMessagingApi, SlackConnectionsApi {
  private readonly appToken: string;
  private readonly botToken: string;
  private readonly baseUrl: string;

  constructor(options: SlackWebApiClientOptions) {
    this.appToken = options.appToken;
    this.botToken = options.botToken;
    this.baseUrl = (options.baseUrl ?? DEFAULT_SLACK_API_BASE_URL).replace(/\/+$/, '');
  }

  async openConnection(): Promise<OpenConnectionResponse> {
    const response = await fetch(`${this.baseUrl}/apps.connections.open`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.appToken}` },
    });
    return this.readBody('apps.connections.open', response, openConnectionResponseSchema);
  }

  async getPermalink(request: PermalinkRequest): Promise<PermalinkResponse> {
    const body = new URLSearchParams({
      channel: request.channel,
      message_ts: request.message_ts,
    });

    const response = await fetch(`${this.baseUrl}/chat.getPermalink`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.botToken}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: body.toString(),
    });
    return this.readBody('chat.getPermalink', response, permalinkResponseSchema);
  }

  async postMessage(request: PostMessageRequest): Promise<PostMessageResponse> {
    const response = await fetch(`${this.baseUrl}/chat.postMessage`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.botToken}`,
        'Content-Type': 'application/json; charset=utf-8',
      },
      body: JSON.stringify({ channel: request.channel, text: request.text }),
    });
    return this.readBody('chat.postMessage', response, postMessageResponseSchema);
  }

  private async readBody<T extends z.ZodTypeAny>(
    method: string,
    response: Response,
    schema: T,
  ): Promise<z.output<T>> {
    if (!response.ok) {
      throw new SlackHttpError(method, response.status, `${method} returned HTTP ${response.status}`);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SlackHttpError(method, response.status, `${method} returned an unexpected body`);
    }
    return parsed.data;
  }
}
