import type { Logger } from 'pino';
import type { ThreadReference } from '../domain/index.js';
import type {
  PermalinkResponse,
  PostMessageResponse,
  SlackMessagingApi,
} from '../infrastructure/slack/web-api-client.js';

export type ReactionStep = 'chat.getPermalink' | 'chat.postMessage';

/**
 * A reaction that could not complete.
 *
 * `step` names the call that failed; `detail` holds the Slack response
 * (or nothing when the call itself threw, in which case `cause` is set).
 */
export class ReactionError extends Error {
  readonly step: ReactionStep;
  readonly detail: Record<string, unknown> | undefined;

  constructor(
    step: ReactionStep,
    message: string,
    detail?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ReactionError';
    this.step = step;
    this.detail = detail;
  }
}

export interface ReactionOutcome {
  permalink: string;
  /** `ts` of the message that carried the permalink. */
  posted_ts: string;
}

/**
 * Resolves a reply's permalink and posts it back to the same channel.
 *
 * The two calls run strictly in order and each at most once. Any failure
 * ends the sequence with a ReactionError; nothing is retried.
 */
export class ReactionSequencer {
  private readonly api: SlackMessagingApi;

  constructor(api: SlackMessagingApi) {
    this.api = api;
  }

  async react(ref: ThreadReference, log: Logger): Promise<ReactionOutcome> {
    const permalink = await this.resolvePermalink(ref);
    log.info({ permalink }, 'Translated to permalink');

    const postedTs = await this.postPermalink(ref.channel, permalink);
    log.info({ ts: postedTs, channel: ref.channel }, 'Posted a permalink');

    return { permalink, posted_ts: postedTs };
  }

  private async resolvePermalink(ref: ThreadReference): Promise<string> {
    const step: ReactionStep = 'chat.getPermalink';
    let response: PermalinkResponse;
    try {
      response = await this.api.getPermalink({ channel: ref.channel, message_ts: ref.message_ts });
    } catch (err: unknown) {
      throw new ReactionError(step, `${step} request failed`, undefined, { cause: err });
    }

    if (!response.ok) {
      throw new ReactionError(step, `${step} failed: ${response.error ?? 'unknown_error'}`, response);
    }
    if (response.permalink === undefined) {
      throw new ReactionError(step, `${step} returned no permalink`, response);
    }
    return response.permalink;
  }

  private async postPermalink(channel: string, permalink: string): Promise<string> {
    const step: ReactionStep = 'chat.postMessage';
    let response: PostMessageResponse;
    try {
      response = await this.api.postMessage({ channel, text: permalink });
    } catch (err: unknown) {
      throw new ReactionError(step, `${step} request failed`, undefined, { cause: err });
    }

    if (!response.ok) {
      throw new ReactionError(step, `${step} failed: ${response.error ?? 'unknown_error'}`, response);
    }
    if (response.ts === undefined) {
      throw new ReactionError(step, `${step} returned no ts`, response);
    }
    return response.ts;
  }
}
