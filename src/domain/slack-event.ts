/**
 * Typed event model for Slack Socket Mode traffic.
 *
 * Every layer below the outer envelope carries an `other` variant so that
 * new event kinds added upstream decode without error and are ignored.
 * Variants are discriminated by `kind`, never by the wire `type` field.
 */

/** Outer frame sent by the Socket Mode service. */
export type InboundEvent =
  | {
      readonly kind: 'hello';
      readonly app_id: string;
      readonly num_connections?: number | undefined;
    }
  | {
      readonly kind: 'disconnect';
      readonly reason?: string | undefined;
    }
  | {
      readonly kind: 'events_api';
      readonly envelope_id: string;
      /** Decoded lazily via `decodeEventsApiPayload`. */
      readonly payload: unknown;
      readonly retry_attempt?: number | undefined;
      readonly retry_reason?: string | undefined;
    };

/** Body of an `events_api` envelope. */
export type EventsApiPayload =
  | {
      readonly kind: 'event_callback';
      readonly event_id: string;
      readonly team_id?: string | undefined;
      readonly event: CallbackEvent;
    }
  | { readonly kind: 'other'; readonly type: string };

export type CallbackEvent =
  | { readonly kind: 'message'; readonly message: MessageEvent }
  | { readonly kind: 'other'; readonly type: string };

/** Fields shared by plain messages and file-share messages. */
export interface CommonMessageFields {
  readonly channel: string;
  readonly ts: string;
  readonly thread_ts?: string | undefined;
}

/**
 * A `message` callback event, split on its optional `subtype`.
 *
 * - no subtype       → `plain`
 * - `file_share`     → `file_share`
 * - any other value  → `other`
 */
export type MessageEvent =
  | ({ readonly kind: 'plain' } & CommonMessageFields)
  | ({ readonly kind: 'file_share' } & CommonMessageFields)
  | { readonly kind: 'other'; readonly subtype: string };

/**
 * Identifies one reply inside a thread.
 *
 * `message_ts` is the reply's own `ts`, not the thread root's.
 */
export interface ThreadReference {
  readonly channel: string;
  readonly message_ts: string;
}

/** Sent back over the socket once per `events_api` envelope. */
export interface Acknowledgment {
  readonly envelope_id: string;
}
