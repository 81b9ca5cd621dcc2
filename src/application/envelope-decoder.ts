import { z } from 'zod';
import type {
  Acknowledgment,
  CallbackEvent,
  CommonMessageFields,
  EventsApiPayload,
  InboundEvent,
  MessageEvent,
} from '../domain/index.js';

/**
 * Raised when a frame or payload is structurally invalid.
 *
 * `issues` holds the zod issues when schema validation was the cause.
 */
export class DecodeError extends Error {
  readonly issues: readonly z.ZodIssue[];

  constructor(message: string, issues: readonly z.ZodIssue[] = []) {
    super(message);
    this.name = 'DecodeError';
    this.issues = issues;
  }
}

type Parser<T> = (raw: unknown) => T;

/* ------------------------------------------------------------------ */
/*  Schemas                                                           */
/* ------------------------------------------------------------------ */

const taggedSchema = z.object({ type: z.string() });

const helloSchema = z.object({
  connection_info: z.object({ app_id: z.string() }),
  num_connections: z.number().int().optional(),
});

const disconnectSchema = z.object({
  reason: z.string().optional(),
});

const eventsApiSchema = z.object({
  envelope_id: z.string().min(1),
  // Checked by decodeEventsApiPayload, after the envelope id is known.
  payload: z.unknown(),
  retry_attempt: z.number().int().optional(),
  retry_reason: z.string().optional(),
});

const eventCallbackSchema = z.object({
  event_id: z.string(),
  team_id: z.string().optional(),
  event: z.record(z.string(), z.unknown()),
});

// Phase one of a message decode: only the discriminator is read.
const subtypeSchema = z.object({
  subtype: z.string().nullish(),
});

const commonMessageSchema = z.object({
  channel: z.string(),
  ts: z.string(),
  thread_ts: z.string().nullish(),
});

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(`Invalid ${what}`, parsed.error.issues);
  }
  return parsed.data;
}

function readTag(raw: unknown, what: string): string {
  return parseWith(taggedSchema, raw, what).type;
}

function readCommonFields(raw: unknown): CommonMessageFields {
  const message = parseWith(commonMessageSchema, raw, 'message fields');
  return {
    channel: message.channel,
    ts: message.ts,
    thread_ts: message.thread_ts ?? undefined,
  };
}

/* ------------------------------------------------------------------ */
/*  Tag → parser tables                                               */
/* ------------------------------------------------------------------ */

const inboundParsers = new Map<string, Parser<InboundEvent>>([
  ['hello', (raw) => {
    const hello = parseWith(helloSchema, raw, 'hello frame');
    return {
      kind: 'hello',
      app_id: hello.connection_info.app_id,
      num_connections: hello.num_connections,
    };
  }],
  ['disconnect', (raw) => {
    const disconnect = parseWith(disconnectSchema, raw, 'disconnect frame');
    return { kind: 'disconnect', reason: disconnect.reason };
  }],
  ['events_api', (raw) => {
    const envelope = parseWith(eventsApiSchema, raw, 'events_api envelope');
    return {
      kind: 'events_api',
      envelope_id: envelope.envelope_id,
      payload: envelope.payload,
      retry_attempt: envelope.retry_attempt,
      retry_reason: envelope.retry_reason,
    };
  }],
]);

const payloadParsers = new Map<string, Parser<EventsApiPayload>>([
  ['event_callback', (raw) => {
    const callback = parseWith(eventCallbackSchema, raw, 'event_callback payload');
    return {
      kind: 'event_callback',
      event_id: callback.event_id,
      team_id: callback.team_id,
      event: decodeCallbackEvent(callback.event),
    };
  }],
]);

const callbackParsers = new Map<string, Parser<CallbackEvent>>([
  ['message', (raw) => ({ kind: 'message', message: decodeMessageEvent(raw) })],
]);

const messageSubtypeParsers = new Map<string, Parser<MessageEvent>>([
  ['file_share', (raw) => ({ kind: 'file_share', ...readCommonFields(raw) })],
]);

/* ------------------------------------------------------------------ */
/*  Public decoders                                                   */
/* ------------------------------------------------------------------ */

/**
 * Decodes one text frame from the socket.
 *
 * Unlike the inner layers there is no catch-all here: an unknown frame
 * type is a DecodeError, and so is text that is not JSON.
 */
export function decodeInboundEvent(text: string): InboundEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new DecodeError('Frame is not valid JSON');
  }

  const tag = readTag(raw, 'frame');
  const parse = inboundParsers.get(tag);
  if (!parse) {
    throw new DecodeError(`Unknown frame type "${tag}"`);
  }
  return parse(raw);
}

/** Second pass over an `events_api` envelope's payload. Unknown types map to `other`. */
export function decodeEventsApiPayload(raw: unknown): EventsApiPayload {
  const tag = readTag(raw, 'events_api payload');
  const parse = payloadParsers.get(tag);
  return parse ? parse(raw) : { kind: 'other', type: tag };
}

export function decodeCallbackEvent(raw: unknown): CallbackEvent {
  const tag = readTag(raw, 'callback event');
  const parse = callbackParsers.get(tag);
  return parse ? parse(raw) : { kind: 'other', type: tag };
}

/**
 * Decodes a `message` callback event in two phases.
 *
 * The `subtype` discriminator sits in the same flat object as the message
 * fields, so it is read on its own first; the remaining fields are only
 * validated once the target variant is known.
 */
export function decodeMessageEvent(raw: unknown): MessageEvent {
  const { subtype } = parseWith(subtypeSchema, raw, 'message event');

  if (subtype === undefined || subtype === null) {
    return { kind: 'plain', ...readCommonFields(raw) };
  }

  const parse = messageSubtypeParsers.get(subtype);
  return parse ? parse(raw) : { kind: 'other', subtype };
}

export function encodeAcknowledgment(ack: Acknowledgment): string {
  return JSON.stringify({ envelope_id: ack.envelope_id });
}
