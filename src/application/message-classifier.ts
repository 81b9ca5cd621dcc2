import type { Logger } from 'pino';
import type { CallbackEvent, EventsApiPayload, ThreadReference } from '../domain/index.js';

/**
 * Decides whether a callback event is a new reply inside a thread.
 *
 * Plain and file-share messages qualify when `thread_ts` is set. Any other
 * subtype (edits, deletions, thread broadcasts, ...) does not. The returned
 * `message_ts` is the reply's own `ts` so the permalink points at the reply
 * rather than the thread root.
 *
 * Pure apart from the log lines, which say why a message was skipped.
 */
export function classify(event: CallbackEvent, log?: Logger): ThreadReference | null {
  if (event.kind !== 'message') {
    log?.info({ type: event.type }, 'Ignoring non-message event');
    return null;
  }

  const message = event.message;
  if (message.kind === 'other') {
    log?.info({ subtype: message.subtype }, 'Not a threaded message: subtype is present');
    return null;
  }

  if (message.thread_ts === undefined) {
    log?.info({ channel: message.channel, ts: message.ts }, 'Not a threaded message: thread_ts is absent');
    return null;
  }

  return { channel: message.channel, message_ts: message.ts };
}

/** Payload-level entry point; only `event_callback` payloads are classified. */
export function findThreadedMessage(payload: EventsApiPayload, log?: Logger): ThreadReference | null {
  if (payload.kind !== 'event_callback') {
    log?.info({ type: payload.type }, 'Ignoring non event_callback payload');
    return null;
  }

  return classify(payload.event, log?.child({ event_id: payload.event_id }));
}
