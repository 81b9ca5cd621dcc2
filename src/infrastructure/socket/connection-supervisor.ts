import type { Logger } from 'pino';
import type { InboundEvent, ThreadReference } from '../../domain/index.js';
import {
  DecodeError,
  decodeEventsApiPayload,
  decodeInboundEvent,
  encodeAcknowledgment,
} from '../../application/envelope-decoder.js';
import { findThreadedMessage } from '../../application/message-classifier.js';
import type { RelayStatus } from '../../application/relay-status.js';
import type { SlackConnectionsApi } from '../slack/web-api-client.js';
import type { Connector, DuplexConnection, Frame } from './duplex-connection.js';

/** Raised when `apps.connections.open` does not yield a usable URL. Fatal. */
export class HandshakeError extends Error {
  readonly detail: Record<string, unknown>;

  constructor(message: string, detail: Record<string, unknown>) {
    super(message);
    this.name = 'HandshakeError';
    this.detail = detail;
  }
}

/** Whatever acts on a threaded reply; the reaction sequencer in production. */
export interface ThreadReactor {
  react(ref: ThreadReference, log: Logger): Promise<unknown>;
}

/** Dependencies bundled for the supervisor. */
export interface SupervisorDeps {
  connections: SlackConnectionsApi;
  connect: Connector;
  reactor: ThreadReactor;
  status: RelayStatus;
  log: Logger;
  /** Append `debug_reconnects=true` to every stream URL. */
  debugReconnects?: boolean | undefined;
}

/** Why the receive loop of one connection ended. */
export type LoopExit = 'disconnect' | 'close' | 'end' | 'error' | 'aborted';

/**
 * Asks Slack to rotate the connection far more often than usual, which
 * exercises the reconnect path.
 */
export function withDebugReconnects(url: string): string {
  const parsed = new URL(url);
  parsed.searchParams.set('debug_reconnects', 'true');
  return parsed.toString();
}

/**
 * Owns the Socket Mode connection for the lifetime of the process.
 *
 * Lifecycle: handshaking → connected → handshaking → ...
 *
 * - Handshaking fetches a fresh URL and opens a new connection. Any failure
 *   here rejects `run()`; there is no retry.
 * - Connected processes frames one at a time, in arrival order. Every
 *   `events_api` envelope is acknowledged once its handling has finished,
 *   whether or not a reaction fired or succeeded.
 * - A close frame, end of stream, read or write error, or a `disconnect`
 *   message ends the epoch: the connection is closed and replaced.
 *
 * Per-event failures (undecodable payloads, failed reactions) are logged
 * and counted; they never end the connection.
 */
export class ConnectionSupervisor {
  private readonly deps: SupervisorDeps;

  constructor(deps: SupervisorDeps) {
    this.deps = deps;
  }

  /**
   * Runs until `signal` is aborted. Rejects on a fatal handshake or
   * connect failure.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const { status } = this.deps;

    try {
      while (!signal?.aborted) {
        status.handshaking();
        const url = await this.handshake();
        const connection = await this.deps.connect(url);
        status.connected();

        const log = this.deps.log.child({ epoch: status.get().epoch });
        const exit = await this.runEpoch(connection, log, signal);
        await connection.close();
        log.info({ exit }, 'Connection closed');

        if (!signal?.aborted) {
          this.deps.log.info('Start reconnecting');
        }
      }
    } finally {
      status.stopped();
    }

    this.deps.log.info('Supervisor stopped');
  }

  /* ------------------------------------------------------------------ */
  /*  Handshaking                                                       */
  /* ------------------------------------------------------------------ */

  private async handshake(): Promise<string> {
    const response = await this.deps.connections.openConnection();

    if (!response.ok) {
      throw new HandshakeError(
        `Failed to open connection: ${response.error ?? 'unknown_error'}`,
        response,
      );
    }
    if (response.url === undefined) {
      throw new HandshakeError('Failed to open connection: response has no url', response);
    }

    const url = this.deps.debugReconnects ? withDebugReconnects(response.url) : response.url;
    this.deps.log.info({ url }, 'Initiated WebSocket mode');
    return url;
  }

  /* ------------------------------------------------------------------ */
  /*  Connected                                                         */
  /* ------------------------------------------------------------------ */

  private async runEpoch(
    connection: DuplexConnection,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<LoopExit> {
    // Slack calls carry no timeout, so a frame still in flight is abandoned
    // rather than awaited once shutdown is requested.
    let onAbort: () => void = () => {};
    const aborted = new Promise<LoopExit>((resolve) => {
      onAbort = (): void => {
        log.info('Shutdown requested, closing the stream');
        connection.close().catch((err: unknown) => {
          log.warn({ err }, 'Failed to close the stream on shutdown');
        });
        resolve('aborted');
      };
    });
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([this.receiveLoop(connection, log, signal), aborted]);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async receiveLoop(
    connection: DuplexConnection,
    log: Logger,
    signal: AbortSignal | undefined,
  ): Promise<LoopExit> {
    while (!signal?.aborted) {
      let frame: Frame | null;
      try {
        frame = await connection.receive();
      } catch (err: unknown) {
        log.warn({ err }, 'Stream read failed');
        return 'error';
      }

      if (frame === null) {
        log.info('Stream ended');
        return 'end';
      }

      try {
        const exit = await this.handleFrame(frame, connection, log);
        if (exit !== null) return exit;
      } catch (err: unknown) {
        log.warn({ err }, 'Stream write failed');
        return 'error';
      }
    }

    return 'aborted';
  }

  private async handleFrame(
    frame: Frame,
    connection: DuplexConnection,
    log: Logger,
  ): Promise<LoopExit | null> {
    switch (frame.kind) {
      case 'ping':
        log.debug({ payload: frame.payload.toString('hex') }, 'Send a pong in response to ping');
        await connection.send({ kind: 'pong', payload: frame.payload });
        return null;

      case 'pong':
        log.debug({ payload: frame.payload.toString('hex') }, 'Received a pong');
        return null;

      case 'text': {
        log.debug({ payload: frame.payload }, 'Received a text frame');
        const outcome = await this.handleText(frame.payload, connection, log);
        return outcome === 'disconnect' ? 'disconnect' : null;
      }

      case 'binary':
        log.info({ bytes: frame.payload.length }, 'Ignoring binary frame');
        return null;

      case 'close':
        log.info({ code: frame.code, reason: frame.reason }, 'Received a close frame');
        return 'close';
    }
  }

  private async handleText(
    text: string,
    connection: DuplexConnection,
    log: Logger,
  ): Promise<'continue' | 'disconnect'> {
    let event: InboundEvent;
    try {
      event = decodeInboundEvent(text);
    } catch (err: unknown) {
      if (!(err instanceof DecodeError)) throw err;
      log.warn({ err, issues: err.issues }, 'Skipping undecodable frame');
      this.deps.status.decodeFailed(err.message);
      return 'continue';
    }

    switch (event.kind) {
      case 'hello':
        log.info({ app_id: event.app_id, num_connections: event.num_connections }, 'Received hello');
        this.deps.status.helloReceived(event.app_id);
        return 'continue';

      case 'disconnect':
        log.info({ reason: event.reason }, 'Disconnect is requested');
        return 'disconnect';

      case 'events_api': {
        const envelopeLog = log.child({ envelope_id: event.envelope_id });
        if (event.retry_attempt !== undefined && event.retry_attempt > 0) {
          envelopeLog.info(
            { retry_attempt: event.retry_attempt, retry_reason: event.retry_reason },
            'Envelope is a redelivery',
          );
        }

        await this.dispatchEnvelope(event.payload, envelopeLog);

        await connection.send({
          kind: 'text',
          payload: encodeAcknowledgment({ envelope_id: event.envelope_id }),
        });
        this.deps.status.envelopeAcknowledged();
        envelopeLog.debug('Sent an acknowledgment');
        return 'continue';
      }
    }
  }

  /** Decode → classify → react for one envelope. Never throws. */
  private async dispatchEnvelope(rawPayload: unknown, log: Logger): Promise<void> {
    let ref: ThreadReference | null;
    try {
      ref = findThreadedMessage(decodeEventsApiPayload(rawPayload), log);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(
        { err, issues: err instanceof DecodeError ? err.issues : undefined },
        'Failed to decode events_api payload',
      );
      this.deps.status.decodeFailed(message);
      return;
    }

    if (ref === null) return;

    const reactionLog = log.child({ channel: ref.channel, message_ts: ref.message_ts });
    try {
      await this.deps.reactor.react(ref, reactionLog);
      this.deps.status.reactionPosted();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      reactionLog.error({ err }, 'Failed to post permalink');
      this.deps.status.reactionFailed(message);
    }
  }
}
