/** One discrete unit received from the stream. */
export type Frame =
  | { readonly kind: 'ping'; readonly payload: Buffer }
  | { readonly kind: 'pong'; readonly payload: Buffer }
  | { readonly kind: 'text'; readonly payload: string }
  | { readonly kind: 'binary'; readonly payload: Buffer }
  | { readonly kind: 'close'; readonly code?: number | undefined; readonly reason?: string | undefined };

/** Frames this relay ever writes. */
export type OutboundFrame =
  | { readonly kind: 'pong'; readonly payload: Buffer }
  | { readonly kind: 'text'; readonly payload: string };

/**
 * A single owned, bidirectional stream.
 *
 * Only the supervisor's sequential loop touches a connection, so neither
 * side needs locking. `receive()` resolves to `null` once the stream has
 * ended and rejects on a transport error.
 */
export interface DuplexConnection {
  receive(): Promise<Frame | null>;
  send(frame: OutboundFrame): Promise<void>;
  close(): Promise<void>;
}

export type Connector = (url: string) => Promise<DuplexConnection>;
