export type RelayState = 'handshaking' | 'connected' | 'stopped';

export interface RelayStatusSnapshot {
  readonly state: RelayState;
  /** Number of connections opened so far; 0 before the first one. */
  readonly epoch: number;
  readonly connected_at: string | null; // ISO-8601
  readonly app_id: string | null;
  readonly envelopes_acknowledged: number;
  readonly reactions_posted: number;
  readonly reactions_failed: number;
  readonly decode_failures: number;
  readonly last_error: string | null;
}

const INITIAL: RelayStatusSnapshot = {
  state: 'handshaking',
  epoch: 0,
  connected_at: null,
  app_id: null,
  envelopes_acknowledged: 0,
  reactions_posted: 0,
  reactions_failed: 0,
  decode_failures: 0,
  last_error: null,
};

/**
 * In-memory view of the relay's lifecycle for the health endpoint.
 *
 * Written only by the connection supervisor. Every update swaps in a new
 * frozen snapshot, so readers never see a half-applied change.
 */
export class RelayStatus {
  private snapshot: RelayStatusSnapshot;

  constructor(initial: Partial<RelayStatusSnapshot> = {}) {
    this.snapshot = Object.freeze({ ...INITIAL, ...initial });
  }

  get(): RelayStatusSnapshot {
    return this.snapshot;
  }

  handshaking(): void {
    this.update({ state: 'handshaking', connected_at: null });
  }

  connected(at: Date = new Date()): void {
    this.update({
      state: 'connected',
      epoch: this.snapshot.epoch + 1,
      connected_at: at.toISOString(),
    });
  }

  stopped(): void {
    this.update({ state: 'stopped', connected_at: null });
  }

  helloReceived(appId: string): void {
    this.update({ app_id: appId });
  }

  envelopeAcknowledged(): void {
    this.update({ envelopes_acknowledged: this.snapshot.envelopes_acknowledged + 1 });
  }

  reactionPosted(): void {
    this.update({ reactions_posted: this.snapshot.reactions_posted + 1 });
  }

  reactionFailed(message: string): void {
    this.update({ reactions_failed: this.snapshot.reactions_failed + 1, last_error: message });
  }

  decodeFailed(message: string): void {
    this.update({ decode_failures: this.snapshot.decode_failures + 1, last_error: message });
  }

  private update(patch: Partial<RelayStatusSnapshot>): void {
    this.snapshot = Object.freeze({ ...this.snapshot, ...patch });
  }
}
