import { readFileSync } from 'node:fs';
import { vi } from 'vitest';
import type { Logger } from 'pino';
import {
  decodeEventsApiPayload,
  decodeInboundEvent,
} from '../src/application/envelope-decoder.js';
import type { EventsApiPayload } from '../src/domain/index.js';

/**
 * Pino-shaped logger whose methods are spies. `child()` returns the same
 * object so context-scoped log lines land on the same spies.
 */
export function fakeLogger(): Logger {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Raw text of a fixture under tests/fixtures/. */
export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

/** Decodes an `events_api` fixture down to its payload. */
export function loadPayloadFixture(name: string): EventsApiPayload {
  const event = decodeInboundEvent(readFixture(name));
  if (event.kind !== 'events_api') {
    throw new Error(`Fixture ${name} is not an events_api envelope (got ${event.kind})`);
  }
  return decodeEventsApiPayload(event.payload);
}
