import type { Logger } from 'pino';

/** How long in-flight work gets after the first signal. */
export const SHUTDOWN_GRACE_MS = 3000;

export interface ShutdownOptions {
  controller: AbortController;
  log: Logger;
  graceMs?: number | undefined;
  exit?: ((code: number) => void) | undefined;
}

/**
 * Builds the SIGINT / SIGTERM handler.
 *
 * The first signal aborts the relay and arms a forced exit after the grace
 * period, since a hung Slack call would otherwise keep the process alive.
 * A second signal exits at once.
 */
export function createShutdownHandler(options: ShutdownOptions): () => void {
  const { controller, log } = options;
  const graceMs = options.graceMs ?? SHUTDOWN_GRACE_MS;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let requested = false;

  return () => {
    if (requested) {
      log.warn('Second shutdown signal, exiting now');
      exit(1);
      return;
    }
    requested = true;

    log.info('Shutting down relay...');
    controller.abort();

    // Unref'd: a clean shutdown exits on its own before this fires.
    setTimeout(() => {
      log.warn({ graceMs }, 'Shutdown grace period elapsed, forcing exit');
      exit(0);
    }, graceMs).unref();
  };
}
