import * as Sentry from "@sentry/node";

let enabled = false;

/** Initialise error reporting when SENTRY_DSN is set; a no-op otherwise. */
export function initSentry(env: NodeJS.ProcessEnv = process.env): boolean {
  if (!env.SENTRY_DSN) return false;
  Sentry.init({
    dsn: env.SENTRY_DSN,
    tracesSampleRate: 1.0,
    environment: env.NODE_ENV,
  });
  enabled = true;
  return true;
}

export function reportError(error: unknown, entity?: string): void {
  if (!enabled) return;
  Sentry.captureException(error, entity ? { tags: { entity } } : undefined);
}

/** Wait for queued events before the process exits. */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.flush(timeoutMs);
}
