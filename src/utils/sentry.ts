import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize error reporting when a DSN is configured
 */
export function initSentry(dsn: string | undefined, environment: string): boolean {
  if (!dsn) {
    console.log("[Sentry] SENTRY_DSN not set - error reporting disabled");
    return false;
  }

  Sentry.init({ dsn, environment, tracesSampleRate: 0 });
  enabled = true;
  console.log(`[Sentry] Error reporting enabled (${environment})`);
  return true;
}

/**
 * Add a breadcrumb for tracking the flow that led up to an error.
 */
export function addBreadcrumb(
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  Sentry.addBreadcrumb({
    category,
    message,
    data,
    level: "info",
  });
}

export function captureError(err: unknown, context?: Record<string, unknown>) {
  if (!enabled) {
    return;
  }
  Sentry.captureException(err, context ? { extra: context } : undefined);
}
