import * as Sentry from "@sentry/node";

let initialized = false;

/** No-op without a DSN, so local runs and tests never report. */
export const initSentry = (dsn: string | undefined): boolean => {
  if (initialized || !dsn) {
    return initialized;
  }

  initialized = true;

  Sentry.init({
    dsn,
    tracesSampleRate: 1.0
  });

  Sentry.setTag("app", "api");
  return true;
};

const toError = (error: unknown): Error => {
  if (error instanceof Error) {
    return error;
  }

  if (typeof error === "string") {
    return new Error(error);
  }

  try {
    return new Error(JSON.stringify(error));
  } catch {
    return new Error("Unknown error");
  }
};

export const captureException = (error: unknown, extra?: Record<string, unknown>): void => {
  if (!initialized) {
    return;
  }

  const err = toError(error);
  if (extra) {
    Sentry.captureException(err, { extra });
    return;
  }

  Sentry.captureException(err);
};

export const flushSentry = async (timeoutMs = 2000): Promise<void> => {
  if (!initialized) {
    return;
  }

  await Sentry.flush(timeoutMs);
};
