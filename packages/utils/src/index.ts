export type LogLevel = "debug" | "info" | "warn" | "error";

export interface StructuredLog {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

export const formatStructuredLog = (entry: StructuredLog): string => {
  const base = {
    ...entry,
    timestamp: new Date().toISOString()
  };
  return JSON.stringify(base);
};

export const writeStructuredLog = (entry: StructuredLog): void => {
  const stream = entry.level === "error" ? process.stderr : process.stdout;
  stream.write(formatStructuredLog(entry) + "\n");
};

export type RasterizerKind = "bitmap" | "skia";

export interface RuntimeConfig {
  port: number;
  fontsDir: string;
  defaultFont?: string;
  rasterizer: RasterizerKind;
  headlineScale: number;
  sentryDsn?: string;
}

const trimToUndefined = (value: string | undefined): string | undefined => {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const parsePositiveInt = (
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number => {
  const raw = trimToUndefined(env[key]);
  if (raw === undefined) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer.`);
  }

  return parsed;
};

const parseRasterizer = (value: string | undefined): RasterizerKind => {
  const normalized = (trimToUndefined(value) ?? "bitmap").toLowerCase();
  if (normalized !== "bitmap" && normalized !== "skia") {
    throw new Error(`RASTERIZER must be "bitmap" or "skia", got "${normalized}".`);
  }

  return normalized;
};

export const loadRuntimeConfig = (
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig => ({
  port: parsePositiveInt(env, "PORT", 3001),
  fontsDir: trimToUndefined(env.FONTS_DIR) ?? "./fonts",
  defaultFont: trimToUndefined(env.DEFAULT_FONT),
  rasterizer: parseRasterizer(env.RASTERIZER),
  headlineScale: parsePositiveInt(env, "HEADLINE_SCALE", 1000),
  sentryDsn: trimToUndefined(env.SENTRY_DSN)
});
