import { z } from "zod";

const delayMs = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  ADB_PATH: z.string().min(1).default("adb"),
  ADB_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  ANDROID_TAP_DELAY_MS: delayMs(1000),
  ANDROID_DOUBLE_TAP_DELAY_MS: delayMs(1000),
  ANDROID_DOUBLE_TAP_INTERVAL_MS: delayMs(100),
  ANDROID_LONG_PRESS_DELAY_MS: delayMs(1000),
  ANDROID_SWIPE_DELAY_MS: delayMs(1000),
  ANDROID_BACK_DELAY_MS: delayMs(1000),
  ANDROID_HOME_DELAY_MS: delayMs(1000),
  ANDROID_LAUNCH_DELAY_MS: delayMs(1000),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface DeviceTiming {
  tapDelayMs: number;
  doubleTapDelayMs: number;
  doubleTapIntervalMs: number;
  longPressDelayMs: number;
  swipeDelayMs: number;
  backDelayMs: number;
  homeDelayMs: number;
  launchDelayMs: number;
}

export interface Config {
  adbPath: string;
  adbTimeoutMs: number;
  logLevel: LogLevel;
  timing: DeviceTiming;
}

/**
 * Builds the runtime configuration from environment variables.
 * Throws when a variable is set to a value the schema rejects.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    adbPath: e.ADB_PATH,
    adbTimeoutMs: e.ADB_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
    timing: {
      tapDelayMs: e.ANDROID_TAP_DELAY_MS,
      doubleTapDelayMs: e.ANDROID_DOUBLE_TAP_DELAY_MS,
      doubleTapIntervalMs: e.ANDROID_DOUBLE_TAP_INTERVAL_MS,
      longPressDelayMs: e.ANDROID_LONG_PRESS_DELAY_MS,
      swipeDelayMs: e.ANDROID_SWIPE_DELAY_MS,
      backDelayMs: e.ANDROID_BACK_DELAY_MS,
      homeDelayMs: e.ANDROID_HOME_DELAY_MS,
      launchDelayMs: e.ANDROID_LAUNCH_DELAY_MS,
    },
  };
}

let cached: Config | undefined;

export function getConfig(): Config {
  if (!cached) cached = loadConfig();
  return cached;
}

// Drops the cached config so the next getConfig() re-reads the environment.
export function resetConfig(): void {
  cached = undefined;
}
