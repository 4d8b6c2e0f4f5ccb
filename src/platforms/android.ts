import { adbCommand, exec } from "../utils/exec.js";
import { delay } from "../utils/delay.js";
import { logger } from "../utils/logger.js";
import { getConfig } from "../config/index.js";
import { findAppByPackageIn, getAppPackage } from "../config/apps.js";
import type { RandomSource } from "../touch/humanize.js";
import type { Device, TapMethod } from "../types.js";
import { getScreenResolution, isDeviceRooted } from "./device-info.js";
import { realTapSendevent } from "./real-tap.js";

export interface ActionOptions {
  deviceId?: string;
  /** Pause after the action. Defaults to the configured delay for it. */
  delayMs?: number;
}

export async function listDevices(): Promise<Device[]> {
  const output = await exec(adbCommand(undefined, "devices -l"));
  const lines = output.trim().split("\n").slice(1); // skip header

  const devices: Device[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("*")) continue;

    const parts = trimmed.split(/\s+/);
    const id = parts[0];
    const status = parts[1] ?? "unknown";

    // Extract model name from "model:XXX" token
    const modelToken = parts.find((p) => p.startsWith("model:"));
    const name = modelToken ? modelToken.split(":")[1] : id;

    devices.push({ id, name, status });
  }

  return devices;
}

/**
 * Taps at (x, y). On rooted devices a humanized sendevent tap is tried
 * first; `input tap` is the fallback.
 */
export async function tap(
  x: number,
  y: number,
  options: ActionOptions & { useSendevent?: boolean; random?: RandomSource } = {},
): Promise<TapMethod> {
  const { deviceId, useSendevent = true } = options;
  const pause = options.delayMs ?? getConfig().timing.tapDelayMs;

  if (useSendevent && (await isDeviceRooted(deviceId))) {
    let ok = false;
    try {
      ok = await realTapSendevent(x, y, {
        deviceId,
        humanize: true,
        random: options.random,
      });
    } catch (error) {
      logger.warn(
        `sendevent tap error: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (ok) {
      await delay(pause);
      return "sendevent";
    }
    logger.warn("sendevent tap failed, falling back to input tap");
  }

  await exec(adbCommand(deviceId, `shell input tap ${x} ${y}`));
  await delay(pause);
  return "input";
}

export async function doubleTap(
  x: number,
  y: number,
  options: ActionOptions = {},
): Promise<void> {
  const { timing } = getConfig();
  const cmd = adbCommand(options.deviceId, `shell input tap ${x} ${y}`);

  await exec(cmd);
  await delay(timing.doubleTapIntervalMs);
  await exec(cmd);
  await delay(options.delayMs ?? timing.doubleTapDelayMs);
}

export async function longPress(
  x: number,
  y: number,
  durationMs: number = 3000,
  options: ActionOptions = {},
): Promise<void> {
  // Swipe from point to same point = long press
  await exec(
    adbCommand(options.deviceId, `shell input swipe ${x} ${y} ${x} ${y} ${durationMs}`),
  );
  await delay(options.delayMs ?? getConfig().timing.longPressDelayMs);
}

/**
 * Default swipe duration: squared distance / 1000, kept within 1-2 s.
 */
export function swipeDuration(
  startX: number,
  startY: number,
  endX: number,
  endY: number,
): number {
  const distSq = (startX - endX) ** 2 + (startY - endY) ** 2;
  return Math.max(1000, Math.min(Math.trunc(distSq / 1000), 2000));
}

export async function swipe(
  startX: number,
  startY: number,
  endX: number,
  endY: number,
  durationMs?: number,
  options: ActionOptions = {},
): Promise<number> {
  const duration = durationMs ?? swipeDuration(startX, startY, endX, endY);
  await exec(
    adbCommand(
      options.deviceId,
      `shell input swipe ${startX} ${startY} ${endX} ${endY} ${duration}`,
    ),
  );
  await delay(options.delayMs ?? getConfig().timing.swipeDelayMs);
  return duration;
}

export async function back(options: ActionOptions = {}): Promise<void> {
  await exec(adbCommand(options.deviceId, "shell input keyevent 4"));
  await delay(options.delayMs ?? getConfig().timing.backDelayMs);
}

export async function home(options: ActionOptions = {}): Promise<void> {
  await exec(adbCommand(options.deviceId, "shell input keyevent KEYCODE_HOME"));
  await delay(options.delayMs ?? getConfig().timing.homeDelayMs);
}

export const KEYCODE_MAP = {
  home: 3,
  back: 4,
  enter: 66,
  delete: 67,
  volume_up: 24,
  volume_down: 25,
  power: 26,
  tab: 61,
  recent_apps: 187,
  sleep: 223,
  wakeup: 224,
} as const;

export type KeyName = keyof typeof KEYCODE_MAP;

function isKeyName(key: string): key is KeyName {
  return Object.prototype.hasOwnProperty.call(KEYCODE_MAP, key);
}

/**
 * Sends a named key. Keys have no configured pause; `delayMs` adds one.
 */
export async function pressKey(key: string, options: ActionOptions = {}): Promise<void> {
  if (!isKeyName(key)) {
    throw new Error(
      `Unknown key: ${key}. Supported keys: ${Object.keys(KEYCODE_MAP).join(", ")}`,
    );
  }
  await exec(adbCommand(options.deviceId, `shell input keyevent ${KEYCODE_MAP[key]}`));
  if (options.delayMs !== undefined) await delay(options.delayMs);
}

export function isScreenOn(dumpsysPower: string): boolean {
  return (
    dumpsysPower.includes("mWakefulness=Awake") ||
    dumpsysPower.includes("Display Power: state=ON")
  );
}

export function isLockScreenShowing(dumpsysWindow: string): boolean {
  return (
    dumpsysWindow.includes("mDreamingLockscreen=true") ||
    dumpsysWindow.includes("isStatusBarKeyguard=true")
  );
}

/**
 * Wakes the screen. Resolves false when it was already on.
 */
export async function wakeScreen(deviceId?: string): Promise<boolean> {
  const power = await exec(adbCommand(deviceId, "shell dumpsys power"));
  if (isScreenOn(power)) {
    logger.info("Screen is already on");
    return false;
  }

  await exec(adbCommand(deviceId, "shell input keyevent KEYCODE_WAKEUP"));
  await delay(500);
  logger.info("Screen woken up");
  return true;
}

/**
 * Turns the screen off. Resolves false when it was already off.
 */
export async function sleepScreen(deviceId?: string): Promise<boolean> {
  const power = await exec(adbCommand(deviceId, "shell dumpsys power"));
  if (!isScreenOn(power)) {
    logger.info("Screen is already off");
    return false;
  }

  await exec(adbCommand(deviceId, "shell input keyevent KEYCODE_SLEEP"));
  await delay(300);
  logger.info("Screen turned off");
  return true;
}

/**
 * Wakes the device and swipes away a swipe-only lock screen. PIN, pattern
 * and password locks are left alone. Resolves false when the device was
 * not locked.
 */
export async function unlockScreen(
  options: { deviceId?: string; swipeUp?: boolean } = {},
): Promise<boolean> {
  const { deviceId, swipeUp = true } = options;

  await wakeScreen(deviceId);
  await delay(300);

  const window = await exec(adbCommand(deviceId, "shell dumpsys window"));
  if (!isLockScreenShowing(window)) {
    logger.info("Screen is already unlocked");
    return false;
  }

  const { width, height } = await getScreenResolution(deviceId);
  const [sx, sy, ex, ey] = swipeUp
    ? [Math.floor(width / 2), Math.trunc(height * 0.85), Math.floor(width / 2), Math.trunc(height * 0.3)]
    : [Math.trunc(width * 0.2), Math.floor(height / 2), Math.trunc(width * 0.8), Math.floor(height / 2)];

  await exec(adbCommand(deviceId, `shell input swipe ${sx} ${sy} ${ex} ${ey} 300`));
  await delay(500);
  logger.info("Unlock swipe performed");
  return true;
}

/**
 * Launches a known app by display name. Resolves false for names missing
 * from the app map.
 */
export async function launchApp(
  appName: string,
  options: ActionOptions = {},
): Promise<boolean> {
  const pkg = getAppPackage(appName);
  if (!pkg) return false;

  await exec(
    adbCommand(
      options.deviceId,
      `shell monkey -p ${pkg} -c android.intent.category.LAUNCHER 1`,
    ),
  );
  await delay(options.delayMs ?? getConfig().timing.launchDelayMs);
  return true;
}

export const HOME_APP_NAME = "System Home";

/**
 * Name of the focused app from `dumpsys window`, or "System Home" when the
 * focused package is not a known app.
 */
export function parseCurrentApp(dumpsysWindow: string): string {
  for (const line of dumpsysWindow.split("\n")) {
    if (!line.includes("mCurrentFocus") && !line.includes("mFocusedApp")) continue;
    const app = findAppByPackageIn(line);
    if (app) return app;
  }
  return HOME_APP_NAME;
}

export async function getCurrentApp(deviceId?: string): Promise<string> {
  const output = await exec(adbCommand(deviceId, "shell dumpsys window"));
  return parseCurrentApp(output);
}
