import { adbCommand, execWithCode } from "../utils/exec.js";
import { delay } from "../utils/delay.js";
import { logger } from "../utils/logger.js";
import {
  POST_TAP_DELAY_MS,
  PRE_TAP_DELAY_MS,
  defaultRandom,
  planSwipeTap,
  randomDelay,
  type RandomSource,
} from "../touch/humanize.js";
import { buildTapEvents, planSendeventTap, toShellScript } from "../touch/sendevent.js";
import type { TapResult } from "../types.js";
import {
  getScreenResolution,
  getTouchDevice,
  getTouchRange,
  isDeviceRooted,
} from "./device-info.js";

export type RealTapMethod = "auto" | "sendevent" | "swipe";

export interface RealTapOptions {
  deviceId?: string;
  humanize?: boolean;
  random?: RandomSource;
}

/**
 * Taps by writing raw multi-touch events to the touch panel. Needs root
 * unless `useSu` is false and the shell user can write the input device.
 */
export async function realTapSendevent(
  x: number,
  y: number,
  options: RealTapOptions & { useSu?: boolean } = {},
): Promise<boolean> {
  const { deviceId, humanize = true, useSu = true } = options;
  const random = options.random ?? defaultRandom;

  const touchDevice = await getTouchDevice(deviceId);
  if (!touchDevice) {
    logger.error("Could not find touch input device");
    return false;
  }
  logger.debug(`Touch device: ${touchDevice}`);

  const screen = await getScreenResolution(deviceId);
  const range = await getTouchRange(touchDevice, deviceId);
  logger.debug(
    `Screen ${screen.width}x${screen.height}, touch range X 0-${range.xMax} Y 0-${range.yMax}`,
  );

  const plan = planSendeventTap({ x, y }, screen, range, { humanize, random });
  logger.debug(
    `Tap at screen (${x}, ${y}) -> touch (${plan.down.x}, ${plan.down.y}), pressure ${plan.pressure}, size ${plan.touchMajor}`,
  );

  const script = toShellScript(buildTapEvents(touchDevice, plan));

  if (humanize) await delay(randomDelay(PRE_TAP_DELAY_MS.sendevent, random));

  const command = useSu
    ? adbCommand(deviceId, `shell "su -c '${script}'"`)
    : adbCommand(deviceId, `shell "${script}"`);
  const result = await execWithCode(command);
  if (result.code !== 0) {
    logger.error(`sendevent tap failed: ${result.stderr.trim()}`);
    return false;
  }

  if (humanize) await delay(randomDelay(POST_TAP_DELAY_MS, random));
  logger.debug("Tap completed (sendevent method)");
  return true;
}

/**
 * Taps with a very short `input swipe`, which reads closer to a finger than
 * `input tap`. Works without root.
 */
export async function realTapSwipe(
  x: number,
  y: number,
  options: RealTapOptions = {},
): Promise<boolean> {
  const { deviceId, humanize = true } = options;
  const random = options.random ?? defaultRandom;

  const plan = planSwipeTap({ x, y }, { humanize, random });
  logger.debug(
    `Tap at (${plan.start.x}, ${plan.start.y}) using swipe method, end (${plan.end.x}, ${plan.end.y}), ${plan.durationMs}ms`,
  );

  if (humanize) await delay(randomDelay(PRE_TAP_DELAY_MS.swipe, random));

  const result = await execWithCode(
    adbCommand(
      deviceId,
      `shell input swipe ${plan.start.x} ${plan.start.y} ${plan.end.x} ${plan.end.y} ${plan.durationMs}`,
    ),
  );
  if (result.code !== 0) {
    logger.error(`swipe tap failed: ${result.stderr.trim()}`);
    return false;
  }

  if (humanize) await delay(randomDelay(POST_TAP_DELAY_MS, random));
  logger.debug("Tap completed (swipe method)");
  return true;
}

/**
 * Taps with the least detectable method available: sendevent on rooted
 * devices, a short swipe otherwise. `method` forces one of them.
 */
export async function realTap(
  x: number,
  y: number,
  options: RealTapOptions & { method?: RealTapMethod } = {},
): Promise<TapResult> {
  const method = options.method ?? "auto";

  if (method === "sendevent") {
    return { success: await realTapSendevent(x, y, { ...options, useSu: true }), method };
  }
  if (method === "swipe") {
    return { success: await realTapSwipe(x, y, options), method };
  }

  const rooted = await isDeviceRooted(options.deviceId);
  logger.debug(`Device root status: ${rooted ? "rooted" : "not rooted"}`);

  if (rooted) {
    return {
      success: await realTapSendevent(x, y, { ...options, useSu: true }),
      method: "sendevent",
    };
  }
  return { success: await realTapSwipe(x, y, options), method: "swipe" };
}
