import type { Point, ScreenResolution, TouchRange } from "../types.js";
import { clamp, defaultRandom, type RandomSource } from "./humanize.js";

// Linux input event types and codes (linux/input-event-codes.h)
export const EV_SYN = 0;
export const EV_KEY = 1;
export const EV_ABS = 3;
export const SYN_REPORT = 0;
export const BTN_TOUCH = 330;
export const ABS_MT_TOUCH_MAJOR = 48;
export const ABS_MT_POSITION_X = 53;
export const ABS_MT_POSITION_Y = 54;
export const ABS_MT_TRACKING_ID = 57;
export const ABS_MT_PRESSURE = 58;

export const DEFAULT_TOUCH_RANGE: TouchRange = {
  xMin: 0,
  xMax: 32767,
  yMin: 0,
  yMax: 32767,
  pressureMax: 255,
  touchMajorMax: 255,
};

export interface SendeventTapPlan {
  /** Touch-down position in touch-panel units. */
  down: Point;
  /** Optional drift while the finger is down, in touch-panel units. */
  move?: Point;
  pressure: number;
  touchMajor: number;
}

/** Maps screen pixels to the touch panel's coordinate space. */
export function toTouchPoint(
  point: Point,
  screen: ScreenResolution,
  range: TouchRange,
): Point {
  return {
    x: Math.trunc((point.x * range.xMax) / screen.width),
    y: Math.trunc((point.y * range.yMax) / screen.height),
  };
}

// Pixel offset scaled into panel units, rounded toward negative infinity.
function scaleOffset(pixels: number, axisMax: number, screenAxis: number): number {
  return Math.floor((pixels * axisMax) / screenAxis);
}

export function planSendeventTap(
  point: Point,
  screen: ScreenResolution,
  range: TouchRange,
  options: { humanize: boolean; random?: RandomSource },
): SendeventTapPlan {
  const touch = toTouchPoint(point, screen, range);

  if (!options.humanize) {
    return {
      down: touch,
      pressure: range.pressureMax,
      touchMajor: Math.floor(range.touchMajorMax / 2),
    };
  }

  const random = options.random ?? defaultRandom;
  const down = {
    x: clamp(touch.x + scaleOffset(random.int(-3, 3), range.xMax, screen.width), 0, range.xMax),
    y: clamp(touch.y + scaleOffset(random.int(-3, 3), range.yMax, screen.height), 0, range.yMax),
  };
  const pressure = random.int(Math.floor(range.pressureMax * 0.7), range.pressureMax);
  const touchMajor = random.int(
    Math.floor(range.touchMajorMax * 0.3),
    Math.floor(range.touchMajorMax * 0.6),
  );

  const plan: SendeventTapPlan = { down, pressure, touchMajor };

  // Most real taps drift a little before lift-off.
  if (random.next() > 0.3) {
    plan.move = {
      x: clamp(down.x + scaleOffset(random.int(-2, 2), range.xMax, screen.width), 0, range.xMax),
      y: clamp(down.y + scaleOffset(random.int(-2, 2), range.yMax, screen.height), 0, range.yMax),
    };
  }

  return plan;
}

function sendevent(devicePath: string, type: number, code: number, value: number): string {
  return `sendevent ${devicePath} ${type} ${code} ${value}`;
}

/**
 * Expands a tap plan into the multi-touch protocol B event sequence:
 * touch-down, optional move, touch-up.
 */
export function buildTapEvents(devicePath: string, plan: SendeventTapPlan): string[] {
  const events = [
    sendevent(devicePath, EV_ABS, ABS_MT_TRACKING_ID, 0),
    sendevent(devicePath, EV_ABS, ABS_MT_POSITION_X, plan.down.x),
    sendevent(devicePath, EV_ABS, ABS_MT_POSITION_Y, plan.down.y),
    sendevent(devicePath, EV_ABS, ABS_MT_TOUCH_MAJOR, plan.touchMajor),
    sendevent(devicePath, EV_ABS, ABS_MT_PRESSURE, plan.pressure),
    sendevent(devicePath, EV_KEY, BTN_TOUCH, 1),
    sendevent(devicePath, EV_SYN, SYN_REPORT, 0),
  ];

  if (plan.move) {
    events.push(
      sendevent(devicePath, EV_ABS, ABS_MT_POSITION_X, plan.move.x),
      sendevent(devicePath, EV_ABS, ABS_MT_POSITION_Y, plan.move.y),
      sendevent(devicePath, EV_SYN, SYN_REPORT, 0),
    );
  }

  events.push(
    sendevent(devicePath, EV_ABS, ABS_MT_TRACKING_ID, -1),
    sendevent(devicePath, EV_KEY, BTN_TOUCH, 0),
    sendevent(devicePath, EV_SYN, SYN_REPORT, 0),
  );

  return events;
}

// One shell invocation keeps the events back to back on the device.
export function toShellScript(events: string[]): string {
  return events.join(" && ");
}
