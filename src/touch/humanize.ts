import type { Point } from "../types.js";

export interface RandomSource {
  /** Float in [0, 1). */
  next(): number;
  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  /** Float in [min, max). */
  uniform(min: number, max: number): number;
}

export function createRandomSource(next: () => number = Math.random): RandomSource {
  return {
    next,
    int: (min, max) => min + Math.floor(next() * (max - min + 1)),
    uniform: (min, max) => min + next() * (max - min),
  };
}

export const defaultRandom: RandomSource = createRandomSource();

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export interface SwipeTapPlan {
  start: Point;
  end: Point;
  durationMs: number;
}

/**
 * A tap expressed as a very short swipe. Humanized taps land within ±3 px of
 * the target, drift up to ±2 px while down, and last 80-180 ms.
 */
export function planSwipeTap(
  point: Point,
  options: { humanize: boolean; random?: RandomSource },
): SwipeTapPlan {
  if (!options.humanize) {
    return { start: { ...point }, end: { ...point }, durationMs: 100 };
  }

  const random = options.random ?? defaultRandom;
  const x = Math.max(0, point.x + random.int(-3, 3));
  const y = Math.max(0, point.y + random.int(-3, 3));
  const endX = Math.max(0, x + random.int(-2, 2));
  const endY = Math.max(0, y + random.int(-2, 2));
  const durationMs = random.int(80, 180);

  return { start: { x, y }, end: { x: endX, y: endY }, durationMs };
}

export const PRE_TAP_DELAY_MS = {
  sendevent: [50, 150],
  swipe: [50, 200],
} as const;

export const POST_TAP_DELAY_MS = [30, 100] as const;

export function randomDelay(
  range: readonly [number, number],
  random: RandomSource = defaultRandom,
): number {
  return Math.round(random.uniform(range[0], range[1]));
}
