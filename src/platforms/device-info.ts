import { adbCommand, exec, execWithCode } from "../utils/exec.js";
import { DEFAULT_TOUCH_RANGE } from "../touch/sendevent.js";
import type { ScreenResolution, TouchInfo, TouchRange } from "../types.js";

export const FALLBACK_RESOLUTION: ScreenResolution = { width: 1080, height: 2400 };

interface DeviceProbes {
  rooted?: boolean;
  touchDevice?: string;
  resolution?: ScreenResolution;
}

// Probe results per device id ("" for the default device), kept for the
// lifetime of the process.
const cache = new Map<string, DeviceProbes>();

function probesFor(deviceId?: string): DeviceProbes {
  const key = deviceId ?? "";
  let entry = cache.get(key);
  if (!entry) {
    entry = {};
    cache.set(key, entry);
  }
  return entry;
}

export function clearDeviceCache(): void {
  cache.clear();
}

export async function isDeviceRooted(deviceId?: string): Promise<boolean> {
  const probes = probesFor(deviceId);
  if (probes.rooted !== undefined) return probes.rooted;

  const result = await execWithCode(adbCommand(deviceId, "shell su -c id"));
  probes.rooted = result.code === 0 && result.stdout.includes("uid=0");
  return probes.rooted;
}

// "add device 3: /dev/input/event2" → "/dev/input/event2"
function parseAddDeviceLine(line: string): string | undefined {
  if (!line.startsWith("add device")) return undefined;
  const parts = line.split(":");
  if (parts.length < 2) return undefined;
  const path = parts[1].trim();
  return path || undefined;
}

/**
 * Finds the input device that reports multi-touch X positions in
 * `getevent -pl` output.
 */
export function parseTouchDevice(output: string): string | undefined {
  let current: string | undefined;
  for (const line of output.split("\n")) {
    const added = parseAddDeviceLine(line);
    if (added !== undefined) {
      current = added;
    } else if (line.includes("ABS_MT_POSITION_X") && current) {
      return current;
    }
  }
  return undefined;
}

// "ABS_MT_POSITION_X : value 0, min 0, max 1079, fuzz 0, ..." → 1079
function parseMax(line: string): number | undefined {
  for (const field of line.split(",")) {
    const match = field.trim().match(/^max\s+(-?\d+)$/);
    if (match) return parseInt(match[1], 10);
  }
  return undefined;
}

/**
 * Reads the coordinate, pressure and contact-size ranges of `devicePath`
 * from `getevent -pl` output. Axes the device does not report keep their
 * defaults.
 */
export function parseTouchRange(output: string, devicePath: string): TouchRange {
  const range: TouchRange = { ...DEFAULT_TOUCH_RANGE };
  const axes: Array<[string, keyof TouchRange]> = [
    ["ABS_MT_POSITION_X", "xMax"],
    ["ABS_MT_POSITION_Y", "yMax"],
    ["ABS_MT_PRESSURE", "pressureMax"],
    ["ABS_MT_TOUCH_MAJOR", "touchMajorMax"],
  ];

  let inTarget = false;
  for (const line of output.split("\n")) {
    const added = parseAddDeviceLine(line);
    if (added !== undefined) {
      if (inTarget) break;
      inTarget = added === devicePath;
      continue;
    }
    if (!inTarget) continue;

    for (const [label, key] of axes) {
      if (!line.includes(label)) continue;
      const max = parseMax(line);
      if (max !== undefined) range[key] = max;
      break;
    }
  }

  return range;
}

export async function getTouchDevice(deviceId?: string): Promise<string | undefined> {
  const probes = probesFor(deviceId);
  if (probes.touchDevice) return probes.touchDevice;

  const output = await exec(adbCommand(deviceId, "shell getevent -pl"));
  const touchDevice = parseTouchDevice(output);
  if (touchDevice) probes.touchDevice = touchDevice;
  return touchDevice;
}

export async function getTouchRange(
  devicePath: string,
  deviceId?: string,
): Promise<TouchRange> {
  const output = await exec(adbCommand(deviceId, "shell getevent -pl"));
  return parseTouchRange(output, devicePath);
}

/**
 * Parses `wm size` output ("Physical size: 1080x2400"). The first size line
 * wins, so a physical size is preferred over a later override.
 */
export function parseScreenResolution(output: string): ScreenResolution | undefined {
  for (const line of output.split("\n")) {
    if (!line.toLowerCase().includes("size")) continue;
    const parts = line.split(":");
    if (parts.length < 2) continue;
    const match = parts[1].trim().match(/^(\d+)x(\d+)$/);
    if (!match) continue;
    const width = parseInt(match[1], 10);
    const height = parseInt(match[2], 10);
    if (width > 0 && height > 0) return { width, height };
  }
  return undefined;
}

export async function getScreenResolution(deviceId?: string): Promise<ScreenResolution> {
  const probes = probesFor(deviceId);
  if (probes.resolution) return probes.resolution;

  const output = await exec(adbCommand(deviceId, "shell wm size"));
  const parsed = parseScreenResolution(output);
  if (!parsed) return { ...FALLBACK_RESOLUTION };
  probes.resolution = parsed;
  return parsed;
}

export async function getTouchInfo(deviceId?: string): Promise<TouchInfo> {
  const rooted = await isDeviceRooted(deviceId);
  const resolution = await getScreenResolution(deviceId);
  const touchDevice = await getTouchDevice(deviceId);
  const touchRange = touchDevice ? await getTouchRange(touchDevice, deviceId) : undefined;

  return {
    rooted,
    resolution,
    touchDevice,
    touchRange,
    recommendedMethod: rooted ? "sendevent" : "swipe",
  };
}
