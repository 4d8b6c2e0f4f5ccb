export interface Device {
  id: string;
  name: string;
  status: string;
}

export interface Point {
  x: number;
  y: number;
}

export interface ScreenResolution {
  width: number;
  height: number;
}

/** Coordinate and force ranges reported by a touch input device. */
export interface TouchRange {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
  pressureMax: number;
  touchMajorMax: number;
}

export type TapMethod = "sendevent" | "swipe" | "input";

export interface TapResult {
  success: boolean;
  method: TapMethod;
}

export interface TouchInfo {
  rooted: boolean;
  resolution: ScreenResolution;
  touchDevice?: string;
  touchRange?: TouchRange;
  recommendedMethod: Exclude<TapMethod, "input">;
}

export class AdbCommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    command: string,
    message: string,
    exitCode: number | null = null,
    stderr = "",
  ) {
    super(`Command failed: ${command}\n${message}`);
    this.name = "AdbCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
