#!/usr/bin/env node

import dotenv from "dotenv";
import { Command, InvalidArgumentError, Option } from "commander";
import { getTouchInfo } from "./platforms/device-info.js";
import { realTap, type RealTapMethod } from "./platforms/real-tap.js";
import type { TouchInfo } from "./types.js";
import { logger } from "./utils/logger.js";

type RealTapCliOptions = {
  info?: boolean;
  x?: number;
  y?: number;
  device?: string;
  verbose?: boolean;
  humanize: boolean;
  method: RealTapMethod;
};

function parseCoordinate(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

export function formatTouchInfo(info: TouchInfo): string {
  const lines = [
    "Device Touch Input Information",
    "",
    `Root status: ${info.rooted ? "rooted (sendevent available)" : "not rooted (using swipe fallback)"}`,
    `Screen resolution: ${info.resolution.width} x ${info.resolution.height}`,
  ];

  if (info.touchDevice && info.touchRange) {
    lines.push(
      `Touch device: ${info.touchDevice}`,
      `  X range: 0 - ${info.touchRange.xMax}`,
      `  Y range: 0 - ${info.touchRange.yMax}`,
      `  Pressure max: ${info.touchRange.pressureMax}`,
      `  Touch major max: ${info.touchRange.touchMajorMax}`,
    );
  } else {
    lines.push("Touch device not found");
  }

  lines.push(
    "",
    `Recommended tap method: ${info.recommendedMethod === "sendevent" ? "sendevent (best anti-detection)" : "swipe (moderate anti-detection)"}`,
  );
  return lines.join("\n");
}

export function buildProgram(): Command {
  return new Command()
    .name("android-real-tap")
    .description("Tap an Android device with touch events that resemble a finger")
    .option("--info", "show device touch info")
    .option("--x <x>", "X coordinate", parseCoordinate)
    .option("--y <y>", "Y coordinate", parseCoordinate)
    .option("-d, --device <id>", "ADB device ID")
    .option("-v, --verbose", "verbose output")
    .option("--no-humanize", "disable human-like variations")
    .addOption(
      new Option("--method <method>", "tap method")
        .choices(["auto", "sendevent", "swipe"])
        .default("auto"),
    )
    .addHelpText(
      "after",
      `
Examples:
  android-real-tap --info
  android-real-tap --x 500 --y 800
  android-real-tap --x 500 --y 800 -v --no-humanize
  android-real-tap --x 500 --y 800 --device emulator-5554`,
    );
}

/**
 * Runs the CLI and resolves the process exit code.
 */
export async function run(argv: string[]): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<RealTapCliOptions>();

  if (opts.verbose) logger.setLevel("debug");

  if (opts.info) {
    console.log(formatTouchInfo(await getTouchInfo(opts.device)));
    return 0;
  }

  if (opts.x === undefined || opts.y === undefined) {
    program.outputHelp();
    console.error("\nError: --x and --y are required for tapping");
    return 1;
  }

  const result = await realTap(opts.x, opts.y, {
    deviceId: opts.device,
    humanize: opts.humanize,
    method: opts.method,
  });
  console.log(
    result.success
      ? `Tap completed (${result.method} method)`
      : `Tap failed (${result.method} method)`,
  );
  return result.success ? 0 : 1;
}

if (require.main === module) {
  dotenv.config();
  run(process.argv)
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error("Fatal error:", error);
      process.exit(1);
    });
}
