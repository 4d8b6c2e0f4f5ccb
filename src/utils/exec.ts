import { exec as cpExec } from "child_process";
import { getConfig } from "../config/index.js";
import { AdbCommandError } from "../types.js";
import { logger } from "./logger.js";

export interface ExecOptions {
  timeout?: number;
  maxBuffer?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
}

const DEFAULT_MAX_BUFFER = 10 * 1024 * 1024; // 10 MB

/**
 * Builds an adb command line. Without a device id adb targets the only
 * attached device.
 */
export function adbCommand(deviceId: string | undefined, args: string): string {
  const { adbPath } = getConfig();
  return deviceId ? `${adbPath} -s ${deviceId} ${args}` : `${adbPath} ${args}`;
}

export function exec(command: string, options?: ExecOptions): Promise<string> {
  const timeout = options?.timeout ?? getConfig().adbTimeoutMs;
  const maxBuffer = options?.maxBuffer ?? DEFAULT_MAX_BUFFER;

  logger.debug(`exec: ${command}`);
  return new Promise((resolve, reject) => {
    cpExec(command, { timeout, maxBuffer }, (error, stdout, stderr) => {
      if (error) {
        const msg = stderr?.trim() || error.message;
        reject(new AdbCommandError(command, msg, error.code ?? null, stderr));
        return;
      }
      resolve(stdout);
    });
  });
}

/**
 * Like exec, but a non-zero exit is reported through `code` instead of a
 * rejection. Only spawn failures and timeouts reject.
 */
export function execWithCode(
  command: string,
  options?: ExecOptions,
): Promise<ExecResult> {
  const timeout = options?.timeout ?? getConfig().adbTimeoutMs;
  const maxBuffer = options?.maxBuffer ?? DEFAULT_MAX_BUFFER;

  logger.debug(`exec: ${command}`);
  return new Promise((resolve, reject) => {
    cpExec(command, { timeout, maxBuffer }, (error, stdout, stderr) => {
      if (error && (error.killed || typeof error.code !== "number")) {
        reject(
          new AdbCommandError(command, stderr?.trim() || error.message, null, stderr),
        );
        return;
      }
      resolve({ stdout, stderr, code: error?.code ?? 0 });
    });
  });
}
