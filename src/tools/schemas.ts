import { z } from "zod";

export const deviceId = z
  .string()
  .optional()
  .describe("Device ID. Omit when a single device is attached.");

export const coordinate = z.number().int().nonnegative();

export const delayMs = z
  .number()
  .int()
  .nonnegative()
  .optional()
  .describe("Ms to wait after the action. Defaults to the configured delay.");
