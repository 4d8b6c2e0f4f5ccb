import { z } from "zod";
import appsJson from "./apps.json";

const appsSchema = z.record(z.string().min(1), z.string().regex(/^[\w.]+$/));

// App display name → Android package name. Order matters for lookups by
// package: the first entry whose package appears in a line wins.
export const APP_PACKAGES: Readonly<Record<string, string>> =
  appsSchema.parse(appsJson);

export function getAppPackage(appName: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(APP_PACKAGES, appName)
    ? APP_PACKAGES[appName]
    : undefined;
}

/**
 * Returns the name of the first known app whose package occurs in `text`.
 */
export function findAppByPackageIn(text: string): string | undefined {
  for (const [name, pkg] of Object.entries(APP_PACKAGES)) {
    if (text.includes(pkg)) return name;
  }
  return undefined;
}

export function listApps(): Array<{ name: string; package: string }> {
  return Object.entries(APP_PACKAGES).map(([name, pkg]) => ({
    name,
    package: pkg,
  }));
}
