/**
 * Timezone Options
 *
 * IANA timezone identifiers with display labels, for the Users timezone
 * field. The list lives in timezones.json beside this file.
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { defineOptionProvider, type FieldOptions } from "@schemata/contracts";

export const TIMEZONE_PROVIDER = "timezones";

const TIMEZONES_FILE = fileURLToPath(new URL("./timezones.json", import.meta.url));

const timezoneListSchema = z.record(z.string().min(1), z.string().min(1));

let cached: FieldOptions | null = null;

/** Identifier → label. Read once per process. */
export function timezones(): FieldOptions {
  if (!cached) {
    cached = timezoneListSchema.parse(JSON.parse(fs.readFileSync(TIMEZONES_FILE, "utf8")));
  }
  return { ...cached };
}

export function timezoneLabel(timezone: string): string | null {
  const options = timezones();
  return Object.hasOwn(options, timezone) ? options[timezone] : null;
}

export function isSupportedTimezone(timezone: string): boolean {
  return timezoneLabel(timezone) !== null;
}

export const timezoneOptions = defineOptionProvider(timezones);
