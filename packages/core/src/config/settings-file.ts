import { isRecord } from "../json.js";
import type { SettingsMap } from "./configuration-service.js";

export const SETTINGS_KEY_SEPARATOR = ":";

export class SettingsFileError extends Error {
  readonly source: string;

  constructor(input: { source: string; message?: string; cause?: unknown }) {
    super(input.message ?? `Unable to read settings from ${input.source}`, { cause: input.cause });
    this.name = "SettingsFileError";
    this.source = input.source;
  }
}

function collect(prefix: string, value: Record<string, unknown>, into: Record<string, string>): void {
  for (const [key, child] of Object.entries(value)) {
    const path = prefix ? `${prefix}${SETTINGS_KEY_SEPARATOR}${key}` : key;
    if (typeof child === "string") {
      into[path] = child;
    } else if (typeof child === "number" || typeof child === "boolean") {
      into[path] = String(child);
    } else if (isRecord(child)) {
      collect(path, child, into);
    }
  }
}

/**
 * Flattens nested sections into `Section:Key` entries, the shape the configuration
 * service reads overrides in. Nulls and arrays carry no setting and are skipped.
 */
export function flattenSettings(document: unknown): Record<string, string> {
  const flattened: Record<string, string> = {};
  if (isRecord(document)) {
    collect("", document, flattened);
  }
  return flattened;
}

export function parseSettingsDocument(text: string, source = "settings"): SettingsMap {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SettingsFileError({
      source,
      message: `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error
    });
  }
  return flattenSettings(parsed);
}
