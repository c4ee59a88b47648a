import { readFile } from "node:fs/promises";
import path from "node:path";
import { SettingsFileError, parseSettingsDocument, type SettingsMap } from "@rag-client/core";

export const DEFAULT_SETTINGS_FILE = "appsettings.json";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads the settings override tier. The default `appsettings.json` is optional; a file
 * named explicitly has to exist.
 */
export async function readSettingsFile(input: { filePath?: string; cwd?: string } = {}): Promise<SettingsMap> {
  const cwd = input.cwd ?? process.cwd();
  const explicit = input.filePath !== undefined;
  const relativePath = input.filePath ?? DEFAULT_SETTINGS_FILE;
  const absolutePath = path.resolve(cwd, relativePath);

  let text: string;
  try {
    text = await readFile(absolutePath, "utf-8");
  } catch (error) {
    if (!explicit && isMissingFileError(error)) {
      return {};
    }
    throw new SettingsFileError({
      source: relativePath,
      message: isMissingFileError(error) ? `Settings file not found: ${relativePath}` : undefined,
      cause: error
    });
  }

  return parseSettingsDocument(text, relativePath);
}
