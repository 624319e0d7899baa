/**
 * .env file writer
 *
 * Updates one KEY=value line in a key-value text file, leaving every other
 * line untouched. Used to persist a rotated OAuth refresh token so the next
 * run starts from it.
 */

import { readFile, rename, writeFile } from "fs/promises";

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

interface EnvFileContent {
  lines: string[];
  eol: string;
}

async function readLines(filePath: string): Promise<EnvFileContent> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return { lines: [], eol: "\n" };
    }
    throw error;
  }

  // Keep the file's own line ending when writing it back
  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return { lines, eol };
}

/**
 * Replace a key's line with the new content or append it when absent
 */
export function replaceEnvLine(lines: string[], key: string, value: string): string[] {
  const prefix = `${key}=`;
  let found = false;

  const out = lines.map((line) => {
    if (line.startsWith(prefix)) {
      found = true;
      return `${key}=${value}`;
    }
    return line;
  });

  if (!found) {
    out.push(`${key}=${value}`);
  }
  return out;
}

/**
 * Update (or append) KEY=value in a .env file
 *
 * Writes `<file>.tmp` and renames it over the original so a crash never
 * leaves a truncated file behind. A missing file is created.
 *
 * @param filePath - Path of the .env file
 * @param key - Variable name
 * @param value - New value
 */
export async function updateEnvKey(filePath: string, key: string, value: string): Promise<void> {
  const { lines, eol } = await readLines(filePath);
  const out = replaceEnvLine(lines, key, value);

  const tmpPath = `${filePath}.tmp`;
  await writeFile(tmpPath, out.join(eol) + eol, "utf8");
  await rename(tmpPath, filePath);
}
