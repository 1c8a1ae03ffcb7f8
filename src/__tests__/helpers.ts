import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

// Whole seconds, so the copied timestamp compares exactly
export const SOURCE_MTIME = 1_700_000_000;

export function tmpDir(prefix = "gzip-static-test"): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function writeSized(filePath: string, size: number, mtime = SOURCE_MTIME): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "x".repeat(size));
  await fs.utimes(filePath, mtime, mtime);
}

/**
 * Writes a shell-script compressor that logs its last argument to `logPath`
 * and copies it to `<arg>.gz`, or exits with `exitCode` when one is given.
 */
export async function writeFakeCompressor(
  dir: string,
  name: string,
  logPath: string,
  exitCode?: number,
): Promise<string> {
  const scriptPath = path.join(dir, name);
  const action = exitCode === undefined ? 'cp "$last" "$last.gz"' : `exit ${exitCode}`;
  const script = [
    "#!/bin/sh",
    'for last; do :; done',
    `echo "$*" >> "${logPath}"`,
    action,
    "",
  ].join("\n");
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(scriptPath, script, { mode: 0o755 });
  return scriptPath;
}

export async function readLog(logPath: string): Promise<string[]> {
  try {
    const content = await fs.readFile(logPath, "utf8");
    return content.split("\n").filter((line) => line.length > 0);
  } catch {
    return [];
  }
}

export async function exists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const result: T[] = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}
