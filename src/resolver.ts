import path from "node:path";
import fs from "node:fs/promises";
import fsSync from "node:fs";
import { NoCompressorFoundError } from "./errors.js";
import { splitCommandLine } from "./utils.js";
import type { ResolvedCommand } from "./types.js";

export function searchPathFromEnv(env: NodeJS.ProcessEnv = process.env): string[] {
  const value = env.PATH;
  if (!value) return [];
  return value.split(path.delimiter);
}

export function isDirectPath(program: string): boolean {
  return program.includes("/") || program.startsWith(".");
}

async function isExecutableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return false;
    await fs.access(filePath, fsSync.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locates a program reference. Direct paths are checked as given; bare names
 * are looked up in each search-path directory in turn, an empty entry
 * standing for the current directory. Returns the path to execute, or null.
 */
export async function locateProgram(program: string, searchPath: readonly string[]): Promise<string | null> {
  if (isDirectPath(program)) {
    return (await isExecutableFile(program)) ? program : null;
  }

  for (const dir of searchPath) {
    const candidatePath = path.resolve(dir || ".", program);
    if (await isExecutableFile(candidatePath)) {
      return candidatePath;
    }
  }
  return null;
}

export async function programExists(program: string, searchPath: readonly string[]): Promise<boolean> {
  return (await locateProgram(program, searchPath)) !== null;
}

/**
 * Returns the first available candidate. The program token is replaced by
 * the path it was found at, so the process started later is the one that
 * was checked here, whatever the environment's PATH says.
 */
export async function resolveCommand(
  candidates: readonly string[],
  searchPath: readonly string[],
): Promise<ResolvedCommand> {
  for (const candidate of candidates) {
    const [program, ...args] = splitCommandLine(candidate);
    if (!program) continue;

    const executable = await locateProgram(program, searchPath);
    if (executable !== null) {
      return { candidate, argv: [executable, ...args] };
    }
  }

  throw new NoCompressorFoundError(candidates);
}
