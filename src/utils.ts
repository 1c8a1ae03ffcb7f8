import picomatch from "picomatch";
import type { NameMatcher } from "./types.js";

export const COMPRESSED_SUFFIX = ".gz";

/**
 * Compiles extension patterns into a single file-name matcher. Each pattern
 * describes the part after the last literal dot and may itself be a glob,
 * so `?html` matches `a.xhtml` but not `a.html`. Returns null when there is
 * nothing to match against.
 */
export function compileExtensionMatcher(patterns: readonly string[]): NameMatcher | null {
  const globs = patterns
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .map((p) => `*.${p}`);

  if (globs.length === 0) return null;

  return picomatch(globs, { nocase: true, dot: true });
}

export function splitCommandLine(commandLine: string): string[] {
  return commandLine.split(/\s+/).filter((token) => token.length > 0);
}

export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function compressedPathFor(source: string): string {
  return `${source}${COMPRESSED_SUFFIX}`;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
