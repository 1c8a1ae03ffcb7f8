import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError, describeError } from "./errors.js";
import { searchPathFromEnv } from "./resolver.js";
import { compileExtensionMatcher, COMPRESSED_SUFFIX } from "./utils.js";
import type { GeneratorConfig, GeneratorOptions } from "./types.js";

export const DEFAULT_TYPES: readonly string[] = [
  "html", "htm", "?html", "txt", "css", "js", "xml", "rss", "atom", "svg", "mml", "kml",
];

export const DEFAULT_MIN_LENGTH = 50;

export const DEFAULT_COMMANDS: readonly string[] = ["zopfli", "gzip -kf9"];

export async function resolveConfig(options: GeneratorOptions): Promise<GeneratorConfig> {
  const root = options.root;
  if (!root) {
    throw new ConfigError("No directory specified");
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await fs.stat(root)).isDirectory();
  } catch (err) {
    throw new ConfigError(`Cannot access ${root}: ${describeError(err)}`, { cause: err });
  }
  if (!isDirectory) {
    throw new ConfigError(`Not a directory: ${root}`);
  }

  const minLength = options.minLength ?? DEFAULT_MIN_LENGTH;
  if (!Number.isInteger(minLength) || minLength < 0) {
    throw new ConfigError(`Invalid minimum length: ${minLength}`);
  }

  const includeTypes = [...(options.types ?? DEFAULT_TYPES)];
  // The tool's own output is never a candidate
  const ownSuffix = COMPRESSED_SUFFIX.slice(1);
  const excludeTypes = [...(options.excludeTypes ?? [])];
  if (!excludeTypes.includes(ownSuffix)) {
    excludeTypes.push(ownSuffix);
  }

  return {
    root: path.normalize(root),
    includeTypes,
    excludeTypes,
    minLength,
    commandCandidates: [...(options.commands ?? DEFAULT_COMMANDS)],
    searchPath: [...(options.searchPath ?? searchPathFromEnv())],
    strictTimestamps: options.strictTimestamps ?? false,
    include: compileExtensionMatcher(includeTypes),
    exclude: compileExtensionMatcher(excludeTypes),
  };
}
