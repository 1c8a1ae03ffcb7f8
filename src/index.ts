#!/usr/bin/env node

import { createRequire } from "node:module";
import { GzipStaticGenerator } from "./generator.js";
import { DEFAULT_COMMANDS, DEFAULT_MIN_LENGTH, DEFAULT_TYPES } from "./config.js";
import { splitList } from "./utils.js";
import type { ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
gzip-static-generate v${VERSION} — Pre-compress static files for serving as .gz

Usage:
  gzip-static-generate <dir>                  Compress eligible files under dir
  gzip-static-generate -t css,js <dir>        Only these extensions
  gzip-static-generate -c "gzip -k9" <dir>    Use a specific compressor

Each eligible file F gets a sibling F.gz with F's modification time.
Files whose F.gz is already up to date are left alone.

Options:
  -t, --types <list>      Extension patterns, comma separated; replaces the
                          defaults, repeatable (default: ${DEFAULT_TYPES.join(",")})
      --add-types <list>  Extension patterns added to the current list
  -m, --min-length <n>    Skip files of n bytes or fewer (default: ${DEFAULT_MIN_LENGTH})
  -c, --cmd <command>     Compressor command-line; replaces the defaults,
                          repeatable, first available wins
                          (default: ${DEFAULT_COMMANDS.map((c) => `"${c}"`).join(", ")})
      --strict-mtime      Fail if the .gz modification time cannot be set
  -h, --help              Show this help message
  -v, --version           Show version number

The compressor is called with the file path as its last argument and must
write the compressed copy to <file>.gz.
`.trim();

function usageError(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run gzip-static-generate --help for usage");
  process.exit(1);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    types: [...DEFAULT_TYPES],
    minLength: DEFAULT_MIN_LENGTH,
    commands: [...DEFAULT_COMMANDS],
    strictTimestamps: false,
    help: false,
    version: false,
  };
  let typesGiven = false;
  let commandsGiven = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "--strict-mtime") {
      result.strictTimestamps = true;
      continue;
    }

    if (arg === "-t" || arg === "--types" || arg === "--add-types") {
      const next = args[++i];
      if (next === undefined) {
        usageError(`${arg} requires a list of extensions`);
      }
      if (arg !== "--add-types" && !typesGiven) {
        result.types = [];
        typesGiven = true;
      }
      result.types.push(...splitList(next));
      continue;
    }

    if (arg === "-m" || arg === "--min-length") {
      const next = args[++i];
      if (next === undefined) {
        usageError(`${arg} requires a numeric argument`);
      }
      if (!/^\d+$/.test(next)) {
        usageError(`invalid minimum length: ${next}`);
      }
      result.minLength = parseInt(next, 10);
      continue;
    }

    if (arg === "-c" || arg === "--cmd") {
      const next = args[++i];
      if (next === undefined) {
        usageError(`${arg} requires a command-line`);
      }
      if (!commandsGiven) {
        result.commands = [];
        commandsGiven = true;
      }
      result.commands.push(next);
      continue;
    }

    if (arg.startsWith("-")) {
      usageError(`unknown option: ${arg}`);
    }

    if (result.root !== undefined) {
      usageError(`unexpected argument: ${arg}`);
    }
    result.root = arg;
  }

  return result;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (parsed.root === undefined) {
    usageError("no directory specified");
  }

  const generator = new GzipStaticGenerator({
    root: parsed.root,
    types: parsed.types,
    minLength: parsed.minLength,
    commands: parsed.commands,
    strictTimestamps: parsed.strictTimestamps,
  });
  await generator.run();
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
