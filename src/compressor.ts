import fs from "node:fs/promises";
import type { BigIntStats } from "node:fs";
import { spawn } from "node:child_process";
import { CompressionFailedError, TimestampError, describeError } from "./errors.js";
import { compressedPathFor, isErrnoException } from "./utils.js";
import type { Compressor, FileOutcome, FilePair, ProcessOptions, ResolvedCommand } from "./types.js";

// Times are set as float seconds, which can land one microsecond short
const MTIME_SLACK_US = 1n;

export class ExternalCompressor implements Compressor {
  readonly command: ResolvedCommand;

  constructor(command: ResolvedCommand) {
    this.command = command;
  }

  compress(source: string): Promise<void> {
    const [program, ...args] = this.command.argv;
    if (!program) {
      return Promise.reject(new CompressionFailedError(source, null, null, new Error("empty command")));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(program, [...args, source], {
        shell: false,
        stdio: ["ignore", "inherit", "inherit"],
      });

      child.on("error", (err) => {
        reject(new CompressionFailedError(source, null, null, err));
      });

      child.on("close", (code, signal) => {
        if (code === 0) {
          resolve();
        } else {
          reject(new CompressionFailedError(source, code, signal));
        }
      });
    });
  }
}

export function filePairFor(source: string): FilePair {
  return { source, compressed: compressedPathFor(source) };
}

async function lstatIfExists(filePath: string): Promise<BigIntStats | null> {
  try {
    return await fs.lstat(filePath, { bigint: true });
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

function toMicros(ns: bigint): bigint {
  return ns / 1000n;
}

function toUtimeSeconds(ns: bigint): number {
  return Number(toMicros(ns)) / 1e6;
}

/** Only a regular file at least as new as the source counts. */
export function isFresh(sourceStats: BigIntStats, compressedStats: BigIntStats | null): boolean {
  if (!compressedStats || !compressedStats.isFile()) return false;
  return toMicros(compressedStats.mtimeNs) + MTIME_SLACK_US >= toMicros(sourceStats.mtimeNs);
}

/**
 * Brings `<source>.gz` up to date. A fresh sibling is left alone; anything
 * else at that path is removed, then regenerated by the compressor and
 * stamped with the source's times so the next run sees it as fresh.
 */
export async function processFile(
  source: string,
  compressor: Compressor,
  options: ProcessOptions = {},
): Promise<FileOutcome> {
  const pair = filePairFor(source);
  const [sourceStats, compressedStats] = await Promise.all([
    fs.stat(pair.source, { bigint: true }),
    lstatIfExists(pair.compressed),
  ]);

  if (isFresh(sourceStats, compressedStats)) {
    return "skipped";
  }

  if (compressedStats) {
    await fs.rm(pair.compressed, { force: true });
  }

  await compressor.compress(pair.source);
  console.error(pair.compressed);

  try {
    await fs.utimes(pair.compressed, toUtimeSeconds(sourceStats.atimeNs), toUtimeSeconds(sourceStats.mtimeNs));
  } catch (err) {
    if (options.strictTimestamps) {
      throw new TimestampError(pair.compressed, err);
    }
    console.warn(`Warning: could not set modification time on ${pair.compressed}: ${describeError(err)}`);
  }

  return "compressed";
}
