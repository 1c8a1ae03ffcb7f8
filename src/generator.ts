import { resolveConfig } from "./config.js";
import { resolveCommand } from "./resolver.js";
import { selectFiles } from "./selector.js";
import { ExternalCompressor, processFile } from "./compressor.js";
import type { Compressor, GenerationResult, GeneratorOptions, ResolvedCommand } from "./types.js";

interface GenerationStats {
  totalFiles: number;
  compressed: number;
  skipped: number;
}

export class GzipStaticGenerator {
  options: GeneratorOptions;
  stats: GenerationStats;
  private readonly compressor?: Compressor;

  /**
   * @param compressor - used instead of resolving one of the configured
   *   command-lines; candidates are then not probed at all
   */
  constructor(options: GeneratorOptions, compressor?: Compressor) {
    this.options = options;
    this.compressor = compressor;
    this.stats = { totalFiles: 0, compressed: 0, skipped: 0 };
  }

  private resetStats(): void {
    this.stats = { totalFiles: 0, compressed: 0, skipped: 0 };
  }

  async run(): Promise<GenerationResult> {
    this.resetStats();

    const config = await resolveConfig(this.options);

    let command: ResolvedCommand | null = null;
    let compressor = this.compressor;
    if (!compressor) {
      command = await resolveCommand(config.commandCandidates, config.searchPath);
      compressor = new ExternalCompressor(command);
    }

    const files = selectFiles({
      root: config.root,
      include: config.include,
      exclude: config.exclude,
      minLength: config.minLength,
    });

    for await (const file of files) {
      this.stats.totalFiles++;
      const outcome = await processFile(file, compressor, { strictTimestamps: config.strictTimestamps });
      if (outcome === "compressed") {
        this.stats.compressed++;
      } else {
        this.stats.skipped++;
      }
    }

    return { command, ...this.stats };
  }
}
