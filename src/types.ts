export type NameMatcher = (fileName: string) => boolean;

export interface GeneratorOptions {
  root: string;
  types?: readonly string[];
  excludeTypes?: readonly string[];
  minLength?: number;
  commands?: readonly string[];
  searchPath?: readonly string[];
  strictTimestamps?: boolean;
}

export interface GeneratorConfig {
  readonly root: string;
  readonly includeTypes: readonly string[];
  readonly excludeTypes: readonly string[];
  readonly minLength: number;
  readonly commandCandidates: readonly string[];
  readonly searchPath: readonly string[];
  readonly strictTimestamps: boolean;
  readonly include: NameMatcher | null;
  readonly exclude: NameMatcher | null;
}

export interface SelectionCriteria {
  root: string;
  include?: NameMatcher | null;
  exclude?: NameMatcher | null;
  minLength?: number;
}

export interface ResolvedCommand {
  candidate: string;
  argv: readonly string[];
}

export interface FilePair {
  source: string;
  compressed: string;
}

export type FileOutcome = "compressed" | "skipped";

export interface ProcessOptions {
  strictTimestamps?: boolean;
}

export interface Compressor {
  /** Writes `<source>.gz`, leaving the source untouched. */
  compress(source: string): Promise<void>;
}

export interface GenerationResult {
  command: ResolvedCommand | null;
  totalFiles: number;
  compressed: number;
  skipped: number;
}

export interface ParsedArgs {
  root?: string;
  types: string[];
  minLength: number;
  commands: string[];
  strictTimestamps: boolean;
  help: boolean;
  version: boolean;
}
