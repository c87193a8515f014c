/**
 * Core type definitions for codon usage analysis
 *
 * Codons are modelled as a template-literal union so that a count table or
 * index keyed by `Codon` is checked for exhaustiveness at compile time.
 */

import { type } from "arktype";

// =============================================================================
// SEQUENCES
// =============================================================================

/**
 * Minimal record consumed by the codon counter
 */
export interface SequenceRecord {
  /** Sequence identifier, reported back in errors */
  readonly id: string;
  /** Nucleotide sequence of a CDS */
  readonly sequence: string;
}

/**
 * FASTA sequence as produced by the FASTA parser
 * Format: >id description\nsequence
 */
export interface FastaSequence extends SequenceRecord {
  readonly format: "fasta";
  /** Optional description following the identifier on the header line */
  readonly description?: string;
  /** Cached sequence length */
  readonly length: number;
  /** Line number of the header (for error reporting) */
  readonly lineNumber?: number;
}

// =============================================================================
// CODONS
// =============================================================================

export type Nucleotide = "A" | "C" | "G" | "T";

/** One of the 64 DNA codons */
export type Codon = `${Nucleotide}${Nucleotide}${Nucleotide}`;

/** Three-letter amino acid label, or STOP for the terminators */
export type AminoAcidGroup =
  | "ALA"
  | "ARG"
  | "ASN"
  | "ASP"
  | "CYS"
  | "GLN"
  | "GLU"
  | "GLY"
  | "HIS"
  | "ILE"
  | "LEU"
  | "LYS"
  | "MET"
  | "PHE"
  | "PRO"
  | "SER"
  | "STOP"
  | "THR"
  | "TRP"
  | "TYR"
  | "VAL";

/** Occurrence count per codon */
export type CodonCount = Record<Codon, number>;

/** Codon weight table (RCSU or NRCSU) */
export type CodonIndex = ReadonlyMap<Codon, number>;

export type IndexKind = "rcsu" | "nrcsu";

/**
 * Build state of one index kind on an indexer
 *
 * `builtFromCycle` records which counting cycle produced the weights, so a
 * later recount can be detected as making the index stale.
 */
export type IndexState =
  | { readonly status: "unbuilt" }
  | {
      readonly status: "built";
      readonly weights: CodonIndex;
      readonly builtFromCycle: number;
    };

/**
 * One line of an index report
 */
export interface IndexEntry {
  readonly codon: Codon;
  /** Full-precision weight */
  readonly weight: number;
  /** Weight rounded for display */
  readonly display: string;
}

/**
 * What to do with a CDS whose length is not a multiple of 3
 * - drop: ignore the trailing 1-2 bases and warn
 * - error: raise MalformedSequenceLengthError
 */
export type TrailingBasesPolicy = "drop" | "error";

// =============================================================================
// OPTIONS
// =============================================================================

/**
 * Codon usage indexer configuration
 */
export interface CodonUsageOptions {
  /** Handling of trailing partial codons (default: "drop") */
  readonly trailingBases?: TrailingBasesPolicy;
  /** Decimal places used when displaying weights (default: 3) */
  readonly precision?: number;
  /** Warning sink (default: console.warn) */
  readonly onWarning?: (warning: string) => void;
}

/**
 * Options for scoring a single gene against an index
 */
export interface CaiOptions {
  /** Handling of trailing partial codons (default: "drop") */
  readonly trailingBases?: TrailingBasesPolicy;
  /** Codons left out of the geometric mean (default: ATG, TGG and the stops) */
  readonly excludeCodons?: readonly Codon[];
  /** Identifier reported in errors (default: "<gene>") */
  readonly sequenceId?: string;
}

export interface CaiResult {
  /** Geometric mean of the scored codon weights (0 if nothing was scored) */
  readonly cai: number;
  /** Number of codons that contributed to the mean */
  readonly codonsScored: number;
  /** Codons skipped because their weight is 0 */
  readonly zeroWeightCodons: number;
}

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Skip character validation */
  skipValidation?: boolean;
  /** Maximum line length before reporting an error */
  maxLineLength?: number;
  /** Whether to record header line numbers on parsed sequences */
  trackLineNumbers?: boolean;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom error handler */
  onError?: (error: string, lineNumber?: number) => void;
  /** Custom warning handler */
  onWarning?: (warning: string, lineNumber?: number) => void;
}

// =============================================================================
// FILE I/O
// =============================================================================

/**
 * Branded type for validated file paths
 */
export type FilePath = string & { readonly __brand: "FilePath" };

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary" | "ascii";
  /** Maximum file size to prevent memory exhaustion (default: 100MB) */
  readonly maxFileSize?: number;
}

export interface FileMetadata {
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  /** File extension for format detection */
  readonly extension: string;
}

/**
 * Line processing result for streaming text files
 */
export interface LineProcessingResult {
  /** Complete lines extracted from buffer */
  readonly lines: string[];
  /** Incomplete line remainder to carry forward */
  readonly remainder: string;
}

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

const TrailingBasesSchema = type("'drop' | 'error'");

export const CodonUsageOptionsSchema = type({
  "trailingBases?": TrailingBasesSchema,
  "precision?": "0 <= number <= 10",
  "onWarning?": "unknown",
}).narrow((options, ctx) => {
  if (options.precision !== undefined && !Number.isInteger(options.precision)) {
    return ctx.reject({ expected: "an integer precision", actual: String(options.precision) });
  }
  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    return ctx.reject({ expected: "a warning callback", actual: typeof options.onWarning });
  }
  return true;
});

export const CaiOptionsSchema = type({
  "trailingBases?": TrailingBasesSchema,
  "excludeCodons?": "string[]",
  "sequenceId?": "string>0",
}).narrow((options, ctx) => {
  const invalid = (options.excludeCodons ?? []).filter((codon) => !/^[ACGT]{3}$/.test(codon));
  if (invalid.length > 0) {
    return ctx.reject({ expected: "codons over A, C, G, T", actual: invalid.join(", ") });
  }
  return true;
});

/**
 * DNA/RNA sequence characters including IUPAC ambiguity codes and gaps
 */
export const SequenceSchema = type("string").narrow((seq, ctx) => {
  const invalidChars = seq.toUpperCase().match(/[^ACGTURYSWKMBDHVN\-.*]/g);
  if (invalidChars) {
    return ctx.reject({
      expected: "IUPAC nucleotide codes",
      actual: invalidChars.join(", "),
    });
  }
  return true;
});

/**
 * Sequence identifier schema
 */
export const SequenceIdSchema = type("string>0").narrow((id, ctx) => {
  if (/\s/.test(id)) {
    return ctx.reject({ expected: "an identifier without whitespace", actual: id });
  }
  return true;
});

export const FastaSequenceSchema = type({
  format: '"fasta"',
  id: SequenceIdSchema,
  "description?": "string",
  sequence: "string>0",
  length: "number>0",
  "lineNumber?": "number>0",
}).narrow((fasta, ctx) => {
  if (fasta.sequence.length !== fasta.length) {
    return ctx.reject({
      expected: `length ${fasta.sequence.length}`,
      actual: `declared length ${fasta.length}`,
    });
  }
  return true;
});

/**
 * File path validation schema
 * Rejects null bytes and directory traversal
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({ expected: "a path without null characters" });
  }
  const normalized = path.replace(/\\/g, "/");
  if (normalized.split("/").includes("..")) {
    return ctx.reject({ expected: "a path without directory traversal", actual: path });
  }
  return true;
});

export const FileReaderOptionsSchema = type({
  "bufferSize?": "1024 <= number <= 1048576",
  "encoding?": '"utf8"|"binary"|"ascii"',
  "maxFileSize?": "number>=0",
});
