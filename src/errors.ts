/**
 * Error handling for codon usage analysis
 *
 * Every failure carries the record, codon or file that caused it so an
 * operator can find the bad input without re-running anything.
 */

import type { IndexKind } from "./types";

/**
 * Base error class for all codon-bias errors
 */
export class CodonBiasError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CodonBiasError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or arguments
 */
export class ValidationError extends CodonBiasError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends CodonBiasError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * File I/O errors
 */
export class FileError extends CodonBiasError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "stat" | "open",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends CodonBiasError {
  constructor(
    message: string,
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Sequence-specific validation errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * A three-base window outside the 64-codon alphabet
 */
export class InvalidCodonError extends SequenceError {
  override readonly code = "INVALID_CODON";

  constructor(
    public readonly codon: string,
    sequenceId: string,
    public readonly position?: number
  ) {
    super(
      `illegal codon '${codon}'${position !== undefined ? ` at position ${position}` : ""}`,
      sequenceId
    );
    this.name = "InvalidCodonError";
  }
}

/**
 * A CDS whose length is not a whole number of codons
 */
export class MalformedSequenceLengthError extends SequenceError {
  override readonly code = "MALFORMED_LENGTH";

  constructor(
    sequenceId: string,
    public readonly sequenceLength: number
  ) {
    super(
      `length ${sequenceLength} is not a multiple of 3 (${sequenceLength % 3} trailing bases)`,
      sequenceId
    );
    this.name = "MalformedSequenceLengthError";
  }
}

/**
 * An index build requested on an instance whose index is already built
 */
export class DuplicateIndexError extends CodonBiasError {
  constructor(public readonly kind: IndexKind) {
    super(
      `an ${kind.toUpperCase()} index has already been built for this indexer`,
      "DUPLICATE_INDEX",
      undefined,
      "Create a new CodonUsageIndexer for each counting cycle"
    );
    this.name = "DuplicateIndexError";
  }
}

/**
 * An index read before it was built
 */
export class IndexNotBuiltError extends CodonBiasError {
  constructor(public readonly kind: IndexKind) {
    super(
      `the ${kind.toUpperCase()} index has not been built yet`,
      "INDEX_NOT_BUILT",
      undefined,
      `Call build${kind === "rcsu" ? "Rcsu" : "Nrcsu"}Index() first`
    );
    this.name = "IndexNotBuiltError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  INVALID_FASTA_HEADER: 'FASTA headers must start with ">" followed by an identifier',
  INVALID_NUCLEOTIDE: "Use IUPAC nucleotide codes: A, C, G, T, U, R, Y, S, W, K, M, B, D, H, V, N",
  INVALID_CODON: "Coding sequences may only contain A, C, G and T",
  MALFORMED_LENGTH: "Coding sequences must be a whole number of codons long",
  DUPLICATE_INDEX: "Indices are built once per indexer; construct a new one to recount",
  INDEX_NOT_BUILT: "Build the index before reading or scoring against it",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for common error patterns
 */
export function getErrorSuggestion(error: CodonBiasError): string {
  switch (error.code) {
    case "INVALID_CODON":
      return ERROR_SUGGESTIONS.INVALID_CODON;
    case "MALFORMED_LENGTH":
      return ERROR_SUGGESTIONS.MALFORMED_LENGTH;
    case "DUPLICATE_INDEX":
      return ERROR_SUGGESTIONS.DUPLICATE_INDEX;
    case "INDEX_NOT_BUILT":
      return ERROR_SUGGESTIONS.INDEX_NOT_BUILT;
  }

  const message = error.message.toLowerCase();
  if (message.includes("fasta") && message.includes("header")) {
    return ERROR_SUGGESTIONS.INVALID_FASTA_HEADER;
  }
  if (message.includes("nucleotide") || message.includes("sequence")) {
    return ERROR_SUGGESTIONS.INVALID_NUCLEOTIDE;
  }

  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}
