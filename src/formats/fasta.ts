/**
 * FASTA format parser
 *
 * Handles the messiness of real-world FASTA files:
 * - Wrapped and unwrapped sequences
 * - Missing or malformed headers
 * - Mixed case sequences
 * - IUPAC ambiguity codes
 * - Comments and blank lines
 */

import { type } from "arktype";
import {
  CodonBiasError,
  getErrorSuggestion,
  ParseError,
  SequenceError,
  ValidationError,
} from "../errors";
import { createStream } from "../io/file-reader";
import { readLines } from "../io/stream-utils";
import type { FastaSequence, FileReaderOptions, ParserOptions } from "../types";
import { FastaSequenceSchema, SequenceIdSchema, SequenceSchema } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * Discriminated union for processed FASTA lines
 */
type ProcessedFastaLine =
  | { isHeader: true; headerData: FastaHeader }
  | { isHeader: false; sequenceData: string }
  | null;

interface FastaHeader {
  readonly id: string;
  readonly description?: string;
  readonly lineNumber: number;
}

const FastaParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
});

/**
 * Streaming FASTA parser
 *
 * Yields sequences one at a time. Iteration can be abandoned at any point;
 * file and stream inputs are released when it is.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new FastaParser();
 * for await (const sequence of parser.parseString(fastaData)) {
 *   console.log(`${sequence.id}: ${sequence.length} bp`);
 * }
 * ```
 *
 * @example Collecting errors instead of throwing
 * ```typescript
 * const parser = new FastaParser({
 *   onError: (error, lineNumber) => console.error(`Line ${lineNumber}: ${error}`)
 * });
 * ```
 */
class FastaParser extends AbstractParser<FastaSequence> {
  protected getDefaultOptions(): Partial<ParserOptions> {
    return {
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`FASTA Warning (line ${lineNumber}): ${warning}`);
      },
    };
  }

  /**
   * @param options FASTA parser configuration options including AbortSignal
   * @throws {ValidationError} When options are out of range
   */
  constructor(options: ParserOptions = {}) {
    const validationResult = FastaParserOptionsSchema(options);

    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }

    super(options);
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA sequences from a string
   * @param data Raw FASTA format string data
   * @throws {ParseError} When FASTA format is invalid
   * @example
   * ```typescript
   * const fastaData = '>seq1\nATCG\n>seq2\nGGGG';
   * for await (const sequence of parser.parseString(fastaData)) {
   *   console.log(`${sequence.id}: ${sequence.sequence}`);
   * }
   * ```
   */
  async *parseString(data: string): AsyncIterable<FastaSequence> {
    yield* this.parseLines(data.split(/\r?\n/));
  }

  /**
   * Parse FASTA sequences from a file using streaming I/O
   * @param filePath Path to FASTA file to parse
   * @param options File reading options
   * @throws {FileError} When file cannot be read
   * @throws {ParseError} When FASTA format is invalid
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<FastaSequence> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    const stream = await createStream(filePath, options);
    try {
      yield* this.parseLines(readLines(stream, options?.encoding ?? "utf8"));
    } catch (error) {
      // Keep codon-bias errors as they are; wrap anything else with the file name
      if (error instanceof CodonBiasError) {
        throw error;
      }
      throw new ParseError(
        `Failed to parse FASTA file '${filePath}': ${error instanceof Error ? error.message : String(error)}`,
        "FASTA",
        undefined,
        error instanceof Error ? error.stack : undefined
      );
    }
  }

  /**
   * Parse FASTA sequences from a ReadableStream
   * @param stream Stream of binary data containing FASTA format text
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<FastaSequence> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Shared line state machine for every input kind
   */
  private async *parseLines(
    lines: Iterable<string> | AsyncIterable<string>
  ): AsyncIterable<FastaSequence> {
    let currentHeader: FastaHeader | null = null;
    let sequenceBuffer: string[] = [];
    let lineNumber = 0;

    for await (const rawLine of lines) {
      lineNumber++;
      this.throwIfAborted("parsing");

      let processedLine: ProcessedFastaLine;
      try {
        processedLine = this.processLine(rawLine, lineNumber);
      } catch (lineError) {
        this.options.onError(
          lineError instanceof Error ? lineError.message : String(lineError),
          lineNumber
        );
        continue;
      }

      if (!processedLine) continue;

      if (processedLine.isHeader) {
        if (currentHeader) {
          yield this.finalizeSequence(currentHeader, sequenceBuffer, lineNumber - 1);
        }
        currentHeader = processedLine.headerData;
        sequenceBuffer = [];
      } else if (!currentHeader) {
        this.options.onError("Sequence data found before header", lineNumber);
      } else {
        sequenceBuffer.push(processedLine.sequenceData);
      }
    }

    if (currentHeader) {
      yield this.finalizeSequence(currentHeader, sequenceBuffer, lineNumber);
    }
  }

  /**
   * Determine a line's type and content; null for lines to skip
   */
  private processLine(line: string, lineNumber: number): ProcessedFastaLine {
    if (line.length > this.options.maxLineLength) {
      this.options.onError(
        `Line too long (${line.length} > ${this.options.maxLineLength})`,
        lineNumber
      );
      return null;
    }

    if (shouldSkipFastaLine(line)) {
      return null;
    }

    const trimmedLine = line.trim();

    if (isFastaHeader(trimmedLine)) {
      const header = parseFastaHeader(trimmedLine, lineNumber, {
        skipValidation: this.options.skipValidation,
        onWarning: this.options.onWarning,
      });
      return { isHeader: true, headerData: { ...header, lineNumber } };
    }

    const cleanedSequence = validateFastaSequence(trimmedLine, lineNumber, {
      skipValidation: this.options.skipValidation,
    });
    return cleanedSequence ? { isHeader: false, sequenceData: cleanedSequence } : null;
  }

  /**
   * Build the finished record
   * @throws {SequenceError} When the header has no sequence or the record is invalid
   */
  private finalizeSequence(
    header: FastaHeader,
    sequenceBuffer: string[],
    lineNumber: number
  ): FastaSequence {
    const sequence = sequenceBuffer.join("");

    if (sequence.length === 0) {
      throw new SequenceError("Header found but no sequence data", header.id, lineNumber);
    }

    const record = buildFastaRecord(header, sequence, this.options.trackLineNumbers);

    if (!this.options.skipValidation) {
      const validation = FastaSequenceSchema(record);
      if (validation instanceof type.errors) {
        throw new SequenceError(
          `Invalid FASTA sequence structure: ${validation.summary}`,
          record.id,
          lineNumber
        );
      }
    }

    return record;
  }
}

/**
 * Parse FASTA header line and extract ID and description
 */
function parseFastaHeader(
  headerLine: string,
  lineNumber: number,
  options: { skipValidation?: boolean; onWarning?: (msg: string, line?: number) => void }
): { id: string; description?: string } {
  if (!headerLine.startsWith(">")) {
    throw new ValidationError('headerLine must start with ">"');
  }

  const header = headerLine.slice(1).trim();
  if (!header) {
    if (options.skipValidation === true) {
      options.onWarning?.("Empty FASTA header", lineNumber);
      return { id: "" };
    }
    throw new ParseError(
      'Empty FASTA header: header must contain an identifier after ">"',
      "FASTA",
      lineNumber,
      headerLine
    );
  }

  const firstSpace = header.search(/\s/);
  const id = firstSpace === -1 ? header : header.slice(0, firstSpace);
  const description = firstSpace === -1 ? undefined : header.slice(firstSpace + 1).trim();

  if (options.skipValidation !== true) {
    const idValidation = SequenceIdSchema(id);
    if (idValidation instanceof type.errors) {
      throw new SequenceError(
        `Invalid sequence ID: ${idValidation.summary}`,
        id,
        lineNumber,
        headerLine
      );
    }
  }

  return description ? { id, description } : { id };
}

/**
 * Strip whitespace from a sequence line and check its characters
 * @throws {SequenceError} When the line holds non-IUPAC characters
 */
function validateFastaSequence(
  sequenceLine: string,
  lineNumber: number,
  options: { skipValidation?: boolean }
): string {
  const cleaned = sequenceLine.replace(/\s/g, "");

  if (!cleaned || options.skipValidation === true) {
    return cleaned;
  }

  const validation = SequenceSchema(cleaned);
  if (validation instanceof type.errors) {
    const error = new ValidationError(`Invalid sequence characters: ${validation.summary}`);
    throw new SequenceError(
      `Invalid FASTA sequence characters found at line ${lineNumber}. ${getErrorSuggestion(error)}`,
      "unknown",
      lineNumber,
      sequenceLine
    );
  }

  return cleaned;
}

function buildFastaRecord(
  header: FastaHeader,
  sequence: string,
  trackLineNumbers: boolean
): FastaSequence {
  return {
    format: "fasta",
    id: header.id,
    ...(header.description !== undefined && { description: header.description }),
    sequence,
    length: sequence.length,
    ...(trackLineNumbers && { lineNumber: header.lineNumber }),
  };
}

/**
 * Skip empty lines and semicolon comments (deprecated but still found)
 */
function shouldSkipFastaLine(line: string): boolean {
  const trimmed = line.trim();
  return !trimmed || trimmed.startsWith(";");
}

function isFastaHeader(line: string): boolean {
  return line.trim().startsWith(">");
}

/**
 * Detect if string contains FASTA format data
 */
function detectFastaFormat(data: string): boolean {
  const trimmed = data.trim();
  return trimmed.startsWith(">") && trimmed.includes("\n");
}

/**
 * Count sequences in FASTA data without parsing
 */
function countFastaSequences(data: string): number {
  return (data.match(/^>/gm) ?? []).length;
}

/**
 * Extract sequence IDs without full parsing
 */
function extractFastaIds(data: string): string[] {
  const matches = data.match(/^>([^\s]+)/gm);
  return matches ? matches.map((m) => m.slice(1)) : [];
}

const FastaUtils = {
  detectFormat: detectFastaFormat,
  countSequences: countFastaSequences,
  extractIds: extractFastaIds,
};

export {
  FastaParser,
  FastaUtils,
  parseFastaHeader,
  validateFastaSequence,
  detectFastaFormat,
  countFastaSequences,
  extractFastaIds,
  shouldSkipFastaLine,
  isFastaHeader,
};
