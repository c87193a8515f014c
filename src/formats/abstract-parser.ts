/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Format parsers supply their defaults and parsing logic; the base class
 * merges options and gives every parser the same AbortSignal behaviour.
 */

import { ParseError } from "../errors";
import type { ParserOptions } from "../types";

/**
 * Parser options after defaults have been applied
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">> &
  Pick<ParserOptions, "signal">;

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T> {
  protected readonly options: ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: ParserOptions) {
    const formatDefaults = this.getDefaultOptions();

    // Merge in order: base -> format-specific -> user options
    this.options = {
      skipValidation: options.skipValidation ?? formatDefaults.skipValidation ?? false,
      maxLineLength: options.maxLineLength ?? formatDefaults.maxLineLength ?? 1_000_000,
      trackLineNumbers: options.trackLineNumbers ?? formatDefaults.trackLineNumbers ?? true,
      onError:
        options.onError ??
        formatDefaults.onError ??
        ((error: string, lineNumber?: number): void => {
          throw new ParseError(error, this.getFormatName(), lineNumber);
        }),
      onWarning:
        options.onWarning ??
        formatDefaults.onWarning ??
        ((warning: string, lineNumber?: number): void => {
          console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
        }),
      signal: options.signal,
    };
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<ParserOptions>;

  /**
   * Check abortion with format context
   * Call this in parsing loops to make long parses cancellable
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string): AsyncIterable<T>;

  /**
   * Parse records from a binary stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format name for error messages and logging (e.g. "FASTA")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration shared by format parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
