/**
 * Stream processing utilities for line-oriented text
 *
 * Turns a byte stream into complete lines, carrying partial lines across
 * chunk boundaries.
 */

import { StreamError } from "../errors";
import type { LineProcessingResult } from "../types";

const MAX_LINE_LENGTH = 10_000_000;

/**
 * TextDecoder label for a reader encoding
 *
 * ASCII input decodes the same under UTF-8; binary maps bytes one-to-one
 * onto code points through latin1.
 */
export function decoderLabel(encoding: "utf8" | "ascii" | "binary"): string {
  return encoding === "binary" ? "iso-8859-1" : "utf-8";
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * The stream is cancelled and its lock released whenever iteration ends,
 * including when the consumer stops early or throws.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @yields Complete lines of text without their line endings
 * @throws {StreamError} If reading from the stream fails
 * @example
 * ```typescript
 * const stream = await createStream('/path/to/cds.fasta');
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('>')) console.log('Found header:', line);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "ascii" | "binary" = "utf8"
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(decoderLabel(encoding));
  let buffer = "";
  let totalBytesProcessed = 0;
  let finished = false;

  try {
    while (true) {
      const chunk = await reader.read().catch((error: unknown) => {
        // an errored stream has nothing left to cancel
        finished = true;
        throw new StreamError(
          `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
          totalBytesProcessed
        );
      });

      if (chunk.done) {
        finished = true;
        buffer += decoder.decode();
        if (buffer.length > 0) {
          yield buffer.endsWith("\r") ? buffer.slice(0, -1) : buffer;
        }
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      totalBytesProcessed += chunk.value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and the trailing remainder
 *
 * Handles both \n and \r\n line endings.
 *
 * @throws {StreamError} If the unterminated remainder grows past the line limit
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const parts = buffer.split("\n");
  const remainder = parts.pop() ?? "";

  if (remainder.length > MAX_LINE_LENGTH) {
    throw new StreamError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      undefined,
      "This might indicate a file without proper line endings"
    );
  }

  return {
    lines: parts.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line)),
    remainder,
  };
}

export const StreamUtils = {
  readLines,
  decoderLabel,
  processBuffer,
} as const;
