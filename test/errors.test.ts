/**
 * Tests for error types and recovery suggestions
 */

import { describe, expect, test } from "vitest";
import {
  CodonBiasError,
  DuplicateIndexError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  IndexNotBuiltError,
  InvalidCodonError,
  MalformedSequenceLengthError,
  ParseError,
  SequenceError,
} from "../src/errors";

describe("error hierarchy", () => {
  test("should carry the offending codon and sequence", () => {
    const error = new InvalidCodonError("NNN", "geneA", 7);

    expect(error).toBeInstanceOf(SequenceError);
    expect(error).toBeInstanceOf(CodonBiasError);
    expect(error.name).toBe("InvalidCodonError");
    expect(error.sequenceId).toBe("geneA");
    expect(error.message).toBe("Sequence 'geneA': illegal codon 'NNN' at position 7");
  });

  test("should describe a length that is not a whole number of codons", () => {
    const error = new MalformedSequenceLengthError("geneB", 10);

    expect(error.code).toBe("MALFORMED_LENGTH");
    expect(error.message).toBe("Sequence 'geneB': length 10 is not a multiple of 3 (1 trailing bases)");
  });

  test("should name the index kind in index state errors", () => {
    expect(new DuplicateIndexError("nrcsu").message).toBe(
      "an NRCSU index has already been built for this indexer"
    );
    expect(new IndexNotBuiltError("rcsu").context).toBe("Call buildRcsuIndex() first");
  });

  test("should format line number and context", () => {
    const error = new ParseError("Empty FASTA header", "FASTA", 3, ">");

    expect(error.toString()).toBe("ParseError: Empty FASTA header (line 3)\nContext: >");
  });

  test("should add a suggestion to system errors", () => {
    const error = FileError.fromSystemError("read", "/data/cds.fasta", new Error("ENOENT: no such file"));

    expect(error.message).toBe(
      "read operation failed: ENOENT: no such file. Check that the file path is correct and the file exists"
    );
    expect(error.filePath).toBe("/data/cds.fasta");
  });
});

describe("getErrorSuggestion", () => {
  test("should suggest by error code", () => {
    expect(getErrorSuggestion(new InvalidCodonError("NNN", "geneA"))).toBe(
      ERROR_SUGGESTIONS.INVALID_CODON
    );
    expect(getErrorSuggestion(new DuplicateIndexError("rcsu"))).toBe(
      ERROR_SUGGESTIONS.DUPLICATE_INDEX
    );
  });

  test("should fall back to message patterns", () => {
    expect(getErrorSuggestion(new ParseError("Empty FASTA header", "FASTA"))).toBe(
      ERROR_SUGGESTIONS.INVALID_FASTA_HEADER
    );
    expect(getErrorSuggestion(new ParseError("Unexpected byte", "FASTA"))).toBe(
      ERROR_SUGGESTIONS.MALFORMED_LINE
    );
  });
});
