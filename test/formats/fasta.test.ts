/**
 * Tests for FASTA format parsing
 */

import { describe, expect, test } from "vitest";
import { ParseError, SequenceError, ValidationError } from "../../src/errors";
import { FastaParser, FastaUtils, parseFastaHeader } from "../../src/formats/fasta";
import type { FastaSequence } from "../../src/types";

async function collect(records: AsyncIterable<FastaSequence>): Promise<FastaSequence[]> {
  const sequences: FastaSequence[] = [];
  for await (const record of records) {
    sequences.push(record);
  }
  return sequences;
}

function streamOf(...chunks: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller): void {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk));
      }
      controller.close();
    },
  });
}

describe("FastaParser", () => {
  const parser = new FastaParser();

  test("should parse simple FASTA sequence", async () => {
    const sequences = await collect(parser.parseString(">seq1\nATCG"));

    expect(sequences).toHaveLength(1);
    expect(sequences[0]).toEqual({
      format: "fasta",
      id: "seq1",
      sequence: "ATCG",
      length: 4,
      lineNumber: 1,
    });
  });

  test("should parse FASTA with description", async () => {
    const sequences = await collect(parser.parseString(">seq1 Sample sequence description\nATCGATCG"));

    expect(sequences[0]?.id).toBe("seq1");
    expect(sequences[0]?.description).toBe("Sample sequence description");
    expect(sequences[0]?.sequence).toBe("ATCGATCG");
  });

  test("should parse multiline sequences", async () => {
    const sequences = await collect(parser.parseString(">seq1\nATCG\nATCG\nATCG"));

    expect(sequences[0]?.sequence).toBe("ATCGATCGATCG");
    expect(sequences[0]?.length).toBe(12);
  });

  test("should parse multiple sequences", async () => {
    const sequences = await collect(parser.parseString(">seq1\nATCG\n>seq2\nGGGG\n>seq3\nTTTT"));

    expect(sequences.map((seq) => seq.id)).toEqual(["seq1", "seq2", "seq3"]);
    expect(sequences[2]?.lineNumber).toBe(5);
  });

  test("should handle IUPAC ambiguity codes and mixed case", async () => {
    const sequences = await collect(parser.parseString(">seq1\nATCGRYSWKMBDHVN\nacgt"));

    expect(sequences[0]?.sequence).toBe("ATCGRYSWKMBDHVNacgt");
  });

  test("should skip comments, blank lines and Windows line endings", async () => {
    const fasta = ";comment\r\n\r\n>seq1\r\nATCG\r\n\r\n;another\r\n>seq2\r\nGGGG\r\n";
    const sequences = await collect(parser.parseString(fasta));

    expect(sequences.map((seq) => [seq.id, seq.sequence])).toEqual([
      ["seq1", "ATCG"],
      ["seq2", "GGGG"],
    ]);
  });

  test("should reject an empty header", async () => {
    await expect(collect(parser.parseString(">\nATCG"))).rejects.toThrow(ParseError);
    await expect(collect(parser.parseString(">\nATCG"))).rejects.toThrow("Empty FASTA header");
  });

  test("should reject invalid sequence characters", async () => {
    await expect(collect(parser.parseString(">seq1\nATCG123"))).rejects.toThrow(
      "Invalid FASTA sequence characters found at line 2"
    );
  });

  test("should reject sequence data before the first header", async () => {
    await expect(collect(parser.parseString("ATCG\n>seq1\nGG"))).rejects.toThrow(
      "Sequence data found before header"
    );
  });

  test("should reject a header without sequence data", async () => {
    await expect(collect(parser.parseString(">seq1\n>seq2\nATCG"))).rejects.toThrow(SequenceError);
  });

  test("should report line errors through onError and keep going", async () => {
    const errors: Array<[string, number | undefined]> = [];
    const lenient = new FastaParser({
      onError: (error, lineNumber) => errors.push([error, lineNumber]),
    });

    const sequences = await collect(lenient.parseString(">seq1\nATXG\nATCG"));

    expect(sequences[0]?.sequence).toBe("ATCG");
    expect(errors).toHaveLength(1);
    expect(errors[0]?.[1]).toBe(2);
  });

  test("should warn instead of failing on an empty header when skipping validation", async () => {
    const warnings: string[] = [];
    const lenient = new FastaParser({
      skipValidation: true,
      onWarning: (warning) => warnings.push(warning),
    });

    const sequences = await collect(lenient.parseString(">\nATCG"));

    expect(sequences[0]?.id).toBe("");
    expect(warnings).toEqual(["Empty FASTA header"]);
  });

  test("should omit line numbers when not tracked", async () => {
    const untracked = new FastaParser({ trackLineNumbers: false });
    const sequences = await collect(untracked.parseString(">seq1\nATCG"));

    expect(sequences[0]).toEqual({ format: "fasta", id: "seq1", sequence: "ATCG", length: 4 });
  });

  test("should stop when aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const abortable = new FastaParser({ signal: controller.signal });

    await expect(collect(abortable.parseString(">seq1\nATCG"))).rejects.toThrow(
      "Operation aborted during FASTA parsing"
    );
  });

  test("should parse a byte stream split across chunk boundaries", async () => {
    const stream = streamOf(">seq1 first\nAT", "CG\nGG\n>se", "q2\nTTTT\n");

    const sequences = await collect(parser.parse(stream));

    expect(sequences.map((seq) => [seq.id, seq.sequence])).toEqual([
      ["seq1", "ATCGGG"],
      ["seq2", "TTTT"],
    ]);
  });

  test("should reject invalid options", () => {
    expect(() => new FastaParser({ maxLineLength: 0 })).toThrow(ValidationError);
  });
});

describe("parseFastaHeader", () => {
  test("should split the identifier from the description", () => {
    expect(parseFastaHeader(">rplB  50S ribosomal protein L2", 1, {})).toEqual({
      id: "rplB",
      description: "50S ribosomal protein L2",
    });
  });

  test("should return the identifier alone when there is no description", () => {
    expect(parseFastaHeader(">tufA", 1, {})).toEqual({ id: "tufA" });
  });
});

describe("FastaUtils", () => {
  const fasta = ">a first\nAT\n>b\nGG";

  test("should detect FASTA data", () => {
    expect(FastaUtils.detectFormat(fasta)).toBe(true);
    expect(FastaUtils.detectFormat("ATCG")).toBe(false);
  });

  test("should count and list sequences without parsing", () => {
    expect(FastaUtils.countSequences(fasta)).toBe(2);
    expect(FastaUtils.extractIds(fasta)).toEqual(["a", "b"]);
  });
});
