/**
 * Tests for codon counting and the RCSU/NRCSU indexer
 */

import { describe, expect, test } from "vitest";
import {
  DuplicateIndexError,
  IndexNotBuiltError,
  InvalidCodonError,
  MalformedSequenceLengthError,
  ValidationError,
} from "../../src/errors";
import { FastaParser } from "../../src/formats/fasta";
import {
  CodonUsageIndexer,
  computeNrcsu,
  computeRcsu,
  rawNrcsu,
  rawRcsu,
  tallyCodons,
} from "../../src/operations/codon-usage";
import { CODONS, orderedGroups } from "../../src/operations/core/codon-table";
import type { SequenceRecord } from "../../src/types";

const EXAMPLE: SequenceRecord[] = [{ id: "seq1", sequence: "ATGATGTTTTTC" }];

function quietIndexer(records: SequenceRecord[]): { indexer: CodonUsageIndexer; warnings: string[] } {
  const warnings: string[] = [];
  const indexer = new CodonUsageIndexer(records, {
    onWarning: (warning) => warnings.push(warning),
  });
  return { indexer, warnings };
}

describe("tallyCodons", () => {
  test("should count every codon repeated in a single record", () => {
    for (const codon of CODONS) {
      const counts = tallyCodons([{ id: "r", sequence: codon.repeat(5) }]);

      expect(counts[codon]).toBe(5);
      expect(Object.values(counts).reduce((a, b) => a + b, 0)).toBe(5);
    }
  });

  test("should read lowercase sequences", () => {
    const counts = tallyCodons([{ id: "r", sequence: "atgatg" }]);
    expect(counts.ATG).toBe(2);
  });

  test("should accumulate across records", () => {
    const counts = tallyCodons([
      { id: "a", sequence: "ATGTTT" },
      { id: "b", sequence: "TTTTTC" },
    ]);

    expect(counts.ATG).toBe(1);
    expect(counts.TTT).toBe(2);
    expect(counts.TTC).toBe(1);
  });

  test("should drop a trailing fragment and warn by default", () => {
    const warnings: string[] = [];
    const counts = tallyCodons([{ id: "frag", sequence: "ATGA" }], {
      onWarning: (warning) => warnings.push(warning),
    });

    expect(counts.ATG).toBe(1);
    expect(warnings).toEqual(["sequence 'frag' is 4 bases long; dropping 1 trailing base(s)"]);
  });

  test("should reject a trailing fragment under the error policy", () => {
    expect(() => tallyCodons([{ id: "frag", sequence: "ATGAC" }], { trailingBases: "error" })).toThrow(
      MalformedSequenceLengthError
    );
  });

  test("should reject windows outside the codon alphabet", () => {
    try {
      tallyCodons([{ id: "bad", sequence: "ATGNNN" }]);
      expect.unreachable("expected InvalidCodonError");
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidCodonError);
      if (error instanceof InvalidCodonError) {
        expect(error.codon).toBe("NNN");
        expect(error.position).toBe(4);
        expect(error.code).toBe("INVALID_CODON");
        expect(error.message).toBe("Sequence 'bad': illegal codon 'NNN' at position 4");
      }
    }
  });
});

describe("index computation", () => {
  const leucine = tallyCodons([{ id: "leu", sequence: "CTGCTGCTGTTA" }]);

  test("should scale RCSU to the group maximum", () => {
    const rcsu = computeRcsu(leucine);

    expect(rcsu.get("CTG")).toBe(1);
    expect(rcsu.get("TTA")).toBeCloseTo(1 / 3, 10);
    expect(rcsu.get("CTC")).toBe(0);
  });

  test("should scale NRCSU to the group maximum", () => {
    const nrcsu = computeNrcsu(leucine);

    expect(nrcsu.get("CTG")).toBe(1);
    expect(nrcsu.get("TTA")).toBeCloseTo(1 / 3, 10);
  });

  test("should give unnormalized RCSU relative to uniform usage", () => {
    const values = rawRcsu(leucine);

    expect(values.get("CTG")).toBeCloseTo(4.5, 10);
    expect(values.get("TTA")).toBeCloseTo(1.5, 10);
  });

  test("should give unnormalized NRCSU as group proportions", () => {
    const values = rawNrcsu(leucine);

    expect(values.get("CTG")).toBe(0.75);
    expect(values.get("TTA")).toBe(0.25);
  });

  test("should differ between raw RCSU and raw NRCSU for non-uniform multi-codon groups", () => {
    expect(rawRcsu(leucine).get("CTG")).not.toBeCloseTo(rawNrcsu(leucine).get("CTG") ?? 0, 5);
  });

  test("should give all-zero groups zero weights without dividing by zero", () => {
    const rcsu = computeRcsu(leucine);
    const nrcsu = computeNrcsu(leucine);

    for (const codon of ["TGT", "TGC", "GCA", "TTT"] as const) {
      expect(rcsu.get(codon)).toBe(0);
      expect(nrcsu.get(codon)).toBe(0);
    }
  });

  test("should keep every weight within [0, 1] and reach 1.0 in each used group", () => {
    const counts = tallyCodons([
      { id: "mix", sequence: "GCAGCAGCCAAAAAGAAGTTTCGTCGTCGACGGATGTAA" },
    ]);

    for (const index of [computeRcsu(counts), computeNrcsu(counts)]) {
      expect(index.size).toBe(64);
      for (const weight of index.values()) {
        expect(weight).toBeGreaterThanOrEqual(0);
        expect(weight).toBeLessThanOrEqual(1);
      }
      for (const [, codons] of orderedGroups()) {
        const total = codons.reduce((sum, codon) => sum + counts[codon], 0);
        if (total > 0) {
          expect(Math.max(...codons.map((codon) => index.get(codon) ?? 0))).toBe(1);
        }
      }
    }
  });
});

describe("CodonUsageIndexer", () => {
  test("should count and index a single record", async () => {
    const { indexer } = quietIndexer(EXAMPLE);

    const counts = await indexer.countCodons();
    expect(counts.ATG).toBe(2);
    expect(counts.TTT).toBe(1);
    expect(counts.TTC).toBe(1);
    expect(Object.values(counts).reduce((a, b) => a + b, 0)).toBe(4);

    const rcsu = await indexer.buildRcsuIndex();
    expect(rcsu.get("ATG")).toBe(1);
    expect(rcsu.get("TTT")).toBe(1);
    expect(rcsu.get("TTC")).toBe(1);
    expect(rcsu.get("GCA")).toBe(0);

    const nrcsu = await indexer.buildNrcsuIndex();
    expect(nrcsu.get("TTT")).toBe(1);
    expect(nrcsu.get("TTC")).toBe(1);
  });

  test("should count records streamed from a FASTA parser", async () => {
    const parser = new FastaParser();
    const indexer = new CodonUsageIndexer(parser.parseString(">seq1\nATGATG\nTTTTTC"));

    const rcsu = await indexer.buildRcsuIndex();

    expect(indexer.getCounts()?.ATG).toBe(2);
    expect(rcsu.get("TTC")).toBe(1);
  });

  test("should count before building when no counts exist", async () => {
    const { indexer } = quietIndexer(EXAMPLE);
    expect(indexer.getCounts()).toBeUndefined();

    await indexer.buildNrcsuIndex();

    expect(indexer.getCounts()?.ATG).toBe(2);
    expect(indexer.isBuilt("nrcsu")).toBe(true);
    expect(indexer.isBuilt("rcsu")).toBe(false);
  });

  test("should produce identical indices for identical inputs", async () => {
    const first = quietIndexer(EXAMPLE).indexer;
    const second = quietIndexer(EXAMPLE).indexer;
    await first.buildRcsuIndex();
    await second.buildRcsuIndex();

    expect(first.entries("rcsu")).toEqual(second.entries("rcsu"));
  });

  test("should reject a second build of the same index", async () => {
    const { indexer } = quietIndexer(EXAMPLE);
    const first = await indexer.buildRcsuIndex();

    await expect(indexer.buildRcsuIndex()).rejects.toThrow(DuplicateIndexError);
    await expect(indexer.buildRcsuIndex()).rejects.toThrow(
      "an RCSU index has already been built for this indexer"
    );
    expect(indexer.getIndex("rcsu")).toBe(first);
  });

  test("should reject concurrent builds of the same index", async () => {
    const { indexer } = quietIndexer(EXAMPLE);

    const results = await Promise.allSettled([indexer.buildRcsuIndex(), indexer.buildRcsuIndex()]);

    expect(results.filter((result) => result.status === "fulfilled")).toHaveLength(1);
    const rejected = results.find((result) => result.status === "rejected");
    expect(rejected?.status === "rejected" && rejected.reason).toBeInstanceOf(DuplicateIndexError);
  });

  test("should build both indices from one count when started together", async () => {
    const parser = new FastaParser();
    const indexer = new CodonUsageIndexer(
      parser.parseString(">a\nTTTTTTTTT\n>b\nTTCTTCTTC\n>c\nCTGCTG\n>d\nTTATTA")
    );

    const [rcsu, nrcsu] = await Promise.all([indexer.buildRcsuIndex(), indexer.buildNrcsuIndex()]);

    const counts = indexer.getCounts();
    expect(counts?.TTT).toBe(3);
    expect(counts?.TTC).toBe(3);
    expect(counts?.CTG).toBe(2);
    expect(counts?.TTA).toBe(2);
    expect(rcsu.get("TTT")).toBe(1);
    expect(rcsu.get("TTC")).toBe(1);
    expect(nrcsu.get("TTT")).toBe(1);
    expect(nrcsu.get("TTC")).toBe(1);
    expect(nrcsu.get("TTA")).toBe(1);
    expect(indexer.isStale("rcsu")).toBe(false);
    expect(indexer.isStale("nrcsu")).toBe(false);
  });

  test("should refuse to recount a single-use source that has been read", async () => {
    const indexer = new CodonUsageIndexer(new FastaParser().parseString(">a\nTTTTTC"));
    await indexer.buildRcsuIndex();

    await expect(indexer.countCodons()).rejects.toThrow(ValidationError);
    await expect(indexer.countCodons()).rejects.toThrow(
      "The configured record source is single-use and has already been read"
    );
    expect(indexer.getCounts()?.TTT).toBe(1);
    expect(indexer.isStale("rcsu")).toBe(false);

    const recounted = await indexer.countCodons([{ id: "b", sequence: "TTC" }]);
    expect(recounted.TTC).toBe(1);
    expect(recounted.TTT).toBe(0);
  });

  test("should recount a reusable source", async () => {
    const { indexer } = quietIndexer(EXAMPLE);
    await indexer.countCodons();

    const counts = await indexer.countCodons();

    expect(counts.ATG).toBe(2);
  });

  test("should report an unbuilt index", () => {
    const { indexer } = quietIndexer(EXAMPLE);
    expect(() => indexer.getIndex("rcsu")).toThrow(IndexNotBuiltError);
  });

  test("should leave counts untouched when a record holds an invalid codon", async () => {
    const { indexer } = quietIndexer([
      { id: "good", sequence: "ATG" },
      { id: "bad", sequence: "ATGNNN" },
    ]);

    await expect(indexer.countCodons()).rejects.toThrow(InvalidCodonError);
    expect(indexer.getCounts()).toBeUndefined();

    await indexer.countCodons([{ id: "ok", sequence: "TTT" }]);
    await expect(indexer.countCodons([{ id: "bad", sequence: "NNN" }])).rejects.toThrow(
      "illegal codon 'NNN'"
    );
    expect(indexer.getCounts()?.TTT).toBe(1);
  });

  test("should reject invalid codons arriving through a FASTA parser", async () => {
    const indexer = new CodonUsageIndexer(new FastaParser().parseString(">seq1\nATGNNN"));

    await expect(indexer.buildRcsuIndex()).rejects.toThrow(InvalidCodonError);
    expect(indexer.isBuilt("rcsu")).toBe(false);
  });

  test("should close the record source when counting fails", async () => {
    let closed = false;
    async function* source(): AsyncIterable<SequenceRecord> {
      try {
        yield { id: "a", sequence: "NNN" };
        yield { id: "b", sequence: "ATG" };
      } finally {
        closed = true;
      }
    }

    const indexer = new CodonUsageIndexer(source());

    await expect(indexer.countCodons()).rejects.toThrow(InvalidCodonError);
    expect(closed).toBe(true);
  });

  test("should apply the trailing-base policy", async () => {
    const records = [{ id: "frag", sequence: "ATGTT" }];

    const dropping = quietIndexer(records);
    const counts = await dropping.indexer.countCodons();
    expect(counts.ATG).toBe(1);
    expect(dropping.warnings).toEqual([
      "sequence 'frag' is 5 bases long; dropping 2 trailing base(s)",
    ]);

    const strict = new CodonUsageIndexer(records, { trailingBases: "error" });
    await expect(strict.countCodons()).rejects.toThrow(
      "Sequence 'frag': length 5 is not a multiple of 3 (2 trailing bases)"
    );
  });

  test("should flag an index built from replaced counts as stale", async () => {
    const { indexer, warnings } = quietIndexer(EXAMPLE);
    await indexer.countCodons();
    await indexer.buildRcsuIndex();
    expect(indexer.isStale("rcsu")).toBe(false);

    await indexer.countCodons();

    expect(indexer.isStale("rcsu")).toBe(true);
    expect(indexer.isStale("nrcsu")).toBe(false);
    expect(warnings).toEqual(["RCSU index was built from earlier counts and is now stale"]);
  });

  test("should format indices as sorted tab-separated lines", async () => {
    const { indexer } = quietIndexer(EXAMPLE);
    await indexer.buildRcsuIndex();

    const lines = indexer.formatIndex("rcsu").split("\n");

    expect(lines).toHaveLength(64);
    expect(lines[0]).toBe("AAA\t0.000");
    expect(lines.slice(60)).toEqual(["TTA\t0.000", "TTC\t1.000", "TTG\t0.000", "TTT\t1.000"]);
    expect(lines).toContain("ATG\t1.000");
  });

  test("should round displayed weights to the configured precision", async () => {
    const indexer = new CodonUsageIndexer([{ id: "leu", sequence: "CTGCTGCTGTTA" }], {
      precision: 2,
    });
    await indexer.buildNrcsuIndex();

    const entries = indexer.entries("nrcsu");
    const tta = entries.find((entry) => entry.codon === "TTA");

    expect(tta?.display).toBe("0.33");
    expect(tta?.weight).toBeCloseTo(1 / 3, 10);
  });

  test("should print each index line to the sink", async () => {
    const { indexer } = quietIndexer(EXAMPLE);
    await indexer.buildNrcsuIndex();
    const printed: string[] = [];

    indexer.printIndex("nrcsu", (line) => printed.push(line));

    expect(printed).toEqual(indexer.formatIndex("nrcsu").split("\n"));
  });

  test("should reject invalid options", () => {
    expect(() => new CodonUsageIndexer([], { precision: 11 })).toThrow(ValidationError);
    expect(() => new CodonUsageIndexer([], { precision: 2.5 })).toThrow(ValidationError);
  });
});
