/**
 * Codon usage indices for codon adaptation analysis
 *
 * Counts codon occurrences over a set of coding sequences and derives two
 * per-codon weight tables, normalized within each synonymous group:
 *
 * - RCSU (relative synonymous codon usage): count divided by the count every
 *   codon would have under uniform synonymous usage, then scaled so the most
 *   used codon of the group weighs 1.0.
 * - NRCSU: count divided by the group total (the raw usage proportion), then
 *   scaled the same way. No correction for the number of synonymous codons.
 *
 * An indexer is single-use: construct it over a record source, count, build
 * each index once, read or report, discard. Building an index kind twice
 * raises DuplicateIndexError rather than overwriting the first result.
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * const indexer = new CodonUsageIndexer(parser.parseFile("highly-expressed.fasta"));
 * await indexer.buildRcsuIndex();
 * indexer.printIndex("rcsu");
 * ```
 */

import { type } from "arktype";
import {
  DuplicateIndexError,
  IndexNotBuiltError,
  InvalidCodonError,
  MalformedSequenceLengthError,
  ValidationError,
} from "../errors";
import type {
  CaiOptions,
  CaiResult,
  Codon,
  CodonCount,
  CodonIndex,
  CodonUsageOptions,
  IndexEntry,
  IndexKind,
  IndexState,
  SequenceRecord,
  TrailingBasesPolicy,
} from "../types";
import { CodonUsageOptionsSchema } from "../types";
import { caiForGene } from "./cai";
import { codonTemplate, isCodon, orderedGroups } from "./core/codon-table";

/**
 * Anything that yields CDS records: an array, a FASTA parser's output, a generator
 */
export type RecordSource = Iterable<SequenceRecord> | AsyncIterable<SequenceRecord>;

/**
 * Settings consulted while scanning sequences into codons
 */
export interface TallyOptions {
  readonly trailingBases: TrailingBasesPolicy;
  readonly onWarning: (warning: string) => void;
}

const DEFAULT_TALLY_OPTIONS: TallyOptions = {
  trailingBases: "drop",
  onWarning: (warning: string): void => {
    console.warn(`Codon usage warning: ${warning}`);
  },
};

// =============================================================================
// COUNTING
// =============================================================================

/**
 * Add the codons of one record to a count table
 *
 * The sequence is uppercased and read in non-overlapping windows from the
 * first base. A trailing fragment shorter than a codon is dropped or
 * rejected according to `trailingBases`.
 *
 * @throws {InvalidCodonError} When a window is not one of the 64 codons
 * @throws {MalformedSequenceLengthError} When trailingBases is "error" and the length is not a multiple of 3
 */
export function tallyRecord(
  counts: CodonCount,
  record: SequenceRecord,
  options: TallyOptions = DEFAULT_TALLY_OPTIONS
): void {
  const dna = record.sequence.toUpperCase();
  const trailing = dna.length % 3;

  if (trailing !== 0) {
    if (options.trailingBases === "error") {
      throw new MalformedSequenceLengthError(record.id, dna.length);
    }
    options.onWarning(
      `sequence '${record.id}' is ${dna.length} bases long; dropping ${trailing} trailing base(s)`
    );
  }

  for (let i = 0; i + 3 <= dna.length; i += 3) {
    const codon = dna.slice(i, i + 3);
    if (!isCodon(codon)) {
      throw new InvalidCodonError(codon, record.id, i + 1);
    }
    counts[codon] += 1;
  }
}

/**
 * Count codons over in-memory records
 *
 * @returns A fresh count table covering all 64 codons
 */
export function tallyCodons(
  records: Iterable<SequenceRecord>,
  options: Partial<TallyOptions> = {}
): CodonCount {
  const merged = { ...DEFAULT_TALLY_OPTIONS, ...options };
  const counts = codonTemplate();
  for (const record of records) {
    tallyRecord(counts, record, merged);
  }
  return counts;
}

// =============================================================================
// INDEX COMPUTATION
// =============================================================================

/**
 * Scale each group so its largest value becomes 1.0; an all-zero group stays zero
 */
function normalizeGroups(values: CodonIndex): CodonIndex {
  const weights = new Map<Codon, number>();

  for (const [, codons] of orderedGroups()) {
    const groupValues = codons.map((codon) => values.get(codon) ?? 0);
    const max = Math.max(...groupValues);
    codons.forEach((codon, i) => {
      weights.set(codon, max === 0 ? 0 : (groupValues[i] ?? 0) / max);
    });
  }

  return weights;
}

function groupTotal(counts: CodonCount, codons: readonly Codon[]): number {
  let total = 0;
  for (const codon of codons) {
    total += counts[codon];
  }
  return total;
}

/**
 * Unnormalized RCSU values: count / (group total / group size)
 *
 * A value of 1 means the codon is used exactly as often as uniform
 * synonymous usage would predict.
 */
export function rawRcsu(counts: CodonCount): CodonIndex {
  const values = new Map<Codon, number>();

  for (const [, codons] of orderedGroups()) {
    const denominator = groupTotal(counts, codons) / codons.length;
    for (const codon of codons) {
      values.set(codon, denominator === 0 ? 0 : counts[codon] / denominator);
    }
  }

  return values;
}

/**
 * RCSU weights: raw RCSU scaled to the group maximum
 */
export function computeRcsu(counts: CodonCount): CodonIndex {
  return normalizeGroups(rawRcsu(counts));
}

/**
 * Unnormalized NRCSU values: each codon's share of its group's usage
 */
export function rawNrcsu(counts: CodonCount): CodonIndex {
  const proportions = new Map<Codon, number>();

  for (const [, codons] of orderedGroups()) {
    const total = groupTotal(counts, codons);
    for (const codon of codons) {
      proportions.set(codon, total === 0 ? 0 : counts[codon] / total);
    }
  }

  return proportions;
}

/**
 * NRCSU weights: raw NRCSU scaled to the group maximum
 */
export function computeNrcsu(counts: CodonCount): CodonIndex {
  return normalizeGroups(rawNrcsu(counts));
}

const INDEX_BUILDERS: Record<IndexKind, (counts: CodonCount) => CodonIndex> = {
  rcsu: computeRcsu,
  nrcsu: computeNrcsu,
};

// =============================================================================
// INDEXER
// =============================================================================

/**
 * Builds RCSU and NRCSU codon weight tables from a set of coding sequences
 */
export class CodonUsageIndexer {
  private readonly options: Required<CodonUsageOptions>;
  private counts: CodonCount | undefined;
  private countCycle = 0;
  private counting: Promise<CodonCount> | undefined;
  private sourceConsumed = false;
  private readonly indices: Record<IndexKind, IndexState> = {
    rcsu: { status: "unbuilt" },
    nrcsu: { status: "unbuilt" },
  };

  /**
   * @param source Records counted when an index is built before any explicit count
   * @param options Trailing-base policy, display precision and warning sink
   */
  constructor(
    private readonly source: RecordSource,
    options: CodonUsageOptions = {}
  ) {
    const validationResult = CodonUsageOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid codon usage options: ${validationResult.summary}`,
        undefined,
        "trailingBases must be 'drop' or 'error'; precision an integer from 0 to 10"
      );
    }

    this.options = {
      trailingBases: options.trailingBases ?? DEFAULT_TALLY_OPTIONS.trailingBases,
      precision: options.precision ?? 3,
      onWarning: options.onWarning ?? DEFAULT_TALLY_OPTIONS.onWarning,
    };
  }

  /**
   * Count codon occurrences, replacing any previous counts
   *
   * Counts accumulate in a fresh table that is committed only once every
   * record has been scanned, so a failure leaves the previous state in place.
   * The record source is closed on every exit path.
   *
   * A single-use source (a generator or a parser's output) can be counted
   * from only once; later cycles must pass their records explicitly.
   *
   * @param records Records to count (default: the constructor's source)
   * @returns A copy of the committed counts
   * @throws {ValidationError} When the constructor's source was an iterator that has already been read
   * @throws {InvalidCodonError} When a record contains a window outside the codon alphabet
   * @throws {MalformedSequenceLengthError} When trailingBases is "error" and a record is not codon-aligned
   */
  async countCodons(records?: RecordSource): Promise<CodonCount> {
    return { ...(await this.startCounting(records ?? this.source)) };
  }

  /**
   * Build the RCSU index
   * @throws {DuplicateIndexError} When the RCSU index was already built
   */
  async buildRcsuIndex(): Promise<CodonIndex> {
    return this.buildIndex("rcsu");
  }

  /**
   * Build the NRCSU index
   * @throws {DuplicateIndexError} When the NRCSU index was already built
   */
  async buildNrcsuIndex(): Promise<CodonIndex> {
    return this.buildIndex("nrcsu");
  }

  /**
   * Built weights of one index kind, at full precision
   * @throws {IndexNotBuiltError}
   */
  getIndex(kind: IndexKind): CodonIndex {
    const state = this.indices[kind];
    if (state.status === "unbuilt") {
      throw new IndexNotBuiltError(kind);
    }
    return state.weights;
  }

  isBuilt(kind: IndexKind): boolean {
    return this.indices[kind].status === "built";
  }

  /**
   * Whether the index was built from counts that have since been replaced
   */
  isStale(kind: IndexKind): boolean {
    const state = this.indices[kind];
    return state.status === "built" && state.builtFromCycle !== this.countCycle;
  }

  /**
   * Current counts, or undefined before the first counting cycle
   */
  getCounts(): CodonCount | undefined {
    return this.counts ? { ...this.counts } : undefined;
  }

  /**
   * Index entries sorted by codon, with display-rounded weights
   */
  entries(kind: IndexKind): IndexEntry[] {
    return [...this.getIndex(kind)]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([codon, weight]) => ({
        codon,
        weight,
        display: weight.toFixed(this.options.precision),
      }));
  }

  /**
   * Render an index as sorted `CODON\tWEIGHT` lines
   */
  formatIndex(kind: IndexKind): string {
    return this.entries(kind)
      .map((entry) => `${entry.codon}\t${entry.display}`)
      .join("\n");
  }

  /**
   * Write each `CODON\tWEIGHT` line of an index to a sink
   */
  printIndex(kind: IndexKind, sink: (line: string) => void = console.log): void {
    for (const entry of this.entries(kind)) {
      sink(`${entry.codon}\t${entry.display}`);
    }
  }

  /**
   * Score a gene against one of this indexer's built indices
   */
  caiForGene(sequence: string, kind: IndexKind = "rcsu", options: CaiOptions = {}): CaiResult {
    return caiForGene(sequence, this.getIndex(kind), {
      trailingBases: this.options.trailingBases,
      ...options,
    });
  }

  private async buildIndex(kind: IndexKind): Promise<CodonIndex> {
    if (this.indices[kind].status === "built") {
      throw new DuplicateIndexError(kind);
    }

    // builds started together share one counting cycle
    const counts = this.counts ?? (await (this.counting ?? this.startCounting(this.source)));

    // another build of the same kind may have finished while counting
    if (this.isBuilt(kind)) {
      throw new DuplicateIndexError(kind);
    }

    const weights = INDEX_BUILDERS[kind](counts);
    this.indices[kind] = { status: "built", weights, builtFromCycle: this.countCycle };
    return weights;
  }

  /**
   * Begin a counting cycle and record it as in flight until it settles
   */
  private startCounting(records: RecordSource): Promise<CodonCount> {
    if (records === this.source) {
      if (this.sourceConsumed) {
        throw new ValidationError(
          "The configured record source is single-use and has already been read",
          undefined,
          "Pass the records to countCodons() explicitly to count again"
        );
      }
      this.sourceConsumed = isSingleUse(records);
    }

    const cycle = this.tally(records).finally(() => {
      if (this.counting === cycle) {
        this.counting = undefined;
      }
    });
    this.counting = cycle;
    return cycle;
  }

  /**
   * Count into a fresh table and commit it once every record has been scanned
   */
  private async tally(records: RecordSource): Promise<CodonCount> {
    const counts = codonTemplate();

    for await (const record of records) {
      tallyRecord(counts, record, this.options);
    }

    this.counts = counts;
    this.countCycle += 1;

    for (const kind of ["rcsu", "nrcsu"] as const) {
      if (this.isStale(kind)) {
        this.options.onWarning(
          `${kind.toUpperCase()} index was built from earlier counts and is now stale`
        );
      }
    }

    return counts;
  }
}

/**
 * Iterators (generators, parser output) can be walked only once; arrays and
 * other iterables hand out a fresh iterator every time
 */
function isSingleUse(source: RecordSource): boolean {
  return "next" in source && typeof source.next === "function";
}
