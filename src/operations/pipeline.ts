/**
 * Codon bias pipeline
 *
 * Composes a sequence provider with an optional highly-expressed-gene
 * selector and runs one indexer over the selected records. Where the
 * sequences come from (an upload, a downloaded genome, an alignment-filtered
 * subset) is up to the provider; how the reference genes are picked is up to
 * the selector.
 *
 * @example
 * ```typescript
 * const pipeline = new CodonBiasPipeline(
 *   new FastaFileProvider("genome-cds.fasta"),
 *   new IdListSelector(["rpsA", "tufA", "fusA"])
 * );
 * const { rcsu, nrcsu } = await pipeline.run();
 * ```
 */

import { ValidationError } from "../errors";
import { FastaParser } from "../formats/fasta";
import type {
  CodonCount,
  CodonIndex,
  CodonUsageOptions,
  FileReaderOptions,
  ParserOptions,
  SequenceRecord,
} from "../types";
import { CodonUsageIndexer } from "./codon-usage";

/**
 * Supplies the CDS records to analyse
 */
export interface SequenceProvider {
  sequences(): AsyncIterable<SequenceRecord>;
}

/**
 * Picks the identifiers of the genes the indices should be computed over
 */
export interface HighlyExpressedGeneSelector {
  select(records: readonly SequenceRecord[]): Promise<ReadonlySet<string>>;
}

/**
 * Records parsed from FASTA text
 */
export class FastaTextProvider implements SequenceProvider {
  constructor(
    private readonly text: string,
    private readonly parserOptions: ParserOptions = {}
  ) {}

  sequences(): AsyncIterable<SequenceRecord> {
    return new FastaParser(this.parserOptions).parseString(this.text);
  }
}

/**
 * Records streamed from a FASTA file
 */
export class FastaFileProvider implements SequenceProvider {
  constructor(
    private readonly filePath: string,
    private readonly parserOptions: ParserOptions = {},
    private readonly fileOptions: FileReaderOptions = {}
  ) {}

  sequences(): AsyncIterable<SequenceRecord> {
    return new FastaParser(this.parserOptions).parseFile(this.filePath, this.fileOptions);
  }
}

/**
 * Records already in memory
 */
export class RecordListProvider implements SequenceProvider {
  constructor(private readonly records: readonly SequenceRecord[]) {}

  async *sequences(): AsyncIterable<SequenceRecord> {
    yield* this.records;
  }
}

/**
 * Selects a fixed list of identifiers
 */
export class IdListSelector implements HighlyExpressedGeneSelector {
  private readonly ids: ReadonlySet<string>;

  constructor(ids: Iterable<string>) {
    this.ids = new Set(ids);
  }

  async select(): Promise<ReadonlySet<string>> {
    return this.ids;
  }
}

export interface CodonBiasResult {
  /** Indexer holding the counts and both built indices */
  readonly indexer: CodonUsageIndexer;
  readonly counts: CodonCount;
  readonly rcsu: CodonIndex;
  readonly nrcsu: CodonIndex;
  /** Records supplied by the provider */
  readonly recordCount: number;
  /** Identifiers of the records the indices were computed over */
  readonly selectedIds: readonly string[];
}

/**
 * Provider + optional selector + indexer
 */
export class CodonBiasPipeline {
  private readonly onWarning: (warning: string) => void;

  constructor(
    private readonly provider: SequenceProvider,
    private readonly selector?: HighlyExpressedGeneSelector,
    private readonly options: CodonUsageOptions = {}
  ) {
    this.onWarning =
      options.onWarning ??
      ((warning: string): void => {
        console.warn(`Codon bias pipeline warning: ${warning}`);
      });
  }

  /**
   * Collect records, apply the selection and build both indices
   *
   * @throws {ValidationError} When the selection matches none of the records
   */
  async run(): Promise<CodonBiasResult> {
    const records: SequenceRecord[] = [];
    for await (const record of this.provider.sequences()) {
      records.push(record);
    }

    const selected = this.selector ? await this.applySelection(records, this.selector) : records;

    const indexer = new CodonUsageIndexer(selected, { ...this.options, onWarning: this.onWarning });
    const counts = await indexer.countCodons();
    const rcsu = await indexer.buildRcsuIndex();
    const nrcsu = await indexer.buildNrcsuIndex();

    return {
      indexer,
      counts,
      rcsu,
      nrcsu,
      recordCount: records.length,
      selectedIds: selected.map((record) => record.id),
    };
  }

  private async applySelection(
    records: readonly SequenceRecord[],
    selector: HighlyExpressedGeneSelector
  ): Promise<SequenceRecord[]> {
    const ids = await selector.select(records);
    const present = new Set(records.map((record) => record.id));
    const missing = [...ids].filter((id) => !present.has(id));

    if (missing.length > 0) {
      this.onWarning(
        `${missing.length} selected identifier(s) not found among the sequences: ${missing.join(", ")}`
      );
    }

    const selected = records.filter((record) => ids.has(record.id));
    if (selected.length === 0) {
      throw new ValidationError(
        "No sequences matched the highly expressed gene selection",
        undefined,
        `${records.length} sequences, ${ids.size} selected identifiers`
      );
    }
    return selected;
  }
}
