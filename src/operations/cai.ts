/**
 * Codon Adaptation Index of a single gene
 *
 * CAI is the geometric mean of the index weights of a gene's codons
 * (Sharp & Li, Nucleic Acids Res. 1987;15(3):1281-95). Codons without a
 * synonymous alternative (ATG, TGG) and stop codons carry no information
 * about codon choice and are left out.
 */

import { type } from "arktype";
import { InvalidCodonError, MalformedSequenceLengthError, ValidationError } from "../errors";
import type { CaiOptions, CaiResult, Codon, CodonIndex } from "../types";
import { CaiOptionsSchema } from "../types";
import { isCodon, STOP_CODONS } from "./core/codon-table";

const DEFAULT_EXCLUDED: readonly Codon[] = ["ATG", "TGG", ...STOP_CODONS];

/**
 * Score a coding sequence against a codon weight index
 *
 * Codons whose weight is 0 would pull a geometric mean to zero; they are
 * skipped and counted in `zeroWeightCodons` instead.
 *
 * @param sequence Coding sequence, any case
 * @param index RCSU or NRCSU weights covering all 64 codons
 * @throws {InvalidCodonError} When a window is not one of the 64 codons
 * @throws {MalformedSequenceLengthError} When trailingBases is "error" and the length is not a multiple of 3
 *
 * @example
 * ```typescript
 * const { cai } = caiForGene("ATGTTTTTCTAA", indexer.getIndex("rcsu"));
 * ```
 */
export function caiForGene(
  sequence: string,
  index: CodonIndex,
  options: CaiOptions = {}
): CaiResult {
  const validationResult = CaiOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid CAI options: ${validationResult.summary}`);
  }

  const excluded = new Set<Codon>(options.excludeCodons ?? DEFAULT_EXCLUDED);
  const sequenceId = options.sequenceId ?? "<gene>";
  const dna = sequence.toUpperCase();

  if (dna.length % 3 !== 0 && options.trailingBases === "error") {
    throw new MalformedSequenceLengthError(sequenceId, dna.length);
  }

  let logSum = 0;
  let codonsScored = 0;
  let zeroWeightCodons = 0;

  for (let i = 0; i + 3 <= dna.length; i += 3) {
    const codon = dna.slice(i, i + 3);
    if (!isCodon(codon)) {
      throw new InvalidCodonError(codon, sequenceId, i + 1);
    }
    if (excluded.has(codon)) continue;

    const weight = index.get(codon) ?? 0;
    if (weight === 0) {
      zeroWeightCodons++;
      continue;
    }
    logSum += Math.log(weight);
    codonsScored++;
  }

  return {
    cai: codonsScored === 0 ? 0 : Math.exp(logSum / codonsScored),
    codonsScored,
    zeroWeightCodons,
  };
}
