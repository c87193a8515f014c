/**
 * Standard genetic code reference data for codon usage statistics
 *
 * The 64 DNA codons and their grouping into the 21 synonymous classes of
 * NCBI table 1 (20 amino acids plus stop). Alternative genetic codes are not
 * represented: only synonymy under the standard table is considered.
 *
 * Per-group codon order is fixed. Index computations sum and normalize in
 * this order, so results do not depend on object key iteration.
 *
 * @module codon-table
 */

import type { AminoAcidGroup, Codon, Nucleotide } from "../../types";

const NUCLEOTIDES: readonly Nucleotide[] = ["T", "C", "A", "G"];

/**
 * All 64 codons, TCAG order by position
 */
const CODONS: readonly Codon[] = Object.freeze(
  NUCLEOTIDES.flatMap((first) =>
    NUCLEOTIDES.flatMap((second) =>
      NUCLEOTIDES.map((third) => `${first}${second}${third}` as const)
    )
  )
);

/**
 * Count accumulator template; every codon at zero
 */
const ZERO_COUNTS: Readonly<Record<Codon, number>> = Object.freeze({
  TTT: 0, TTC: 0, TTA: 0, TTG: 0, TCT: 0, TCC: 0, TCA: 0, TCG: 0,
  TAT: 0, TAC: 0, TAA: 0, TAG: 0, TGT: 0, TGC: 0, TGA: 0, TGG: 0,
  CTT: 0, CTC: 0, CTA: 0, CTG: 0, CCT: 0, CCC: 0, CCA: 0, CCG: 0,
  CAT: 0, CAC: 0, CAA: 0, CAG: 0, CGT: 0, CGC: 0, CGA: 0, CGG: 0,
  ATT: 0, ATC: 0, ATA: 0, ATG: 0, ACT: 0, ACC: 0, ACA: 0, ACG: 0,
  AAT: 0, AAC: 0, AAA: 0, AAG: 0, AGT: 0, AGC: 0, AGA: 0, AGG: 0,
  GTT: 0, GTC: 0, GTA: 0, GTG: 0, GCT: 0, GCC: 0, GCA: 0, GCG: 0,
  GAT: 0, GAC: 0, GAA: 0, GAG: 0, GGT: 0, GGC: 0, GGA: 0, GGG: 0,
});

/**
 * Which codons encode the same amino acid
 */
const SYNONYMOUS_CODONS: Readonly<Record<AminoAcidGroup, readonly Codon[]>> = {
  CYS: ["TGT", "TGC"],
  ASP: ["GAT", "GAC"],
  SER: ["TCT", "TCG", "TCA", "TCC", "AGC", "AGT"],
  GLN: ["CAA", "CAG"],
  MET: ["ATG"],
  ASN: ["AAC", "AAT"],
  PRO: ["CCT", "CCG", "CCA", "CCC"],
  LYS: ["AAG", "AAA"],
  STOP: ["TAG", "TGA", "TAA"],
  THR: ["ACC", "ACA", "ACG", "ACT"],
  PHE: ["TTT", "TTC"],
  ALA: ["GCA", "GCC", "GCG", "GCT"],
  GLY: ["GGT", "GGG", "GGA", "GGC"],
  ILE: ["ATC", "ATA", "ATT"],
  LEU: ["TTA", "TTG", "CTC", "CTT", "CTG", "CTA"],
  HIS: ["CAT", "CAC"],
  ARG: ["CGA", "CGC", "CGG", "CGT", "AGG", "AGA"],
  TRP: ["TGG"],
  VAL: ["GTA", "GTC", "GTG", "GTT"],
  GLU: ["GAG", "GAA"],
  TYR: ["TAT", "TAC"],
};
Object.freeze(SYNONYMOUS_CODONS);
for (const codons of Object.values(SYNONYMOUS_CODONS)) {
  Object.freeze(codons);
}

/** Group labels in declaration order */
const GROUP_ORDER: readonly AminoAcidGroup[] = [
  "CYS", "ASP", "SER", "GLN", "MET", "ASN", "PRO", "LYS", "STOP", "THR", "PHE",
  "ALA", "GLY", "ILE", "LEU", "HIS", "ARG", "TRP", "VAL", "GLU", "TYR",
];

const CODON_SET: ReadonlySet<string> = new Set<string>(CODONS);

const GROUP_BY_CODON: ReadonlyMap<Codon, AminoAcidGroup> = new Map(
  GROUP_ORDER.flatMap((group) => SYNONYMOUS_CODONS[group].map((codon) => [codon, group] as const))
);

/** Stop codons of the standard table */
const STOP_CODONS: readonly Codon[] = SYNONYMOUS_CODONS.STOP;

/**
 * Fresh count accumulator with every codon at zero
 */
export function codonTemplate(): Record<Codon, number> {
  return { ...ZERO_COUNTS };
}

/**
 * The synonymous groups, each with its codons in fixed order
 */
export function synonymousGroups(): Readonly<Record<AminoAcidGroup, readonly Codon[]>> {
  return SYNONYMOUS_CODONS;
}

/**
 * Synonymous groups as ordered [label, codons] pairs
 */
export function orderedGroups(): ReadonlyArray<readonly [AminoAcidGroup, readonly Codon[]]> {
  return GROUP_ORDER.map((group) => [group, SYNONYMOUS_CODONS[group]] as const);
}

/**
 * Check whether a string is one of the 64 codons
 */
export function isCodon(value: string): value is Codon {
  return CODON_SET.has(value);
}

/**
 * Group label of a codon
 */
export function groupOf(codon: Codon): AminoAcidGroup {
  const group = GROUP_BY_CODON.get(codon);
  if (group === undefined) {
    // unreachable while the group table covers all 64 codons
    throw new Error(`codon ${codon} is missing from the synonymous group table`);
  }
  return group;
}

export const CodonTable = {
  codons: CODONS,
  stopCodons: STOP_CODONS,
  codonTemplate,
  synonymousGroups,
  orderedGroups,
  isCodon,
  groupOf,
} as const;

export { CODONS, GROUP_ORDER, STOP_CODONS, SYNONYMOUS_CODONS };
