/**
 * Codon usage operations
 */

export { caiForGene } from "./cai";
export {
  CodonUsageIndexer,
  computeNrcsu,
  computeRcsu,
  rawNrcsu,
  rawRcsu,
  type RecordSource,
  tallyCodons,
  tallyRecord,
  type TallyOptions,
} from "./codon-usage";
export {
  CODONS,
  CodonTable,
  codonTemplate,
  GROUP_ORDER,
  groupOf,
  isCodon,
  orderedGroups,
  STOP_CODONS,
  SYNONYMOUS_CODONS,
  synonymousGroups,
} from "./core/codon-table";
export {
  CodonBiasPipeline,
  type CodonBiasResult,
  FastaFileProvider,
  FastaTextProvider,
  type HighlyExpressedGeneSelector,
  IdListSelector,
  RecordListProvider,
  type SequenceProvider,
} from "./pipeline";
