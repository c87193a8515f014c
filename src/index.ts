/**
 * codon-bias - codon usage indices and Codon Adaptation Index scoring
 *
 * Counts codons over a set of coding sequences, derives RCSU and NRCSU
 * weight tables per synonymous group and scores genes against them.
 */

// Error types
export {
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
  StreamError,
  ValidationError,
} from "./errors";
// FASTA format
export { FastaParser, FastaUtils } from "./formats/fasta";
// File I/O infrastructure
export { FileReader } from "./io/file-reader";
export { StreamUtils } from "./io/stream-utils";
// Codon usage
export * from "./operations";
// Core types
export type {
  AminoAcidGroup,
  CaiOptions,
  CaiResult,
  Codon,
  CodonCount,
  CodonIndex,
  CodonUsageOptions,
  FastaSequence,
  FileMetadata,
  FilePath,
  FileReaderOptions,
  IndexEntry,
  IndexKind,
  IndexState,
  Nucleotide,
  ParserOptions,
  SequenceRecord,
  TrailingBasesPolicy,
} from "./types";
