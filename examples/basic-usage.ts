/**
 * Codon usage indices and CAI scoring from in-memory FASTA
 */

import { CodonBiasPipeline, FastaTextProvider, IdListSelector } from "../src";

const CDS = `>rplB 50S ribosomal protein L2
ATGGCTGTTGTTAAATGTAAACCGACTTCTCCGGGTCGTCGTCACGTAGTTAAAGTTGTTAACCCGGAG
>tufA elongation factor Tu
ATGTCTAAAGAAAAATTTGAACGTACAAAACCGCACGTTAACGTTGGTACTATCGGCCACGTTGAC
>yfgL hypothetical protein
ATGCTGCTGCTCTCGAGCAGCCTGATCGCGCTGGCGCTGTTGTTATAA`;

// ============================================================================
// Example 1: Indices over the ribosomal and elongation factor genes
// ============================================================================

async function example1_indices(): Promise<void> {
  console.log("\n=== Example 1: RCSU index over highly expressed genes ===\n");

  const pipeline = new CodonBiasPipeline(
    new FastaTextProvider(CDS),
    new IdListSelector(["rplB", "tufA"])
  );
  const { indexer, selectedIds } = await pipeline.run();

  console.log(`Indexed ${selectedIds.join(", ")}`);
  indexer.printIndex("rcsu");
}

// ============================================================================
// Example 2: Scoring a gene against both indices
// ============================================================================

async function example2_scoring(): Promise<void> {
  console.log("\n=== Example 2: CAI of a poorly adapted gene ===\n");

  const { indexer } = await new CodonBiasPipeline(
    new FastaTextProvider(CDS),
    new IdListSelector(["rplB", "tufA"])
  ).run();

  const gene = "ATGCTGCTGCTCTCGAGCAGCCTGATCGCGCTGGCGCTGTTGTTATAA";
  for (const kind of ["rcsu", "nrcsu"] as const) {
    const { cai, codonsScored, zeroWeightCodons } = indexer.caiForGene(gene, kind);
    console.log(
      `${kind.toUpperCase()}: CAI ${cai.toFixed(3)} over ${codonsScored} codons (${zeroWeightCodons} unseen)`
    );
  }
}

async function main(): Promise<void> {
  await example1_indices();
  await example2_scoring();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
