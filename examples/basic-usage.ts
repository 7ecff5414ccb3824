#!/usr/bin/env -S npx tsx
/**
 * Building, serving and serializing a browser configuration
 *
 * Writes a small BED file to a temporary directory, serves it next to a
 * remote annotation track, and prints the JSON a renderer would receive.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildConfiguration,
  Session,
  stringifyConfiguration,
  UnknownTrackTypeError,
} from "../src/index";

// ============================================================================
// Example 1: Configuration from plain data
// ============================================================================

function example1_buildConfiguration() {
  console.log("\n=== Example 1: Configuration from plain data ===\n");

  const config = buildConfiguration({
    genome: "hg38",
    locus: "chr8:127,736,588-127,739,371",
    tracks: [
      {
        name: "reads",
        url: "https://example.org/HG00103.cram",
        indexURL: "https://example.org/HG00103.cram.crai",
      },
      { name: "coverage", url: "https://example.org/HG00103.bw", autoscale: true },
    ],
  });

  for (const track of config.tracks ?? []) {
    console.log(`  ${track.name}: ${track.type}`);
  }

  try {
    buildConfiguration({ tracks: [{ name: "mystery", url: "https://example.org/data.xyz" }] });
  } catch (error) {
    if (!(error instanceof UnknownTrackTypeError)) throw error;
    console.log(`  rejected: ${error.message}`);
  }
}

// ============================================================================
// Example 2: Serving local files from a session
// ============================================================================

async function example2_session() {
  console.log("\n=== Example 2: Serving local files from a session ===\n");

  const dir = mkdtempSync(join(tmpdir(), "tracksmith-example-"));
  const peaks = join(dir, "peaks.bed");
  writeFileSync(peaks, "chr8\t127736588\t127737000\tpeak1\n");

  const session = new Session({ genome: "hg38" });
  try {
    session.setLocus("chr8:127,736,000-127,740,000");
    const config = session.browse(peaks, "https://example.org/genes.gff3.gz");
    const served = await session.servable(config);

    console.log(stringifyConfiguration(served, { pretty: true }));
    console.log(`\n  serving ${(await session.resources()).length} local file(s)`);
  } finally {
    await session.dispose();
    rmSync(dir, { recursive: true, force: true });
  }
}

async function main() {
  example1_buildConfiguration();
  await example2_session();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
