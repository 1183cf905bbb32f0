/**
 * Process local claim files through the pipeline.
 *
 * Copies each file into object storage under a new claim id, runs the
 * claims with bounded concurrency and prints the outcome of each.
 *
 * Usage: npx tsx src/scripts/process-claims.ts [--concurrency=4] <file> [file...]
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { contentTypeFor } from "../services/clients/file-object-storage.js";
import { nextClaimId } from "../services/claim-id.js";
import { createContainer } from "../services/container.js";
import { processClaimBatch } from "../services/pipeline-runner.js";
import type { ClaimSubmission } from "../types/claim-context.js";

interface CliArgs {
  files: string[];
  concurrency: number;
}

function parseArgs(argv: string[]): CliArgs {
  const files: string[] = [];
  let concurrency = 4;

  for (const arg of argv) {
    if (arg.startsWith("--concurrency=")) {
      concurrency = Number(arg.slice("--concurrency=".length));
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new Error(`Invalid concurrency: ${arg}`);
      }
    } else {
      files.push(arg);
    }
  }

  if (files.length === 0) {
    throw new Error("Usage: process-claims [--concurrency=N] <file> [file...]");
  }
  return { files, concurrency };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const container = await createContainer();

  try {
    const bucket = `${container.config.BUCKET_PREFIX}-raw-claims`;
    const submissions: ClaimSubmission[] = [];

    for (const file of args.files) {
      const filename = path.basename(file);
      const claimId = nextClaimId();
      const key = `${claimId}/${filename}`;
      await container.objectStorage.put(
        bucket,
        key,
        await fs.promises.readFile(file),
        contentTypeFor(filename)
      );
      submissions.push({ claimId, source: { bucket, key } });
    }

    const batch = await processClaimBatch(container.pipeline, submissions, {
      concurrency: args.concurrency,
      trigger: "cli",
    });

    console.log("\nResults:");
    for (const result of batch.results) {
      if (result.state === "TERMINAL_DECIDED") {
        const { decision, confidence } = result.context.decisionData;
        console.log(`  ${result.claimId}: ${decision} (confidence ${confidence}, v${result.record.version})`);
      } else {
        console.log(`  ${result.claimId}: FAILED at ${result.failedStage}: ${result.failure.message}`);
      }
    }

    if (batch.failed > 0) process.exitCode = 1;
  } finally {
    container.close();
  }
}

main().catch((err: unknown) => {
  console.error("Processing failed:", err);
  process.exit(1);
});
