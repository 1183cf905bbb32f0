/**
 * Claim Artifacts Storage
 *
 * Content index for intake: extracted text, entities and extraction
 * metadata per uploaded file.
 */

import type Database from "better-sqlite3";
import type { ClaimArtifact, NewClaimArtifact } from "../types/capabilities.js";
import { createAppendOnlyStorage, dateReviver, generateId } from "./base.js";
import { createSqliteAppendOnlyTable } from "./sqlite.js";
import type { ArtifactRepository } from "./repository.js";

/** Extracted text beyond this length is cut before indexing */
export const MAX_ARTIFACT_TEXT_LENGTH = 50_000;

function toArtifact(input: NewClaimArtifact): ClaimArtifact {
  return {
    ...input,
    id: generateId(),
    extractedText: input.extractedText.slice(0, MAX_ARTIFACT_TEXT_LENGTH),
    indexedAt: new Date(),
  };
}

export function createJsonArtifactRepository(dir: string): ArtifactRepository {
  const storage = createAppendOnlyStorage<ClaimArtifact>(dir, dateReviver);

  return {
    async indexArtifact(input: NewClaimArtifact): Promise<ClaimArtifact> {
      return storage.insert(toArtifact(input));
    },

    async findByClaim(claimId: string): Promise<ClaimArtifact[]> {
      const artifacts = await storage.find((a) => a.claimId === claimId);
      return artifacts.sort((a, b) => a.indexedAt.getTime() - b.indexedAt.getTime());
    },
  };
}

export function createSqliteArtifactRepository(database: Database.Database): ArtifactRepository {
  const table = createSqliteAppendOnlyTable<ClaimArtifact>(database, "claim_artifacts", [
    { column: "claim_id", property: "claimId" },
    { column: "file_type", property: "fileType" },
  ]);

  return {
    async indexArtifact(input: NewClaimArtifact): Promise<ClaimArtifact> {
      return table.insert(toArtifact(input));
    },

    async findByClaim(claimId: string): Promise<ClaimArtifact[]> {
      return table.findAllByIndex("claim_id", claimId);
    },
  };
}
