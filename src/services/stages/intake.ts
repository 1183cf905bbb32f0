/**
 * Intake Stage
 *
 * Extracts content from the uploaded document (text extraction for PDFs,
 * image analysis for photos), parses claim entities from it and indexes the
 * result in the content index.
 */

import type {
  ClaimSubmission,
  ExtractedData,
  FileType,
  IntakeContext,
  StorageLocation,
} from "../../types/claim-context.js";
import type { ContentIndex, ImageAnalyzer, TextExtractor } from "../../types/capabilities.js";
import { extendContext } from "../claim-context.js";
import { extractEntities } from "../entity-extractor.js";
import { InputError, errorMessage } from "../errors.js";
import {
  PipelineStage,
  type StageDependencies,
  type StageOptions,
  type StageOutcome,
} from "./stage.js";

/** Label detection parameters for claim photos */
export const IMAGE_MAX_LABELS = 10;
export const IMAGE_MIN_CONFIDENCE = 70;

const IMAGE_EXTENSIONS = new Set(["jpg", "jpeg", "png"]);

/** Overall deadline for a text extraction job, polling included */
export const DEFAULT_EXTRACTION_DEADLINE_MS = 150_000;

export interface IntakeDependencies extends StageDependencies {
  textExtractor: TextExtractor;
  imageAnalyzer: ImageAnalyzer;
  contentIndex: ContentIndex;
}

export interface IntakeOptions extends StageOptions {
  extractionDeadlineMs?: number;
}

/**
 * Lower-cased text after the last "." of an object key (the whole key when
 * there is no dot).
 */
export function fileExtension(key: string): string {
  const lower = key.toLowerCase();
  return lower.slice(lower.lastIndexOf(".") + 1);
}

/**
 * File category for an extension.
 */
export function fileTypeFor(extension: string): FileType {
  if (extension === "pdf") return "pdf";
  if (IMAGE_EXTENSIONS.has(extension)) return "image";
  return "unknown";
}

/**
 * Text the entity patterns run over: document text plus detected image text.
 */
export function searchableText(data: ExtractedData): string {
  const text = data.fileType === "pdf" ? data.text : "";
  const detectedText = data.fileType === "image" ? data.detectedText : "";
  return `${text} ${detectedText}`;
}

function requireSource(submission: ClaimSubmission): StorageLocation {
  const source = submission.source;
  if (!source || !source.bucket || !source.key) {
    throw new InputError("Missing bucket or key in submission");
  }
  return source;
}

export class IntakeStage extends PipelineStage<ClaimSubmission, IntakeContext> {
  readonly name = "intake" as const;
  readonly action = "extract_data";

  private textExtractor: TextExtractor;
  private imageAnalyzer: ImageAnalyzer;
  private contentIndex: ContentIndex;
  private extractionDeadlineMs: number;

  constructor(deps: IntakeDependencies, options: IntakeOptions = {}) {
    super(deps, options);
    this.textExtractor = deps.textExtractor;
    this.imageAnalyzer = deps.imageAnalyzer;
    this.contentIndex = deps.contentIndex;
    this.extractionDeadlineMs = options.extractionDeadlineMs ?? DEFAULT_EXTRACTION_DEADLINE_MS;
  }

  protected async run(
    submission: ClaimSubmission,
    claimId: string
  ): Promise<StageOutcome<IntakeContext>> {
    const source = requireSource(submission);
    console.log(`[Intake] Processing claim ${claimId}: ${source.bucket}/${source.key}`);

    const extractedData = await this.extract(source);
    const text = searchableText(extractedData);
    const entities = extractEntities(text);

    let indexed = false;
    let indexError: string | undefined;
    try {
      await this.call("content-index", () =>
        this.contentIndex.indexArtifact({
          claimId,
          bucket: source.bucket,
          key: source.key,
          fileType: extractedData.fileType,
          extractedText: text,
          entities,
          metadata: extractedData,
        })
      );
      indexed = true;
    } catch (err) {
      indexError = errorMessage(err);
      console.error(`[Intake] Indexing failed for ${claimId}: ${indexError}`);
    }

    const context = extendContext({ claimId }, { source, extractedData, entities });

    return {
      status: "success",
      context,
      details: {
        bucket: source.bucket,
        key: source.key,
        fileType: extractedData.fileType,
        entities,
        indexed,
        ...(indexError !== undefined ? { indexError } : {}),
      },
    };
  }

  protected failureDetails(submission: ClaimSubmission): Record<string, unknown> {
    return {
      bucket: submission.source?.bucket ?? null,
      key: submission.source?.key ?? null,
    };
  }

  private async extract(source: StorageLocation): Promise<ExtractedData> {
    const extension = fileExtension(source.key);

    switch (fileTypeFor(extension)) {
      case "pdf": {
        const { text, jobId } = await this.call(
          "text-extraction",
          (signal) => this.textExtractor.extractText(source, signal),
          this.extractionDeadlineMs
        );
        return { fileType: "pdf", text, jobId };
      }
      case "image": {
        const [labels, lines] = await Promise.all([
          this.call("image-analysis", (signal) =>
            this.imageAnalyzer.detectLabels(source, IMAGE_MAX_LABELS, IMAGE_MIN_CONFIDENCE, signal)
          ),
          this.call("image-analysis", (signal) => this.imageAnalyzer.detectText(source, signal)),
        ]);
        return { fileType: "image", labels, detectedText: lines.join(" ") };
      }
      case "unknown":
        return { fileType: "unknown", error: `Unsupported file type: ${extension}` };
    }
  }
}
