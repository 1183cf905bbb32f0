/**
 * Vision Service Client
 *
 * Client for the document vision service: asynchronous text extraction for
 * PDFs, and label / line-text detection for images. The service exposes
 * tools over `POST /v1/tools/<tool>/invoke`.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { ImageLabel, StorageLocation } from "../../types/claim-context.js";
import type {
  ImageAnalyzer,
  TextExtractionResult,
  TextExtractor,
} from "../../types/capabilities.js";
import { CapabilityError, TimeoutError } from "../errors.js";

/** Base URL for the vision service */
const VISION_BASE_URL = "http://127.0.0.1:5997";

/**
 * Response from starting a text-extraction job.
 */
interface StartTextDetectionResponse {
  job_id?: string;
  error?: string;
}

/**
 * Job status while polling a text-extraction job.
 */
interface TextDetectionJobResponse {
  job_status: "IN_PROGRESS" | "SUCCEEDED" | "FAILED";
  status_message?: string;
  blocks?: Array<{ block_type: string; text?: string }>;
}

interface DetectLabelsResponse {
  labels?: Array<{ name: string; confidence: number }>;
}

interface DetectTextResponse {
  detections?: Array<{ detected_text: string; type: "LINE" | "WORD" }>;
}

/**
 * Tool invocation response wrapper.
 */
interface ToolInvokeResponse<T> {
  tool_name: string;
  result: T | string;
  latency_ms?: number;
}

export interface VisionClientOptions {
  baseUrl?: string;
  apiKey?: string | undefined;
  /** Per-request timeout */
  requestTimeoutMs?: number;
  /** Delay between status polls of an extraction job */
  pollIntervalMs?: number;
  /** Overall deadline for one extraction job */
  extractionTimeoutMs?: number;
  fetch?: typeof fetch;
}

/**
 * Vision service client implementing text extraction and image analysis.
 */
export class VisionServiceClient implements TextExtractor, ImageAnalyzer {
  private baseUrl: string;
  private apiKey: string | undefined;
  private requestTimeoutMs: number;
  private pollIntervalMs: number;
  private extractionTimeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: VisionClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? VISION_BASE_URL;
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 2_000;
    this.extractionTimeoutMs = options.extractionTimeoutMs ?? 120_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Extract text from a document, polling the job at a fixed interval until
   * it succeeds, fails, or runs past the extraction deadline. Aborting
   * `signal` stops polling.
   */
  async extractText(location: StorageLocation, signal?: AbortSignal): Promise<TextExtractionResult> {
    const started = await this.invoke<StartTextDetectionResponse>(
      "start_text_detection",
      { bucket: location.bucket, key: location.key },
      signal
    );
    const jobId = started.job_id;
    if (!jobId) {
      throw new CapabilityError("text-extraction", started.error ?? "no job id returned");
    }

    const deadline = Date.now() + this.extractionTimeoutMs;
    console.log(`[Vision] Started text detection job ${jobId}`);

    for (;;) {
      const job = await this.invoke<TextDetectionJobResponse>(
        "get_text_detection",
        { job_id: jobId },
        signal
      );

      if (job.job_status === "SUCCEEDED") {
        const text = (job.blocks ?? [])
          .filter((b) => b.block_type === "LINE")
          .map((b) => b.text ?? "")
          .join("\n")
          .trim();
        return { text, jobId };
      }

      if (job.job_status === "FAILED") {
        throw new CapabilityError(
          "text-extraction",
          `job ${jobId} failed: ${job.status_message ?? "no status message"}`
        );
      }

      if (Date.now() + this.pollIntervalMs > deadline) {
        throw new TimeoutError("text-extraction", this.extractionTimeoutMs);
      }
      await sleep(this.pollIntervalMs, undefined, { signal });
    }
  }

  async detectLabels(
    location: StorageLocation,
    maxLabels: number,
    minConfidence: number,
    signal?: AbortSignal
  ): Promise<ImageLabel[]> {
    const result = await this.invoke<DetectLabelsResponse>(
      "detect_labels",
      {
        bucket: location.bucket,
        key: location.key,
        max_labels: maxLabels,
        min_confidence: minConfidence,
      },
      signal
    );
    return (result.labels ?? []).map((l) => ({ name: l.name, confidence: l.confidence }));
  }

  async detectText(location: StorageLocation, signal?: AbortSignal): Promise<string[]> {
    const result = await this.invoke<DetectTextResponse>(
      "detect_text",
      { bucket: location.bucket, key: location.key },
      signal
    );
    return (result.detections ?? [])
      .filter((d) => d.type === "LINE")
      .map((d) => d.detected_text);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  private async invoke<T>(
    tool: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    const requestTimeout = AbortSignal.timeout(this.requestTimeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/v1/tools/${tool}/invoke`, {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify({ arguments: args }),
        signal: signal ? AbortSignal.any([signal, requestTimeout]) : requestTimeout,
      });
    } catch (err) {
      if (signal?.aborted) {
        throw new CapabilityError(`vision:${tool}`, "request aborted", { cause: err });
      }
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new TimeoutError(`vision:${tool}`, this.requestTimeoutMs);
      }
      throw new CapabilityError(`vision:${tool}`, "request failed", { cause: err });
    }

    if (!response.ok) {
      throw new CapabilityError(`vision:${tool}`, `request failed: ${response.status}`);
    }

    const data: ToolInvokeResponse<T> = await response.json();
    // Handle both string (JSON-encoded) and object (already parsed) responses
    if (typeof data.result === "string") {
      const parsed: T = JSON.parse(data.result);
      return parsed;
    }
    return data.result;
  }
}
