import dotenv from "dotenv";
import { z } from "zod";
import { STAGE_ORDER, type StageName } from "../types/claim-context.js";

dotenv.config();

const stageNameSchema = z.enum(["intake", "policy", "damage", "valuation", "decision"]);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  STORAGE_BACKEND: z
    .string()
    .default("json")
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(["json", "sqlite"])),
  DATA_DIR: z.string().default("data"),
  BUCKET_PREFIX: z.string().default("claims"),
  VISION_SERVICE_URL: z.string().url().default("http://127.0.0.1:5997"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  REASONING_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  REASONING_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  CAPABILITY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  EXTRACTION_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2_000),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  DEFAULT_POLICY_NUMBER: z.string().min(1).default("AUTO-001"),
  POLICY_SEED_FILE: z.string().default("data/seed/policies.json"),
  SECRETS_FILE: z.string().optional(),
  PIPELINE_CHECKPOINTS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((part) => part.trim().toLowerCase())
        .filter((part) => part.length > 0)
    )
    .pipe(z.array(stageNameSchema)),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);

/**
 * Checkpoint stages in pipeline order, without duplicates.
 */
export function checkpointStages(config: Pick<Env, "PIPELINE_CHECKPOINTS"> = env): StageName[] {
  return STAGE_ORDER.filter((stage) => config.PIPELINE_CHECKPOINTS.includes(stage));
}
