/**
 * Secret store adapters.
 *
 * A secret is a flat JSON object of strings (e.g. `{ "url": ..., "api_key": ... }`).
 */

import * as fs from "node:fs";
import { z } from "zod";
import type { SecretStore } from "../../types/capabilities.js";
import { CapabilityError } from "../errors.js";

const secretSchema = z.record(z.string());
const secretFileSchema = z.record(secretSchema);

/**
 * Environment variable holding a secret: `vision-service` → `SECRET_VISION_SERVICE`.
 */
export function secretEnvName(name: string): string {
  return `SECRET_${name.toUpperCase().replace(/[^A-Z0-9]+/g, "_")}`;
}

/**
 * Secrets from `SECRET_<NAME>` environment variables holding JSON.
 */
export class EnvSecretStore implements SecretStore {
  private source: NodeJS.ProcessEnv;

  constructor(source: NodeJS.ProcessEnv = process.env) {
    this.source = source;
  }

  async getSecret(name: string): Promise<Record<string, string>> {
    const variable = secretEnvName(name);
    const raw = this.source[variable];
    if (raw === undefined) {
      throw new CapabilityError("secrets", `secret ${name} not found (${variable} is not set)`);
    }

    try {
      return secretSchema.parse(JSON.parse(raw));
    } catch (err) {
      throw new CapabilityError("secrets", `secret ${name} is not a JSON object of strings`, {
        cause: err,
      });
    }
  }
}

/**
 * Secrets from one JSON file: `{ "<name>": { ... }, ... }`.
 */
export class FileSecretStore implements SecretStore {
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async getSecret(name: string): Promise<Record<string, string>> {
    let secrets: Record<string, Record<string, string>>;
    try {
      secrets = secretFileSchema.parse(
        JSON.parse(await fs.promises.readFile(this.filePath, "utf-8"))
      );
    } catch (err) {
      throw new CapabilityError("secrets", `cannot read secrets file ${this.filePath}`, {
        cause: err,
      });
    }

    const secret = secrets[name];
    if (!secret) {
      throw new CapabilityError("secrets", `secret ${name} not found in ${this.filePath}`);
    }
    return secret;
  }
}

/**
 * Look up a secret, resolving null when it does not exist or cannot be read.
 */
export async function getOptionalSecret(
  store: SecretStore,
  name: string
): Promise<Record<string, string> | null> {
  try {
    return await store.getSecret(name);
  } catch (err) {
    console.log(`[Secrets] ${name} unavailable: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}
