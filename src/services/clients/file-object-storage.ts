/**
 * Object storage on the local filesystem: one directory per bucket, keys as
 * relative paths. Content type is kept in a sidecar file.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { ObjectStorage, StoredObject } from "../../types/capabilities.js";
import { InputError } from "../errors.js";

const META_SUFFIX = ".meta.json";

const CONTENT_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  json: "application/json",
};

/**
 * Content type for a file name, by extension.
 */
export function contentTypeFor(filename: string): string {
  const extension = path.extname(filename).slice(1).toLowerCase();
  return CONTENT_TYPES[extension] ?? "application/octet-stream";
}

export class FileObjectStorage implements ObjectStorage {
  private rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  async put(bucket: string, key: string, body: Buffer | string, contentType: string): Promise<void> {
    const filePath = this.resolve(bucket, key);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.writeFile(filePath, body);
    await fs.promises.writeFile(
      `${filePath}${META_SUFFIX}`,
      JSON.stringify({ contentType }),
      "utf-8"
    );
  }

  async get(bucket: string, key: string): Promise<StoredObject | null> {
    const filePath = this.resolve(bucket, key);
    let body: Buffer;
    try {
      body = await fs.promises.readFile(filePath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }

    return { body, contentType: await this.readContentType(filePath) };
  }

  private async readContentType(filePath: string): Promise<string> {
    try {
      const meta: unknown = JSON.parse(
        await fs.promises.readFile(`${filePath}${META_SUFFIX}`, "utf-8")
      );
      if (typeof meta === "object" && meta !== null && "contentType" in meta) {
        const { contentType } = meta;
        if (typeof contentType === "string") return contentType;
      }
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
    return "application/octet-stream";
  }

  private resolve(bucket: string, key: string): string {
    const segments = [bucket, ...key.split("/")];
    if (segments.some((s) => s === "" || s === "." || s === "..")) {
      throw new InputError(`Invalid object location: ${bucket}/${key}`);
    }
    return path.join(this.rootDir, ...segments);
  }
}
