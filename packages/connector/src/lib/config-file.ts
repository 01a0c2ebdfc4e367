/**
 * JSON config files
 *
 * Each tool reads its provider settings (client ids, tenant, refresh token)
 * from a JSON file and writes a rotated refresh token back to the same file.
 * Unknown keys are kept on save.
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import type { z } from "zod";
import { ConfigError } from "./errors.js";

export class ConfigFile<T extends Record<string, unknown>> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  constructor(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    this.path = path;
    this.schema = schema;
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  load(): T {
    const result = this.schema.safeParse(this.readRaw());
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid config file ${this.path}: ${issues}`);
    }
    return result.data;
  }

  /**
   * Merge `changes` into the stored JSON and write it back.
   */
  update(changes: Partial<T>): T {
    const current = this.load();
    const merged: T = { ...current, ...changes };
    writeFileSync(this.path, JSON.stringify(merged, null, 2) + "\n", "utf-8");
    return merged;
  }

  private readRaw(): unknown {
    let text: string;
    try {
      text = readFileSync(this.path, "utf-8");
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${this.path}`, { cause: error });
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Config file ${this.path} is not valid JSON`, { cause: error });
    }
  }
}
