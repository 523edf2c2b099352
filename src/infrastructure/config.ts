/**
 * Configuration store: `.doc-review/config.json` beside the workspace root.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as nodePath from "node:path";
import {
  VALID_SORT_ORDERS,
  normalizeSettings,
  readRawSettings,
  validateSettings,
} from "@doc-review/core";
import type { RawSettings, ReviewSettings, SortOrder } from "@doc-review/core";
import { failure, success } from "../types.js";
import type { AppError, Logger, Result } from "../types.js";
import { INFRASTRUCTURE_ERROR_CODES } from "./error-codes.js";

/**
 * File layout under the workspace root.
 */
export const CONFIG_PATHS = {
  DIR: ".doc-review",
  CONFIG_FILE: "config.json",
  TELEMETRY_FILE: "telemetry.db",
} as const;

/** Keys this store writes back after `init`. */
export const CONFIG_KEYS = {
  LAST_RUN: "lastRun",
  SORT_ORDER: "sortOrder",
} as const;

export type ConfigKey = typeof CONFIG_KEYS[keyof typeof CONFIG_KEYS];

export interface LoadedConfig {
  settings: ReviewSettings;
  /** `settings.repoPath` resolved against the workspace root */
  documentRoot: string;
}

export class ConfigStore {
  constructor(
    private readonly workspaceRoot: string,
    private readonly logger: Logger
  ) {}

  get configDir(): string {
    return nodePath.join(this.workspaceRoot, CONFIG_PATHS.DIR);
  }

  get configPath(): string {
    return nodePath.join(this.configDir, CONFIG_PATHS.CONFIG_FILE);
  }

  get telemetryPath(): string {
    return nodePath.join(this.configDir, CONFIG_PATHS.TELEMETRY_FILE);
  }

  /**
   * Write a fresh config. Fails when one already exists.
   */
  async init(overrides: RawSettings = {}): Promise<Result<ReviewSettings>> {
    const existing = await this.readJson();
    if (existing.kind === "ok") {
      return failure({
        code: INFRASTRUCTURE_ERROR_CODES.CONFIG_EXISTS,
        message: `Config already exists at ${this.configPath}`,
        context: "ConfigStore.init",
      });
    }
    if (existing.error.code !== INFRASTRUCTURE_ERROR_CODES.CONFIG_NOT_FOUND) {
      return existing;
    }

    const settings = normalizeSettings(overrides);
    const problems = validateSettings(settings);
    if (problems.length > 0) {
      return failure(this.invalid(problems, "ConfigStore.init"));
    }

    try {
      await mkdir(this.configDir, { recursive: true });
    } catch (err) {
      return failure({
        code: INFRASTRUCTURE_ERROR_CODES.CONFIG_WRITE_ERROR,
        message: `Failed to create ${this.configDir}`,
        details: err,
        context: "ConfigStore.init",
      });
    }

    const written = await this.writeJson(settings);
    if (written.kind === "err") {
      return written;
    }
    this.logger.info(`Created ${this.configPath}`, "ConfigStore.init");
    return success(settings);
  }

  /**
   * Read, normalise and validate the config.
   */
  async load(): Promise<Result<LoadedConfig>> {
    const json = await this.readJson();
    if (json.kind === "err") {
      return json;
    }

    const { raw, errors } = readRawSettings(json.value);
    const settings = normalizeSettings(raw);
    const problems = [...errors, ...validateSettings(settings)];
    if (problems.length > 0) {
      return failure(this.invalid(problems, "ConfigStore.load"));
    }

    return success({
      settings,
      documentRoot: nodePath.resolve(this.workspaceRoot, settings.repoPath),
    });
  }

  /**
   * Record the end of a review. Stored as UTC ISO-8601.
   */
  async saveLastRun(when: Date): Promise<Result<string>> {
    const lastRun = when.toISOString();
    const saved = await this.update(CONFIG_KEYS.LAST_RUN, lastRun);
    return saved.kind === "ok" ? success(lastRun) : saved;
  }

  async saveSortOrder(order: string): Promise<Result<SortOrder>> {
    const valid = VALID_SORT_ORDERS.find((candidate) => candidate === order);
    if (!valid) {
      return failure(
        this.invalid(
          [`sortOrder '${order}' must be one of ${VALID_SORT_ORDERS.join(", ")}`],
          "ConfigStore.saveSortOrder"
        )
      );
    }
    const saved = await this.update(CONFIG_KEYS.SORT_ORDER, valid);
    return saved.kind === "ok" ? success(valid) : saved;
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  /**
   * Set one key, keeping every other key in the file as written.
   */
  private async update(key: ConfigKey, value: string): Promise<Result<void>> {
    const json = await this.readJson();
    if (json.kind === "err") {
      return json;
    }
    if (!isRecord(json.value)) {
      return failure(this.invalid(["settings must be a JSON object"], "ConfigStore.update"));
    }

    const written = await this.writeJson({ ...json.value, [key]: value });
    if (written.kind === "ok") {
      this.logger.debug(`Saved ${key}=${value}`, "ConfigStore.update");
    }
    return written;
  }

  private async readJson(): Promise<Result<unknown>> {
    let text: string;
    try {
      text = await readFile(this.configPath, "utf8");
    } catch (err) {
      if (isNodeError(err) && err.code === "ENOENT") {
        return failure({
          code: INFRASTRUCTURE_ERROR_CODES.CONFIG_NOT_FOUND,
          message: `No config at ${this.configPath}; run 'init' first`,
          context: "ConfigStore.read",
        });
      }
      return failure({
        code: INFRASTRUCTURE_ERROR_CODES.CONFIG_READ_ERROR,
        message: `Failed to read ${this.configPath}`,
        details: err,
        context: "ConfigStore.read",
      });
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return success(parsed);
    } catch (err) {
      return failure({
        code: INFRASTRUCTURE_ERROR_CODES.CONFIG_READ_ERROR,
        message: `${this.configPath} is not valid JSON`,
        details: err,
        context: "ConfigStore.read",
      });
    }
  }

  private async writeJson(value: object): Promise<Result<void>> {
    try {
      await writeFile(this.configPath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
      return success(undefined);
    } catch (err) {
      return failure({
        code: INFRASTRUCTURE_ERROR_CODES.CONFIG_WRITE_ERROR,
        message: `Failed to write ${this.configPath}`,
        details: err,
        context: "ConfigStore.write",
      });
    }
  }

  private invalid(problems: string[], context: string): AppError {
    return {
      code: INFRASTRUCTURE_ERROR_CODES.CONFIG_INVALID,
      message: `Invalid config: ${problems.join("; ")}`,
      details: problems,
      context,
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
