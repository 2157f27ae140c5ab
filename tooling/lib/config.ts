/**
 * Configuration loading and path expansion utilities
 */

import { existsSync, readFileSync } from "fs";
import { dirname, isAbsolute, join, resolve } from "path";
import { config as loadEnv } from "dotenv";
import { Config, DeadlineMode } from "./types";
import { isLogLevel, LogLevel } from "./logger";
import { isPlainObject } from "./utils";

export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_NUM_RANDOM_CASES = 5;
export const MIN_RANDOM_CASES = 1;
export const MAX_RANDOM_CASES = 10;
export const DEFAULT_DEADLINE_SECONDS = 3;
export const DEFAULT_CONSTRUCTION_ATTEMPTS = 3;
export const DEFAULT_DEADLINE_MODE: DeadlineMode = "vm";
export const DEFAULT_OUTPUT_DIR = "generated/cases";
export const CONFIG_FILE_NAME = "casegen.config.json";

/**
 * Nearest directory at or above `startDir` holding a casegen config or a
 * package.json; `startDir` itself when none does
 */
export function findProjectRoot(startDir: string): string {
  const start = resolve(startDir);
  let current = start;
  for (;;) {
    if (existsSync(join(current, CONFIG_FILE_NAME)) || existsSync(join(current, "package.json"))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return start;
    }
    current = parent;
  }
}

export class ConfigManager {
  private config: Config;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    try {
      const raw = readFileSync(configPath, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return isPlainObject(parsed) ? toConfig(parsed) : { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    } catch {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = process.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  /**
   * Load every existing .env file on the search path without overriding
   * variables already present in the environment
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const candidate of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(candidate);
      if (!expanded || !existsSync(expanded)) {
        continue;
      }
      loadEnv({ path: expanded, override: false });
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getNumRandomCases(): number {
    const requested = this.config.numRandomCases;
    if (typeof requested !== "number" || !Number.isFinite(requested)) {
      return DEFAULT_NUM_RANDOM_CASES;
    }
    return Math.min(MAX_RANDOM_CASES, Math.max(MIN_RANDOM_CASES, Math.round(requested)));
  }

  getPerCallDeadlineSeconds(): number {
    const seconds = this.config.perCallDeadlineSeconds;
    return typeof seconds === "number" && seconds > 0 ? seconds : DEFAULT_DEADLINE_SECONDS;
  }

  getMaxConstructionAttempts(): number {
    const attempts = this.config.maxConstructionAttempts;
    return typeof attempts === "number" && attempts >= 1 ? Math.floor(attempts) : DEFAULT_CONSTRUCTION_ATTEMPTS;
  }

  getDeadlineMode(): DeadlineMode {
    return this.config.deadlineMode === "none" ? "none" : DEFAULT_DEADLINE_MODE;
  }

  getNumberKind(): "integer" | "float" {
    return this.config.numberKind === "float" ? "float" : "integer";
  }

  getOutputDir(): string {
    return this.config.outputDir ?? DEFAULT_OUTPUT_DIR;
  }

  /**
   * Seed for the value synthesizer; CASEGEN_SEED wins over the config file
   */
  getSeed(env: NodeJS.ProcessEnv = process.env): number | undefined {
    const fromEnv = env.CASEGEN_SEED;
    if (fromEnv !== undefined && fromEnv.trim() !== "") {
      const parsed = Number(fromEnv);
      if (Number.isInteger(parsed)) {
        return parsed;
      }
    }
    return typeof this.config.seed === "number" ? this.config.seed : undefined;
  }

  getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const fromEnv = env.CASEGEN_LOG_LEVEL;
    return isLogLevel(fromEnv) ? fromEnv : "info";
  }

  getConfig(): Config {
    return this.config;
  }
}

function toConfig(raw: Record<string, unknown>): Config {
  const config: Config = {};
  if (Array.isArray(raw.envSearchPaths)) {
    config.envSearchPaths = raw.envSearchPaths.filter((entry): entry is string => typeof entry === "string");
  }
  if (typeof raw.numRandomCases === "number") config.numRandomCases = raw.numRandomCases;
  if (typeof raw.perCallDeadlineSeconds === "number") config.perCallDeadlineSeconds = raw.perCallDeadlineSeconds;
  if (typeof raw.maxConstructionAttempts === "number") config.maxConstructionAttempts = raw.maxConstructionAttempts;
  if (typeof raw.seed === "number") config.seed = raw.seed;
  if (raw.deadlineMode === "vm" || raw.deadlineMode === "none") config.deadlineMode = raw.deadlineMode;
  if (raw.numberKind === "integer" || raw.numberKind === "float") config.numberKind = raw.numberKind;
  if (typeof raw.outputDir === "string") config.outputDir = raw.outputDir;
  return config;
}
