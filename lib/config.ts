/**
 * Configuration loading: spotcheck.config.json, .env files and environment overrides
 */

import { config as loadEnv, parse as parseEnv } from "dotenv";
import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { DEFAULT_STRATEGY, type CompilationCacheOptions } from "./cache";
import { isLogLevel, Logger, type LogLevel } from "./logger";
import { DEFAULT_MAX_RECURSION_DEPTH } from "./synthesizer";
import type { SpotcheckConfig, Strategy } from "./types";
import { isPlainObject } from "./utils";

export const DEFAULT_CONFIG_FILE = "spotcheck.config.json";
export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export const ENV_STRATEGY = "SPOTCHECK_STRATEGY";
export const ENV_MAX_RECURSION_DEPTH = "SPOTCHECK_MAX_RECURSION_DEPTH";
export const ENV_LOG_LEVEL = "SPOTCHECK_LOG_LEVEL";

const STRATEGIES: readonly Strategy[] = ["off", "sample", "exhaustive"];

export function isStrategy(value: unknown): value is Strategy {
  return typeof value === "string" && STRATEGIES.some((strategy) => strategy === value);
}

function parseDepth(value: unknown): number | undefined {
  const depth = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof depth === "number" && Number.isInteger(depth) && depth > 0 ? depth : undefined;
}

export class ConfigManager {
  private config: SpotcheckConfig;
  private projectRoot: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectRoot: string, configPath: string = join(projectRoot, DEFAULT_CONFIG_FILE), env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.env = env;
    this.config = this.readConfig(configPath);
  }

  /**
   * Read the config file, keeping only fields of the right type
   */
  private readConfig(configPath: string): SpotcheckConfig {
    if (!existsSync(configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf8"));
    } catch {
      return {};
    }
    if (!isPlainObject(parsed)) {
      return {};
    }

    const config: SpotcheckConfig = {};
    if (isStrategy(parsed.strategy)) config.strategy = parsed.strategy;
    const depth = parseDepth(parsed.maxRecursionDepth);
    if (depth !== undefined) config.maxRecursionDepth = depth;
    if (isLogLevel(parsed.logLevel)) config.logLevel = parsed.logLevel;
    const paths: unknown = parsed.envSearchPaths;
    if (Array.isArray(paths) && paths.every((path): path is string => typeof path === "string")) {
      config.envSearchPaths = paths;
    }
    return config;
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = this.env.HOME;
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
   * Load every existing env file into the environment without overriding
   * variables that are already set. Returns the files that were read.
   */
  loadEnvironment(): string[] {
    const loaded: string[] = [];
    for (const rawPath of this.getEnvSearchPaths()) {
      const expanded = this.expandPath(rawPath);
      if (!existsSync(expanded)) {
        continue;
      }
      if (this.env === process.env) {
        loadEnv({ path: expanded, override: false });
      } else {
        const parsed = parseEnv(readFileSync(expanded));
        for (const [key, value] of Object.entries(parsed)) {
          if (this.env[key] === undefined) {
            this.env[key] = value;
          }
        }
      }
      loaded.push(expanded);
    }
    return loaded;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getStrategy(): Strategy {
    const fromEnv = this.env[ENV_STRATEGY];
    if (isStrategy(fromEnv)) return fromEnv;
    return this.config.strategy ?? DEFAULT_STRATEGY;
  }

  getMaxRecursionDepth(): number {
    return parseDepth(this.env[ENV_MAX_RECURSION_DEPTH]) ?? this.config.maxRecursionDepth ?? DEFAULT_MAX_RECURSION_DEPTH;
  }

  getLogLevel(): LogLevel {
    const fromEnv = this.env[ENV_LOG_LEVEL];
    if (isLogLevel(fromEnv)) return fromEnv;
    return this.config.logLevel ?? DEFAULT_LOG_LEVEL;
  }

  getConfig(): SpotcheckConfig {
    return this.config;
  }

  /**
   * Options for a {@link CompilationCache} built from this configuration
   */
  toCacheOptions(logger: Logger = new Logger(this.getLogLevel())): CompilationCacheOptions {
    return {
      strategy: this.getStrategy(),
      maxRecursionDepth: this.getMaxRecursionDepth(),
      logger,
    };
  }
}
