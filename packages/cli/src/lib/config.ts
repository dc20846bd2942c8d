import {
  DEFAULT_RETRY_CONFIG,
  DEFAULT_SECTION,
  formatFieldPath,
} from "@propctl/core";
import { constants as fsConstants } from "fs";
import { access, mkdir, readFile, writeFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";
import { z } from "zod";
import { log } from "./log";

/** Directory for CLI configuration (e.g., ~/.propctl/) */
const CONFIG_DIRNAME = ".propctl";
const CONFIG_FILENAME = "config.json";
const CONFIG_HOME_ENV = "PROPCTL_HOME";

const retrySettingsSchema = z.object({
  enabled: z.boolean().default(true),
  maxRetries: z.number().int().default(DEFAULT_RETRY_CONFIG.maxRetries),
  minWaitMs: z.number().int().default(DEFAULT_RETRY_CONFIG.minWaitMs),
  maxWaitMs: z.number().int().default(DEFAULT_RETRY_CONFIG.maxWaitMs),
  excludedEndpoints: z.array(z.string()).default([]),
});

/**
 * Shape of config.json. Range checks are left to the session, which
 * reports every bad value at once when it is created.
 */
export const configSchema = z.object({
  /** Credential section, read from EDGEGRID_<SECTION>_* variables */
  section: z.string().min(1).default(DEFAULT_SECTION),
  userAgent: z.string().optional(),
  /** Requests per second; 0 means unlimited */
  requestLimit: z.number().default(0),
  /** Send PAPI ids with their type prefixes */
  usePrefixes: z.boolean().default(true),
  retries: retrySettingsSchema.default({}),
});

export type Config = z.output<typeof configSchema>;
export type RetrySettings = Config["retries"];

export const DEFAULT_CONFIG: Config = configSchema.parse({});

/**
 * Load config.json, writing the defaults on first run. Missing keys take
 * their default values.
 */
export async function loadConfig(): Promise<Config> {
  await ensureConfigDir();
  const configPath = getConfigPath();
  log.debug(`Loading config from ${configPath}`);

  try {
    await access(configPath, fsConstants.F_OK);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === "ENOENT") {
      log.debug("Config file not found, creating default config");
      await writeDefaultConfig();
      return structuredClone(DEFAULT_CONFIG);
    }

    throw error instanceof Error ? error : new Error(String(error));
  }

  const raw = await readFile(configPath, "utf8");
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = configSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `  ${formatFieldPath(issue.path)}: ${issue.message}`
    );
    throw new Error(`Invalid config in ${configPath}:\n${issues.join("\n")}`);
  }
  return result.data;
}

export function getConfigPath() {
  return join(getConfigDir(), CONFIG_FILENAME);
}

export function getConfigDir() {
  const customDir = process.env[CONFIG_HOME_ENV];
  if (customDir && customDir.trim().length > 0) {
    return customDir;
  }
  return join(homedir(), CONFIG_DIRNAME);
}

async function ensureConfigDir() {
  await mkdir(getConfigDir(), { recursive: true });
}

async function writeDefaultConfig() {
  await writeFile(
    getConfigPath(),
    `${JSON.stringify(DEFAULT_CONFIG, null, 2)}\n`,
    "utf8"
  );
}

type NodeError = Error & { code?: string };

function isNodeError(error: unknown): error is NodeError {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}
