import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

export interface LlmConfig {
  /** OpenAI-compatible API root, e.g. "https://api.openai.com/v1" */
  baseUrl: string;
  apiKey: string;
  model: string;
  /** Model used for schedules with deepResearch enabled. Falls back to `model`. */
  deepResearchModel?: string;
}

export interface SearchConfig {
  /** Web search API root (Bing v7 compatible). */
  endpoint: string;
  /** Without a key the context stage returns an empty bundle. */
  apiKey?: string;
  topK: number;
}

export interface PricesConfig {
  /** Chart API root (Yahoo Finance v8 compatible). */
  endpoint: string;
}

export interface StorageConfig {
  /** Directory holding the SQLite database. */
  dataDir: string;
  /** Root directory for rendered report documents. */
  reportsDir: string;
}

export interface EmailConfig {
  host: string;
  port: number;
  secure: boolean;
  user?: string;
  pass?: string;
  from: string;
  /** Public base URL used to build report links in emails. */
  appBaseUrl: string;
}

export interface ScannerConfig {
  /** Cron expression for the due-schedule scan. */
  schedule: string;
  timezone: string;
  /** Max due schedules claimed per tick. */
  batchSize: number;
  /** Max orchestrations running at once. */
  maxConcurrent: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelay: string;
  maxDelay: string;
  /** Per-attempt timeout for every activity. */
  activityTimeout: string;
}

export interface RetentionConfig {
  /** Reports older than this many days are deleted. 0 disables cleanup. */
  days: number;
  schedule: string;
}

export interface ServerConfig {
  port: number;
  /** Bind address (default: "127.0.0.1") */
  bind?: string;
  /** Bearer token for authentication */
  token: string;
}

export interface LogConfig {
  level: string;
}

export interface ResearchConfig {
  llm: LlmConfig;
  search: SearchConfig;
  prices: PricesConfig;
  storage: StorageConfig;
  email?: EmailConfig;
  scanner: ScannerConfig;
  retry: RetryConfig;
  retention: RetentionConfig;
  server?: ServerConfig;
  log: LogConfig;
}

const CONFIG_DIR = join(homedir(), ".research-scheduler");
const CONFIG_PATH = join(CONFIG_DIR, "config.json");

const DEFAULTS: Partial<ResearchConfig> = {
  llm: {
    baseUrl: "https://api.openai.com/v1",
    apiKey: "",
    model: "gpt-4o-mini",
  },
  search: {
    endpoint: "https://api.bing.microsoft.com",
    topK: 6,
  },
  prices: {
    endpoint: "https://query1.finance.yahoo.com",
  },
  storage: {
    dataDir: CONFIG_DIR,
    reportsDir: join(CONFIG_DIR, "reports"),
  },
  scanner: {
    schedule: "*/5 * * * *",
    timezone: "UTC",
    batchSize: 50,
    maxConcurrent: 3,
  },
  retry: {
    maxAttempts: 3,
    initialDelay: "2s",
    maxDelay: "30s",
    activityTimeout: "2m",
  },
  retention: {
    days: 0,
    schedule: "30 3 * * *",
  },
  log: {
    level: "info",
  },
};

export function getConfigDir(): string {
  return CONFIG_DIR;
}

export function getConfigPath(): string {
  return CONFIG_PATH;
}

export function configExists(): boolean {
  return existsSync(CONFIG_PATH);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = target[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }
  return result;
}

function section(config: Record<string, unknown>, name: string): Record<string, unknown> | undefined {
  const value = config[name];
  if (value === undefined) return undefined;
  if (!isPlainObject(value)) {
    throw new Error(`Config section '${name}' must be an object`);
  }
  return value;
}

function validate(config: Record<string, unknown>): void {
  const llm = section(config, "llm");
  if (!llm || typeof llm.apiKey !== "string" || !llm.apiKey) {
    throw new Error("Config missing required 'llm.apiKey'");
  }

  const email = section(config, "email");
  if (email) {
    if (typeof email.host !== "string" || !email.host) {
      throw new Error("Config missing required 'email.host'");
    }
    if (typeof email.from !== "string" || !email.from) {
      throw new Error("Config missing required 'email.from'");
    }
  }

  const server = section(config, "server");
  if (server) {
    if (typeof server.port !== "number") {
      throw new Error("Config 'server.port' must be a number");
    }
    if (typeof server.token !== "string" || !server.token) {
      throw new Error("Config missing required 'server.token'");
    }
  }

  const retry = section(config, "retry");
  if (retry?.maxAttempts !== undefined) {
    if (typeof retry.maxAttempts !== "number" || !Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
      throw new Error("Config 'retry.maxAttempts' must be a positive integer");
    }
  }
}

const EMAIL_DEFAULTS = {
  port: 587,
  secure: false,
  appBaseUrl: "http://localhost:8790",
};

export function loadConfig(path?: string): ResearchConfig {
  const configPath = path ?? CONFIG_PATH;

  if (!existsSync(configPath)) {
    throw new Error(
      `Config file not found at ${configPath}\nRun 'research-scheduler init' to create one.`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (e) {
    throw new Error(
      `Failed to parse config at ${configPath}: ${e instanceof Error ? e.message : e}`,
    );
  }

  if (!isPlainObject(raw)) {
    throw new Error(`Config at ${configPath} must be a JSON object`);
  }

  validate(raw);

  const merged = deepMerge({ ...DEFAULTS }, raw);
  const email = section(merged, "email");
  if (email) {
    merged.email = deepMerge(EMAIL_DEFAULTS, email);
  }

  // Shape checked by validate() and completed by DEFAULTS.
  return merged as unknown as ResearchConfig;
}

/** Parse duration string like "24h", "30m", "7d" to milliseconds */
export function parseDuration(duration: string): number {
  const match = duration.match(/^(\d+)\s*(ms|s|m|h|d)$/);
  if (!match) {
    throw new Error(
      `Invalid duration: ${duration}. Use format like "24h", "30m", "7d"`,
    );
  }
  const value = parseInt(match[1], 10);
  const unit = match[2];
  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000,
  };
  return value * multipliers[unit];
}
