// Configuration: loads from YAML + environment variables
// Layered config: defaults → YAML file → env vars → programmatic overrides

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "@keyrelay/shared";

/** Token proxy connection */
export const ProxyConfigSchema = z.object({
  baseUrl: z.string().url().default("http://localhost:8000"),
  apiKey: z.string().optional(),
  /** Service the proxy issues credentials for */
  service: z.string().min(1).default("hf"),
  /** Sent with outcome reports so the proxy can attribute usage */
  clientName: z.string().optional(),
  /** Organizations whose members may use the host application; empty allows everyone */
  allowedOrgs: z.array(z.string()).default([]),
  provisionTimeoutMs: z.number().int().min(100).default(30000),
  reportTimeoutMs: z.number().int().min(100).default(10000),
});

/** Resilient call executor */
export const ExecutorConfigSchema = z.object({
  /** Attempt ceiling per request; each attempt uses a fresh credential */
  maxAttempts: z.number().int().min(1).max(10).default(3),
  /** Limit for one non-streaming call, or for opening a stream */
  inferenceTimeoutMs: z.number().int().min(1000).default(120000),
  /** Longest wait between two streamed chunks */
  streamIdleTimeoutMs: z.number().int().min(100).default(30000),
  /** Best-effort deadline for pending outcome reports at teardown */
  reportDrainTimeoutMs: z.number().int().min(0).default(5000),
});

/** Inference endpoints */
export const InferenceConfigSchema = z.object({
  chatBaseUrl: z.string().url().default("https://router.huggingface.co/v1"),
  imageBaseUrl: z.string().url().default("https://router.huggingface.co"),
  /** Provider used for text-to-image when the caller asks for "auto" */
  defaultImageProvider: z.string().min(1).default("hf-inference"),
});

/** Logging configuration */
export const LoggingConfigSchema = z.object({
  level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  pretty: z.boolean().default(process.env.NODE_ENV !== "production"),
  file: z.string().optional(),
});

/** Full configuration schema */
export const ConfigSchema = z.object({
  proxy: ProxyConfigSchema.default({}),
  executor: ExecutorConfigSchema.default({}),
  inference: InferenceConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;
export type ExecutorConfig = z.infer<typeof ExecutorConfigSchema>;
export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/** Input accepted by overrides and config files (all fields optional) */
export type ConfigInput = z.input<typeof ConfigSchema>;

/** Environment variable mappings */
const ENV_MAPPINGS: Record<string, string> = {
  PROXY_URL: "proxy.baseUrl",
  PROXY_KEY: "proxy.apiKey",
  PROXY_SERVICE: "proxy.service",
  PROXY_CLIENT_NAME: "proxy.clientName",
  PROXY_PROVISION_TIMEOUT_MS: "proxy.provisionTimeoutMs",
  PROXY_REPORT_TIMEOUT_MS: "proxy.reportTimeoutMs",
  MAX_ATTEMPTS: "executor.maxAttempts",
  INFERENCE_TIMEOUT_MS: "executor.inferenceTimeoutMs",
  STREAM_IDLE_TIMEOUT_MS: "executor.streamIdleTimeoutMs",
  REPORT_DRAIN_TIMEOUT_MS: "executor.reportDrainTimeoutMs",
  HF_CHAT_BASE_URL: "inference.chatBaseUrl",
  HF_IMAGE_BASE_URL: "inference.imageBaseUrl",
  HF_DEFAULT_IMAGE_PROVIDER: "inference.defaultImageProvider",
  LOG_LEVEL: "logging.level",
  LOG_PRETTY: "logging.pretty",
  LOG_FILE: "logging.file",
};

/** Keys whose values stay strings even when they look numeric */
const STRING_KEYS = new Set([
  "PROXY_URL",
  "PROXY_KEY",
  "PROXY_SERVICE",
  "PROXY_CLIENT_NAME",
  "HF_CHAT_BASE_URL",
  "HF_IMAGE_BASE_URL",
  "HF_DEFAULT_IMAGE_PROVIDER",
  "LOG_LEVEL",
  "LOG_FILE",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Set a nested value in an object using dot notation */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split(".");
  const lastKey = keys.pop();
  if (lastKey === undefined) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/** Parse environment value to appropriate type */
function parseEnvValue(value: string): unknown {
  if (value.toLowerCase() === "true") return true;
  if (value.toLowerCase() === "false") return false;
  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== "") return num;
  return value;
}

/** Load configuration from YAML file */
function loadYamlConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }

  const content = readFileSync(configPath, "utf-8");
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a mapping at the top level`);
  }
  return parsed;
}

/** Resolve an environment value, supporting *_FILE secrets */
function resolveEnvValue(env: NodeJS.ProcessEnv, envKey: string): string | undefined {
  const direct = env[envKey];
  if (direct !== undefined) return direct;
  const filePath = env[`${envKey}_FILE`];
  if (!filePath) return undefined;
  try {
    return readFileSync(filePath, "utf-8").trim();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read ${envKey}_FILE (${filePath}): ${message}`);
  }
}

/** Load configuration from environment variables */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = resolveEnvValue(env, envKey);
    if (value !== undefined && value !== "") {
      setNestedValue(config, configPath, STRING_KEYS.has(envKey) ? value : parseEnvValue(value));
    }
  }

  // ALLOWED_ORGS: "org-a,org-b"
  const allowedOrgs = resolveEnvValue(env, "ALLOWED_ORGS");
  if (allowedOrgs) {
    setNestedValue(
      config,
      "proxy.allowedOrgs",
      allowedOrgs
        .split(",")
        .map((org) => org.trim())
        .filter((org) => org.length > 0),
    );
  }

  return config;
}

/** Deep merge two objects */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    if (isRecord(value)) {
      const existing = result[key];
      result[key] = deepMerge(isRecord(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/** Configuration manager */
export class ConfigManager {
  private config: Config | null = null;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath ?? this.findConfigFile();
    this.env = env;
  }

  private findConfigFile(): string {
    const locations = [
      "keyrelay.config.yaml",
      "keyrelay.config.yml",
      join(process.cwd(), ".keyrelay", "config.yaml"),
    ];

    for (const loc of locations) {
      if (existsSync(loc)) {
        return loc;
      }
    }

    return "keyrelay.config.yaml";
  }

  load(overrides: ConfigInput = {}): Config {
    const yamlConfig = loadYamlConfig(this.configPath);
    const envConfig = loadEnvConfig(this.env);

    const merged = deepMerge(deepMerge(yamlConfig, envConfig), overrides);

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid configuration: ${issues}`);
    }

    this.config = parsed.data;
    return parsed.data;
  }

  get(): Config {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getSection<K extends keyof Config>(section: K): Config[K] {
    return this.get()[section];
  }
}

export function createConfigManager(configPath?: string, env?: NodeJS.ProcessEnv): ConfigManager {
  return new ConfigManager(configPath, env);
}

/**
 * Fail fast when the proxy key is missing.
 * Every call needs it, so a session cannot start without one.
 */
export function assertProxyConfigured(config: Config): asserts config is Config & {
  proxy: ProxyConfig & { apiKey: string };
} {
  if (!config.proxy.apiKey || config.proxy.apiKey.trim() === "") {
    throw new ConfigError(
      "PROXY_KEY is not set. Set the PROXY_KEY environment variable or proxy.apiKey in keyrelay.config.yaml.",
    );
  }
}
