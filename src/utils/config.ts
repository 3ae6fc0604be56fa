import { readFileSync, existsSync } from "fs";
import { z } from "zod";
import {
  DEFAULT_EMBEDDING_SIZE,
  DEFAULT_SLIDING_WINDOW,
  DEFAULT_WEIGHT_TABLES,
} from "../embedding/generators/weights.js";
import { ConfigurationError } from "./errors.js";
import type { GeneratorName, SchemaEmbedConfig, WeightTable } from "./types.js";

const DEFAULT_CONFIG_PATH = "./schemavec.config.json";

export { DEFAULT_EMBEDDING_SIZE };

export const DEFAULT_GENERATOR_WEIGHTS: Record<GeneratorName, number> = {
  enhanced: 0.4,
  primary_key: 0.3,
  foreign_key: 0.3,
  learned: 0,
};

const weight = z.number().finite().nonnegative();

function weightTableSchema(defaults: WeightTable) {
  return z
    .object({
      base: weight.default(defaults.base),
      primaryKeyToken: weight.default(defaults.primaryKeyToken),
      foreignKeyToken: weight.default(defaults.foreignKeyToken),
      primaryKeyExtra: weight.default(defaults.primaryKeyExtra),
      foreignKeyExtra: weight.default(defaults.foreignKeyExtra),
      referencedExtra: weight.default(defaults.referencedExtra),
      domainKeyword: weight.default(defaults.domainKeyword),
      conditional: weight.default(defaults.conditional),
      joinPattern: weight.default(defaults.joinPattern),
      entity: weight.default(defaults.entity),
    })
    .strict()
    .default({});
}

const learnedProviderSchema = z.enum(["none", "openai", "mock"]);

const configSchema = z
  .object({
    embedding_size: z.number().int().positive().default(DEFAULT_EMBEDDING_SIZE),
    // Once the section is present, generators it leaves out weigh 0
    generator_weights: z
      .object({
        enhanced: weight.default(0),
        primary_key: weight.default(0),
        foreign_key: weight.default(0),
        learned: weight.default(0),
      })
      .strict()
      .default(DEFAULT_GENERATOR_WEIGHTS),
    weight_tables: z
      .object({
        enhanced: weightTableSchema(DEFAULT_WEIGHT_TABLES.enhanced),
        primary_key: weightTableSchema(DEFAULT_WEIGHT_TABLES.primary_key),
        foreign_key: weightTableSchema(DEFAULT_WEIGHT_TABLES.foreign_key),
      })
      .strict()
      .default({}),
    remove_stop_words: z.boolean().default(false),
    sliding_window: z
      .object({
        decay: z.number().min(0).max(1).default(DEFAULT_SLIDING_WINDOW.decay),
        radius: z.number().int().nonnegative().default(DEFAULT_SLIDING_WINDOW.radius),
      })
      .strict()
      .default({}),
    learned: z
      .object({
        provider: learnedProviderSchema.default("none"),
        model: z.string().min(1).default("text-embedding-3-large"),
        dimensions: z.number().int().positive().default(DEFAULT_EMBEDDING_SIZE),
        reduction: z.enum(["none", "truncate", "fold"]).default("truncate"),
        batch_size: z.number().int().positive().default(100),
      })
      .strict()
      .default({}),
    storage: z
      .object({
        database_path: z.string().min(1).default("./schemavec.db"),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ConfigOverrides = z.input<typeof configSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates an in-memory configuration object and fills in defaults.
 */
export function resolveConfig(overrides: unknown = {}): SchemaEmbedConfig {
  const result = configSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const config: SchemaEmbedConfig = result.data;
  return config;
}

function applyEnvOverrides(config: SchemaEmbedConfig): SchemaEmbedConfig {
  if (process.env.SCHEMAVEC_DB_PATH) {
    config.storage.database_path = process.env.SCHEMAVEC_DB_PATH;
  }

  const size = process.env.SCHEMAVEC_EMBEDDING_SIZE;
  if (size) {
    const parsed = Number(size);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new ConfigurationError(`SCHEMAVEC_EMBEDDING_SIZE must be a positive integer, got "${size}"`);
    }
    config.embedding_size = parsed;
  }

  // Allow switching the learned provider (useful for testing)
  const provider = process.env.SCHEMAVEC_LEARNED_PROVIDER;
  if (provider) {
    const parsed = learnedProviderSchema.safeParse(provider);
    if (!parsed.success) {
      throw new ConfigurationError(`Unknown learned provider in SCHEMAVEC_LEARNED_PROVIDER: "${provider}"`);
    }
    config.learned.provider = parsed.data;
  }

  return config;
}

let cachedConfig: SchemaEmbedConfig | null = null;

/**
 * Loads the configuration file, validates it, and caches the result.
 * A missing file at the default path yields the defaults.
 */
export function loadConfig(): SchemaEmbedConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const explicitPath = process.env.SCHEMAVEC_CONFIG_PATH;
  const configPath = explicitPath || DEFAULT_CONFIG_PATH;

  let raw: unknown = {};
  if (existsSync(configPath)) {
    const content = readFileSync(configPath, "utf-8");
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse configuration ${configPath}: ${error}`);
    }
  } else if (explicitPath) {
    throw new ConfigurationError(`Configuration file not found: ${configPath}`);
  }

  cachedConfig = applyEnvOverrides(resolveConfig(raw));
  return cachedConfig;
}

/**
 * Reloads config from disk (useful for testing)
 */
export function reloadConfig(): SchemaEmbedConfig {
  cachedConfig = null;
  return loadConfig();
}

export function getStorageConfig() {
  return loadConfig().storage;
}
