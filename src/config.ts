import { readFile } from "node:fs/promises";

import { z } from "zod";

import { ConfigurationError, toIssues } from "./core/errors.js";
import { MAX_TERM_LENGTH } from "./core/impl/documentSchemas.js";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);
const LogFormatSchema = z.enum(["json", "pretty"]);

export const TokenizerConfigSchema = z
  .object({
    stemmer: z.enum(["none", "porter"]).default("none"),
    removeStopWords: z.boolean().default(false),
    /** replaces the built-in English list */
    stopWords: z.array(z.string().min(1)).optional(),
    foldDiacritics: z.boolean().default(true),
    minTokenLength: z.number().int().min(1).default(1),
    maxTokenLength: z.number().int().min(1).max(MAX_TERM_LENGTH).default(100),
    locale: z.string().min(1).default("en"),
  })
  .refine((t) => t.minTokenLength <= t.maxTokenLength, {
    message: "minTokenLength must not exceed maxTokenLength",
    path: ["minTokenLength"],
  });

export const RankingConfigSchema = z.object({
  model: z.enum(["tfidf", "bm25"]).default("tfidf"),
  idfSmoothing: z.number().positive().default(1),
  normalizeLength: z.boolean().default(true),
  k1: z.number().nonnegative().default(1.2),
  b: z.number().min(0).max(1).default(0.75),
  fieldWeights: z.record(z.string().min(1), z.number().positive()).default({}),
});

export const FuzzyConfigSchema = z.object({
  /** upper bound for the per-search maxFuzzyDistance option */
  maxDistance: z.number().int().min(0).max(10).default(3),
  prefixLength: z.number().int().min(0).default(0),
});

export const SearchConfigSchema = z
  .object({
    defaultLimit: z.number().int().positive().default(10),
    maxLimit: z.number().int().positive().default(1000),
  })
  .refine((s) => s.defaultLimit <= s.maxLimit, {
    message: "defaultLimit must not exceed maxLimit",
    path: ["defaultLimit"],
  });

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  format: LogFormatSchema.default("json"),
  name: z.string().min(1).default("search-core"),
});

export const EngineConfigSchema = z.object({
  tokenizer: TokenizerConfigSchema.default({}),
  ranking: RankingConfigSchema.default({}),
  fuzzy: FuzzyConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  /** synonym classes defined when the engine starts */
  synonyms: z.array(z.array(z.string().min(1)).min(2)).default([]),
  logging: LoggingConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type Env = Readonly<Record<string, string | undefined>>;

function parse(input: unknown, source: string): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`invalid configuration (${source})`, toIssues(result.error.issues));
  }
  return result.data;
}

function envValue(env: Env, key: string): string | undefined {
  const v = env[key]?.trim();
  return v ? v : undefined;
}

/** Numeric env values pass through as NaN when malformed, so zod reports them. */
function envNumber(env: Env, key: string): number | undefined {
  const v = envValue(env, key);
  return v === undefined ? undefined : Number(v);
}

function override(key: string, value: string | number | undefined): Record<string, string | number> {
  return value === undefined ? {} : { [key]: value };
}

/**
 * Validates `input`, fills in defaults, then applies environment overrides:
 *
 * - SEARCH_LOG_LEVEL, SEARCH_LOG_FORMAT
 * - SEARCH_STEMMER ("none" | "porter")
 * - SEARCH_RANKING_MODEL ("tfidf" | "bm25")
 * - SEARCH_DEFAULT_LIMIT, SEARCH_MAX_FUZZY_DISTANCE
 */
export function resolveConfig(input: unknown = {}, env: Env = process.env): EngineConfig {
  const base = parse(input ?? {}, "input");

  const overlay = {
    ...base,
    tokenizer: { ...base.tokenizer, ...override("stemmer", envValue(env, "SEARCH_STEMMER")) },
    ranking: { ...base.ranking, ...override("model", envValue(env, "SEARCH_RANKING_MODEL")) },
    fuzzy: { ...base.fuzzy, ...override("maxDistance", envNumber(env, "SEARCH_MAX_FUZZY_DISTANCE")) },
    search: { ...base.search, ...override("defaultLimit", envNumber(env, "SEARCH_DEFAULT_LIMIT")) },
    logging: {
      ...base.logging,
      ...override("level", envValue(env, "SEARCH_LOG_LEVEL")?.toLowerCase()),
      ...override("format", envValue(env, "SEARCH_LOG_FORMAT")?.toLowerCase()),
    },
  };

  return parse(overlay, "environment");
}

/** Reads a JSON configuration file and resolves it like `resolveConfig`. */
export async function loadConfigFile(path: string, env: Env = process.env): Promise<EngineConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`cannot read configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`configuration file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveConfig(data, env);
}
