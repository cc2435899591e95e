import { resolveConfig, type EngineConfig, type Env } from "./config.js";
import type { Ranker } from "./core/ranker.js";
import {
  Bm25Ranker,
  LevenshteinFuzzyMatcher,
  MemoryInvertedIndex,
  MemorySearchEngine,
  MemorySynonymTable,
  MinHeapTopKSelector,
  PorterStemmer,
  QueryEvaluator,
  SimpleTokenizer,
  TfIdfRanker,
  type DocMatch,
} from "./core/impl/index.js";
import { createLogger, type Logger } from "./logger.js";

export interface CreateSearchEngineOptions {
  /** defaults to a pino logger built from the `logging` section */
  logger?: Logger;
  /** environment consulted for SEARCH_* overrides; process.env by default */
  env?: Env;
}

function createRanker(ranking: EngineConfig["ranking"]): Ranker {
  return ranking.model === "bm25"
    ? new Bm25Ranker({ k1: ranking.k1, b: ranking.b })
    : new TfIdfRanker({ idfSmoothing: ranking.idfSmoothing, normalizeLength: ranking.normalizeLength });
}

/**
 * Wires an in-memory engine from configuration. The input is validated with
 * EngineConfigSchema (ConfigurationError on failure) and synonym classes from
 * the config are defined before the engine is returned.
 */
export function createSearchEngine(config: unknown = {}, options: CreateSearchEngineOptions = {}): MemorySearchEngine {
  const resolved = resolveConfig(config, options.env ?? process.env);
  const { tokenizer: tk, fuzzy, search, logging } = resolved;

  const logger =
    options.logger ?? createLogger({ level: logging.level, format: logging.format, name: logging.name });

  const tokenizer = new SimpleTokenizer({
    stemmer: tk.stemmer === "porter" ? new PorterStemmer() : undefined,
    stopWords: tk.stopWords && new Set(tk.stopWords),
    removeStopWords: tk.removeStopWords,
    foldDiacritics: tk.foldDiacritics,
    minTokenLength: tk.minTokenLength,
    maxTokenLength: tk.maxTokenLength,
    locale: tk.locale,
  });

  const evaluator = new QueryEvaluator({
    tokenizer,
    fuzzy: new LevenshteinFuzzyMatcher({ prefixLength: fuzzy.prefixLength }),
    ranker: createRanker(resolved.ranking),
    fieldWeights: new Map(Object.entries(resolved.ranking.fieldWeights)),
  });

  const engine = new MemorySearchEngine({
    tokenizer,
    index: new MemoryInvertedIndex({ tokenizer }),
    synonyms: new MemorySynonymTable(),
    evaluator,
    topK: new MinHeapTopKSelector<DocMatch>(),
    logger,
    limits: { defaultLimit: search.defaultLimit, maxLimit: search.maxLimit, maxFuzzyDistance: fuzzy.maxDistance },
  });

  if (resolved.synonyms.length) engine.replaceSynonymClasses(resolved.synonyms);
  logger.debug({ ranking: resolved.ranking.model, stemmer: tk.stemmer }, "search engine created");
  return engine;
}
