// ============================================================
// Object Forge - Shared Type Definitions
// Core types used by the catalog and script generation pipelines
// ============================================================

/**
 * Which nouns receive which modifier class.
 * Every qualifier of `modifier` is prefixed to the first `limit` nouns of
 * each listed category.
 */
export interface CombinationRule {
  /** Modifier vocabulary name (e.g. "material") */
  modifier: string;
  /** Category names; undefined means every category */
  categories?: readonly string[];
  /** Number of leading nouns per category; undefined means all of them */
  limit?: number;
}

/** Immutable set of vocabularies the catalog is built from */
export interface VocabularyRegistry {
  /** Category name → base nouns, in declaration order */
  readonly categories: ReadonlyMap<string, readonly string[]>;
  /** Modifier class → qualifiers, in declaration order */
  readonly modifiers: ReadonlyMap<string, readonly string[]>;
  readonly rules: readonly CombinationRule[];
}

/** Options accepted by the catalog builders */
export interface CatalogOptions {
  /** Restrict the catalog to these categories */
  categories?: readonly string[];
}

/** One entry of the generated script document */
export interface GenerationRecord {
  /** Object name taken from the name list */
  input: string;
  /** Text returned by the LLM */
  output: string;
}

/** Counters reported at the end of a script generation run */
export interface GenerationSummary {
  generated: number;
  skipped: number;
  total: number;
  /** Outputs that carry no fenced Python block */
  withoutCode: number;
}

/** Token accounting reported by a provider call */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}
