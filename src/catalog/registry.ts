// ============================================================
// Object Forge - Vocabulary Registry
// Validates and freezes the category / modifier vocabularies
// ============================================================

import type { CombinationRule, VocabularyRegistry } from '../shared/types';
import bundledVocabulary from './vocabulary.json';

/**
 * Raised when a vocabulary source is malformed or a rule refers to a
 * category or modifier class that does not exist.
 */
export class RegistryError extends Error {
  /** Machine-readable error code */
  readonly code: string;

  constructor(message: string, code: string = 'INVALID_VOCABULARY') {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
  }
}

// ------------------------------------------------------------------
// Construction
// ------------------------------------------------------------------

/**
 * Builds a frozen registry from a raw vocabulary source.
 *
 * The source is an object shaped like `vocabulary.json`:
 * `{ categories: { name: string[] }, modifiers: { name: string[] }, rules?: [...] }`.
 * Declaration order of categories, modifiers and nouns is preserved.
 *
 * @throws {RegistryError} when the source does not have that shape
 */
export function createRegistry(source: unknown): VocabularyRegistry {
  if (!isRecord(source)) {
    throw new RegistryError('Vocabulary source must be an object.');
  }

  const categories = readVocabularyGroup(source.categories, 'categories');
  const modifiers = readVocabularyGroup(source.modifiers, 'modifiers');

  const rawRules = source.rules ?? [];
  if (!Array.isArray(rawRules)) {
    throw new RegistryError('"rules" must be an array.');
  }

  const rules = rawRules.map((raw, index) => readRule(raw, index, categories, modifiers));

  return Object.freeze({
    categories,
    modifiers,
    rules: Object.freeze(rules),
  });
}

/** Registry built from the vocabulary bundled with the program */
export const DEFAULT_REGISTRY: VocabularyRegistry = createRegistry(bundledVocabulary);

// ------------------------------------------------------------------
// Enumeration
// ------------------------------------------------------------------

export function listCategories(registry: VocabularyRegistry): string[] {
  return [...registry.categories.keys()];
}

export function listModifierClasses(registry: VocabularyRegistry): string[] {
  return [...registry.modifiers.keys()];
}

/**
 * Returns a registry that only contains the named categories. Rules keep
 * the categories that survive; a rule left with none is dropped.
 *
 * @throws {RegistryError} when a name is not a known category
 */
export function selectCategories(
  registry: VocabularyRegistry,
  names: readonly string[],
): VocabularyRegistry {
  const unknown = names.filter((name) => !registry.categories.has(name));
  if (unknown.length > 0) {
    throw new RegistryError(
      `Unknown category: ${unknown.join(', ')}. Valid: ${listCategories(registry).join(', ')}`,
      'UNKNOWN_CATEGORY',
    );
  }

  const enabled = new Set(names);
  const categories = new Map(
    [...registry.categories].filter(([name]) => enabled.has(name)),
  );

  const rules: CombinationRule[] = [];
  for (const rule of registry.rules) {
    const targets = (rule.categories ?? listCategories(registry)).filter((name) => enabled.has(name));
    if (targets.length > 0) {
      rules.push({ ...rule, categories: Object.freeze(targets) });
    }
  }

  return Object.freeze({
    categories,
    modifiers: registry.modifiers,
    rules: Object.freeze(rules),
  });
}

// ------------------------------------------------------------------
// Validation helpers
// ------------------------------------------------------------------

function readVocabularyGroup(
  value: unknown,
  field: string,
): ReadonlyMap<string, readonly string[]> {
  if (!isRecord(value)) {
    throw new RegistryError(`"${field}" must be an object of string arrays.`);
  }

  const group = new Map<string, readonly string[]>();
  for (const [name, words] of Object.entries(value)) {
    if (!isStringArray(words)) {
      throw new RegistryError(`"${field}.${name}" must be an array of strings.`);
    }
    const blank = words.find((w) => w.trim().length === 0);
    if (blank !== undefined) {
      throw new RegistryError(`"${field}.${name}" contains an empty entry.`);
    }
    // Each name becomes one line of the artifact
    const malformed = words.find((w) => /[\r\n]/.test(w) || w !== w.trim());
    if (malformed !== undefined) {
      throw new RegistryError(
        `"${field}.${name}" entry ${JSON.stringify(malformed)} has a line break or surrounding whitespace.`,
      );
    }
    group.set(name, Object.freeze([...words]));
  }
  return group;
}

function readRule(
  raw: unknown,
  index: number,
  categories: ReadonlyMap<string, readonly string[]>,
  modifiers: ReadonlyMap<string, readonly string[]>,
): CombinationRule {
  if (!isRecord(raw) || typeof raw.modifier !== 'string') {
    throw new RegistryError(`rules[${index}] must be an object with a "modifier" string.`);
  }

  if (!modifiers.has(raw.modifier)) {
    throw new RegistryError(
      `rules[${index}] refers to unknown modifier class "${raw.modifier}".`,
      'UNKNOWN_MODIFIER',
    );
  }

  const rule: CombinationRule = { modifier: raw.modifier };

  if (raw.categories !== undefined) {
    if (!isStringArray(raw.categories)) {
      throw new RegistryError(`rules[${index}].categories must be an array of strings.`);
    }
    const missing = raw.categories.filter((c) => !categories.has(c));
    if (missing.length > 0) {
      throw new RegistryError(
        `rules[${index}] refers to unknown category "${missing[0]}".`,
        'UNKNOWN_CATEGORY',
      );
    }
    rule.categories = Object.freeze([...raw.categories]);
  }

  if (raw.limit !== undefined) {
    if (typeof raw.limit !== 'number' || !Number.isInteger(raw.limit) || raw.limit < 0) {
      throw new RegistryError(`rules[${index}].limit must be a non-negative integer.`);
    }
    rule.limit = raw.limit;
  }

  return Object.freeze(rule);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
