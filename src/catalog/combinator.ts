// ============================================================
// Object Forge - Name Combinator
// Expands the vocabularies into the candidate set of object names
// ============================================================

import type { VocabularyRegistry } from '../shared/types';

/** Joins a qualifier to a base noun */
export function formatName(modifier: string, noun: string): string {
  return `${modifier} ${noun}`;
}

/**
 * Produces every candidate object name for a registry.
 *
 * 1. Every noun of every category is emitted bare.
 * 2. For each rule, every qualifier of the rule's modifier class is
 *    prefixed to the first `limit` nouns of each targeted category.
 *
 * Modifiers are applied singly; names that collide collapse in the set.
 */
export function combineNames(registry: VocabularyRegistry): Set<string> {
  const names = new Set<string>();

  for (const nouns of registry.categories.values()) {
    for (const noun of nouns) {
      names.add(noun);
    }
  }

  for (const rule of registry.rules) {
    const qualifiers = registry.modifiers.get(rule.modifier) ?? [];
    const targets = rule.categories ?? [...registry.categories.keys()];

    for (const category of targets) {
      const nouns = registry.categories.get(category) ?? [];
      const selected = rule.limit === undefined ? nouns : nouns.slice(0, rule.limit);

      for (const noun of selected) {
        for (const qualifier of qualifiers) {
          names.add(formatName(qualifier, noun));
        }
      }
    }
  }

  return names;
}
