// ============================================================
// Object Forge - Catalog Pipeline
// Vocabulary registry → combinator → sorter → artifact
// ============================================================

import type { CatalogOptions, VocabularyRegistry } from '../shared/types';
import { combineNames } from './combinator';
import { DEFAULT_REGISTRY, selectCategories } from './registry';
import { sortUnique } from './sorter';
import { writeNameList } from './writer';

export {
  createRegistry,
  DEFAULT_REGISTRY,
  listCategories,
  listModifierClasses,
  selectCategories,
  RegistryError,
} from './registry';
export { combineNames, formatName } from './combinator';
export { compareNames, sortUnique } from './sorter';
export {
  ArtifactWriteError,
  formatNameList,
  readNameList,
  writeFileAtomic,
  writeNameList,
} from './writer';

/**
 * Builds the sorted, duplicate-free name list for a registry.
 * The result only depends on the registry contents.
 */
export function buildNameList(
  registry: VocabularyRegistry = DEFAULT_REGISTRY,
  options: CatalogOptions = {},
): string[] {
  const source = options.categories
    ? selectCategories(registry, options.categories)
    : registry;

  return sortUnique(combineNames(source));
}

/**
 * Builds the name list and writes it to `destination`.
 *
 * @returns the names that were written
 * @throws {ArtifactWriteError} when the destination is not writable
 */
export async function generateCatalog(
  destination: string,
  registry: VocabularyRegistry = DEFAULT_REGISTRY,
  options: CatalogOptions = {},
): Promise<string[]> {
  const names = buildNameList(registry, options);
  console.log(`[catalog] Generated ${names.length} unique object names`);

  await writeNameList(names, destination);
  console.log(`[catalog] Saved ${names.length} names to ${destination}`);

  return names;
}
