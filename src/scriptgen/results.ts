// ============================================================
// Object Forge - Results Document
// Reads and writes the ordered list of generation records
// ============================================================

import { readFile } from 'fs/promises';
import type { GenerationRecord } from '../shared/types';
import { writeFileAtomic } from '../catalog/writer';

/**
 * Loads an earlier results document as a map of input → output.
 *
 * A missing file means there is nothing to reuse. A file that cannot be
 * read or parsed is reported and treated the same way.
 */
export async function loadExistingResults(source: string): Promise<Map<string, string>> {
  let text: string;
  try {
    text = await readFile(source, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) {
      console.log(`[scriptgen] No existing results file found at ${source}`);
    } else {
      console.warn(`[scriptgen] Could not read ${source}, starting fresh:`, (err as Error).message);
    }
    return new Map();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    console.warn(`[scriptgen] ${source} is not valid JSON, starting fresh:`, (err as Error).message);
    return new Map();
  }

  if (!Array.isArray(parsed)) {
    console.warn(`[scriptgen] ${source} does not hold a list of records, starting fresh.`);
    return new Map();
  }

  const existing = new Map<string, string>();
  for (const item of parsed) {
    if (isGenerationRecord(item) && !existing.has(item.input)) {
      existing.set(item.input, item.output);
    }
  }

  console.log(`[scriptgen] Loaded ${existing.size} existing results from ${source}`);
  return existing;
}

/** Serializes records as a 2-space indented JSON array */
export function formatResults(records: readonly GenerationRecord[]): string {
  return `${JSON.stringify(records, null, 2)}\n`;
}

/**
 * @throws {ArtifactWriteError} when the destination is not writable
 */
export async function saveResults(
  records: readonly GenerationRecord[],
  destination: string,
): Promise<void> {
  await writeFileAtomic(destination, formatResults(records));
  console.log(`[scriptgen] Results saved to ${destination}`);
}

function isGenerationRecord(value: unknown): value is GenerationRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'input' in value &&
    'output' in value &&
    typeof value.input === 'string' &&
    typeof value.output === 'string'
  );
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
