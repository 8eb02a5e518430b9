// ============================================================
// Object Forge - Script Generation Run
// Reads the head of the name list and generates one script per name
// ============================================================

import { readNameList } from '../catalog/writer';
import { DEFAULT_NAME_LIST_PATH, DEFAULT_RESULTS_PATH } from '../shared/constants';
import type { GenerationRecord, GenerationSummary } from '../shared/types';
import { extractScript } from './extract';
import type { ScriptGenerator } from './generator';
import { loadExistingResults, saveResults } from './results';

export interface ScriptRunOptions {
  generator: ScriptGenerator;
  /** Name list artifact to read (default "objects.txt") */
  namesPath?: string;
  /** Results document to write (default "generated_scripts.json") */
  outputPath?: string;
  /** Number of leading names to process; undefined processes all of them */
  count?: number;
  /** Copy outputs for names already present in the results document */
  reuseExisting?: boolean;
}

export interface ScriptRunResult {
  records: GenerationRecord[];
  summary: GenerationSummary;
}

/**
 * Generates scripts for the first `count` names, one call at a time and
 * in list order. The results document is written only after every name
 * has been handled; the first generator failure ends the run and nothing
 * is written.
 */
export async function runScriptGeneration(options: ScriptRunOptions): Promise<ScriptRunResult> {
  const namesPath = options.namesPath ?? DEFAULT_NAME_LIST_PATH;
  const outputPath = options.outputPath ?? DEFAULT_RESULTS_PATH;
  const reuseExisting = options.reuseExisting ?? true;

  const existing = reuseExisting ? await loadExistingResults(outputPath) : new Map<string, string>();
  const names = await readNameList(namesPath, options.count);
  console.log(`[scriptgen] Read ${names.length} objects from ${namesPath}`);

  const records: GenerationRecord[] = [];
  let generated = 0;
  let skipped = 0;
  let withoutCode = 0;

  for (const [index, name] of names.entries()) {
    console.log(`[scriptgen] Processing object ${index + 1}/${names.length}: ${name}`);

    let output = existing.get(name);
    if (output !== undefined) {
      console.log(`[scriptgen] Skipping ${name} - already generated`);
      skipped++;
    } else {
      output = await options.generator.generate(name);
      generated++;
    }

    if (extractScript(output) === null) {
      console.warn(`[scriptgen] Output for "${name}" has no fenced Python block`);
      withoutCode++;
    }

    records.push({ input: name, output });
  }

  await saveResults(records, outputPath);

  const summary: GenerationSummary = {
    generated,
    skipped,
    total: records.length,
    withoutCode,
  };
  return { records, summary };
}
