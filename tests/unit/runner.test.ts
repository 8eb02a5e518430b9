// ============================================================
// Tests for src/scriptgen/runner.ts
// Covers: ordering, count, reuse of earlier results, fatal failures
// ============================================================

import { describe, it, expect } from 'vitest';
import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { runScriptGeneration } from '../../src/scriptgen/runner';
import { ServiceError } from '../../src/scriptgen/generator';
import { FakeScriptGenerator, scriptFor } from '../helpers/fake-generator';
import { useTempDir } from '../helpers/tmp-dir';

const tempDir = useTempDir();

async function setup(names: string[]) {
  const namesPath = path.join(tempDir(), 'objects.txt');
  const outputPath = path.join(tempDir(), 'generated_scripts.json');
  await writeFile(namesPath, names.map((n) => `${n}\n`).join(''));
  return { namesPath, outputPath };
}

describe('runScriptGeneration', () => {
  it('should call the generator once per name in list order', async () => {
    const paths = await setup(['bowl', 'chair', 'mug']);
    const generator = new FakeScriptGenerator();

    const { records, summary } = await runScriptGeneration({ generator, ...paths });

    expect(generator.calls).toEqual(['bowl', 'chair', 'mug']);
    expect(records).toEqual([
      { input: 'bowl', output: scriptFor('bowl') },
      { input: 'chair', output: scriptFor('chair') },
      { input: 'mug', output: scriptFor('mug') },
    ]);
    expect(summary).toEqual({ generated: 3, skipped: 0, total: 3, withoutCode: 0 });
  });

  it('should only process the first count names', async () => {
    const paths = await setup(['a', 'b', 'c', 'd']);
    const generator = new FakeScriptGenerator();

    const { summary } = await runScriptGeneration({ generator, ...paths, count: 2 });

    expect(generator.calls).toEqual(['a', 'b']);
    expect(summary.total).toBe(2);
  });

  it('should write the records to the results document', async () => {
    const paths = await setup(['cup']);

    await runScriptGeneration({ generator: new FakeScriptGenerator(), ...paths });

    const written = JSON.parse(await readFile(paths.outputPath, 'utf8'));
    expect(written).toEqual([{ input: 'cup', output: scriptFor('cup') }]);
  });

  it('should reuse outputs from an earlier run', async () => {
    const paths = await setup(['bowl', 'cup']);
    await writeFile(paths.outputPath, JSON.stringify([{ input: 'bowl', output: 'cached' }]));
    const generator = new FakeScriptGenerator();

    const { records, summary } = await runScriptGeneration({ generator, ...paths });

    expect(generator.calls).toEqual(['cup']);
    expect(records).toEqual([
      { input: 'bowl', output: 'cached' },
      { input: 'cup', output: scriptFor('cup') },
    ]);
    expect(summary).toEqual({ generated: 1, skipped: 1, total: 2, withoutCode: 1 });
  });

  it('should regenerate everything when reuse is off', async () => {
    const paths = await setup(['bowl']);
    await writeFile(paths.outputPath, JSON.stringify([{ input: 'bowl', output: 'cached' }]));
    const generator = new FakeScriptGenerator();

    const { records } = await runScriptGeneration({ generator, ...paths, reuseExisting: false });

    expect(generator.calls).toEqual(['bowl']);
    expect(records[0].output).toBe(scriptFor('bowl'));
  });

  it('should stop at the first failure and write nothing', async () => {
    const paths = await setup(['bowl', 'chair', 'mug']);
    const generator = new FakeScriptGenerator(['chair']);

    const error = await runScriptGeneration({ generator, ...paths }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ServiceError);
    expect((error as ServiceError).message).toBe('quota exceeded for "chair"');
    expect(generator.calls).toEqual(['bowl', 'chair']);
    await expect(readFile(paths.outputPath, 'utf8')).rejects.toThrow('ENOENT');
  });

  it('should leave an earlier results document untouched on failure', async () => {
    const paths = await setup(['bowl', 'chair']);
    const previous = JSON.stringify([{ input: 'bowl', output: 'cached' }]);
    await writeFile(paths.outputPath, previous);

    await expect(
      runScriptGeneration({ generator: new FakeScriptGenerator(['chair']), ...paths }),
    ).rejects.toBeInstanceOf(ServiceError);

    expect(await readFile(paths.outputPath, 'utf8')).toBe(previous);
  });

  it('should count outputs without a python block', async () => {
    const paths = await setup(['cup']);
    const generator = { generate: async () => 'I cannot help with that.' };

    const { summary } = await runScriptGeneration({ generator, ...paths });

    expect(summary.withoutCode).toBe(1);
    expect(console.warn).toHaveBeenCalledWith('[scriptgen] Output for "cup" has no fenced Python block');
  });

  it('should fail when the name list is missing', async () => {
    await expect(
      runScriptGeneration({
        generator: new FakeScriptGenerator(),
        namesPath: path.join(tempDir(), 'objects.txt'),
        outputPath: path.join(tempDir(), 'out.json'),
      }),
    ).rejects.toThrow('ENOENT');
  });
});
