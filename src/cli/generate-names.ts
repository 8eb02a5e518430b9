#!/usr/bin/env tsx
// ============================================================
// Object Forge - generate-names entry point
// ============================================================

import { DEFAULT_REGISTRY, generateCatalog } from '../catalog';
import { NAMES_USAGE, parseNamesArgs } from './args';
import { reportFatal } from './report';

async function main(): Promise<void> {
  const command = parseNamesArgs(process.argv.slice(2));
  if (command.help) {
    console.log(NAMES_USAGE);
    return;
  }

  const names = await generateCatalog(command.outPath, DEFAULT_REGISTRY, {
    categories: command.categories.length > 0 ? command.categories : undefined,
  });

  const preview = names.slice(0, command.preview);
  if (preview.length > 0) {
    console.log(`\nFirst ${preview.length} objects:`);
    const width = String(preview.length).length;
    preview.forEach((name, i) => console.log(`${String(i + 1).padStart(width)}. ${name}`));
  }
}

main().catch(reportFatal);
