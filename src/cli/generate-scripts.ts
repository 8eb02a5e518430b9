#!/usr/bin/env tsx
// ============================================================
// Object Forge - generate-scripts entry point
// ============================================================

import 'dotenv/config';
import { loadConfig } from '../config/env';
import { ProviderScriptGenerator, runScriptGeneration } from '../scriptgen';
import { SCRIPTS_USAGE, parseScriptsArgs } from './args';
import { reportFatal } from './report';

async function main(): Promise<void> {
  const command = parseScriptsArgs(process.argv.slice(2));
  if (command.help) {
    console.log(SCRIPTS_USAGE);
    return;
  }

  const generator = new ProviderScriptGenerator(loadConfig());
  const { summary } = await runScriptGeneration({
    generator,
    namesPath: command.inPath,
    outputPath: command.outPath,
    count: command.count,
    reuseExisting: !command.fresh,
  });

  console.log(`Processed ${summary.total} objects:`);
  console.log(`- Generated new scripts: ${summary.generated}`);
  console.log(`- Skipped existing: ${summary.skipped}`);
  console.log(`- Without a Python code block: ${summary.withoutCode}`);
}

main().catch(reportFatal);
