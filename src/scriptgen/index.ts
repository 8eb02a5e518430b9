// ============================================================
// Object Forge - Script Generation
// Public API surface for the script generation module
// ============================================================

// ---- Prompt builder ----
export { buildScriptPrompt } from './prompt';
export type { ScriptPromptOptions } from './prompt';

// ---- Generator capability ----
export { ProviderScriptGenerator, ServiceError } from './generator';
export type { ProviderGeneratorConfig, ScriptGenerator } from './generator';

// ---- Provider dispatcher ----
export { callProvider, getProvider, isKnownProvider, listProviders } from './providers';
export type { ProviderKeyFamily, ProviderResult } from './providers';

// ---- Output handling ----
export { extractScript } from './extract';
export { formatResults, loadExistingResults, saveResults } from './results';
export { runScriptGeneration } from './runner';
export type { ScriptRunOptions, ScriptRunResult } from './runner';
