// ============================================================
// Object Forge - Constants
// ============================================================

/** Default location of the name list artifact */
export const DEFAULT_NAME_LIST_PATH = 'objects.txt';

/** Default location of the generated script document */
export const DEFAULT_RESULTS_PATH = 'generated_scripts.json';

/** How many names the script pipeline takes from the head of the list */
export const DEFAULT_SCRIPT_COUNT = 10;

/** Number of names printed after the catalog is written */
export const DEFAULT_PREVIEW_COUNT = 50;

/** STL file name the generated Blender scripts are told to export */
export const DEFAULT_EXPORT_FILE_NAME = 'model.stl';

/** LLM request defaults */
export const GENERATION_DEFAULTS = {
  PROVIDER: 'claude-sonnet',
  MAX_TOKENS: 4000,
  TEMPERATURE: 0.2,
} as const;

/** Environment variables read by the CLI */
export const ENV_KEYS = {
  PROVIDER: 'OBJECT_FORGE_PROVIDER',
  MODEL: 'OBJECT_FORGE_MODEL',
  MAX_TOKENS: 'OBJECT_FORGE_MAX_TOKENS',
  TEMPERATURE: 'OBJECT_FORGE_TEMPERATURE',
} as const;
