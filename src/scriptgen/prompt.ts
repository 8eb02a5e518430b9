// ============================================================
// Object Forge - Prompt Template
// Asks the LLM for a Blender script that models one object
// ============================================================

import { DEFAULT_EXPORT_FILE_NAME } from '../shared/constants';

export interface ScriptPromptOptions {
  /** STL file the script must export (default "model.stl") */
  exportFileName?: string;
}

/**
 * Builds the single-turn prompt for one object name.
 *
 * @param objectName - Entry from the name list, used verbatim
 */
export function buildScriptPrompt(
  objectName: string,
  options: ScriptPromptOptions = {},
): string {
  const exportFileName = options.exportFileName ?? DEFAULT_EXPORT_FILE_NAME;

  return `Create a Blender Python script that constructs a simple 3D model of ${objectName}.

Requirements:
- Delete any default objects at the start
- Build the model only from primitive meshes (bpy.ops.mesh.primitive_uv_sphere_add, primitive_cube_add, primitive_cone_add, primitive_cylinder_add, etc.)
- Position and scale the parts into reasonable proportions
- Group the parts together
- Export the model as an ASCII STL file named ${exportFileName}

Return only the runnable Python code, no explanations.`;
}
