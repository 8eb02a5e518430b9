// ============================================================
// Object Forge - Script Extraction
// ============================================================

const PYTHON_FENCE = /```(?:python|py)\b[ \t]*\r?\n?([\s\S]*?)(?:```|$)/;

/**
 * Returns the body of the first fenced Python block in an LLM reply,
 * or null when the reply has none. A block cut off before its closing
 * fence runs to the end of the text.
 */
export function extractScript(text: string): string | null {
  const match = PYTHON_FENCE.exec(text);
  if (!match) return null;

  const body = match[1].trim();
  return body.length > 0 ? body : null;
}
