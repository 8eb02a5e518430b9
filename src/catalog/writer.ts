// ============================================================
// Object Forge - Artifact Writer
// Persists and reads back the line-delimited name list
// ============================================================

import { readFile, rename, rm, writeFile } from 'fs/promises';
import path from 'path';

/**
 * Raised when an artifact cannot be written. The run is over at that
 * point; no partial artifact is left at the destination.
 */
export class ArtifactWriteError extends Error {
  /** Machine-readable error code */
  readonly code = 'ARTIFACT_WRITE_FAILED';
  /** Path the caller asked to write */
  readonly destination: string;

  constructor(destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not write ${destination}: ${reason}`, { cause });
    this.name = 'ArtifactWriteError';
    this.destination = destination;
  }
}

/** Renders names as newline-terminated lines; no names gives an empty string */
export function formatNameList(names: readonly string[]): string {
  return names.map((name) => `${name}\n`).join('');
}

/**
 * Writes `content` to `destination` through a temporary sibling file that
 * is renamed into place once the write has completed.
 *
 * @throws {ArtifactWriteError} when either step fails
 */
export async function writeFileAtomic(destination: string, content: string): Promise<void> {
  const tempPath = path.join(
    path.dirname(destination),
    `.${path.basename(destination)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, destination);
  } catch (err) {
    const failure = new ArtifactWriteError(destination, err);
    // The write failure is what the caller needs; a failed cleanup is only reported
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      const reason = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
      console.warn(`[catalog] Could not remove ${tempPath}: ${reason}`);
    });
    throw failure;
  }
}

/**
 * Writes the name list artifact, replacing any previous one.
 *
 * @throws {ArtifactWriteError} when the destination is not writable
 */
export async function writeNameList(names: readonly string[], destination: string): Promise<void> {
  await writeFileAtomic(destination, formatNameList(names));
}

/**
 * Reads names back from an artifact: trimmed, blank lines dropped, and
 * cut to the first `count` entries when a count is given.
 */
export async function readNameList(source: string, count?: number): Promise<string[]> {
  const text = await readFile(source, 'utf8');
  const names = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  return count === undefined ? names : names.slice(0, count);
}
