import { UsageError } from './args';

/** Logs a fatal error and marks the process as failed */
export function reportFatal(err: unknown): void {
  if (err instanceof UsageError) {
    console.error(`[cli] ${err.message}\nRun with --help for usage.`);
  } else if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? ` (${err.code})` : '';
    console.error(`[cli] ${err.name}${code}: ${err.message}`);
  } else {
    console.error('[cli] Unexpected failure:', err);
  }
  process.exitCode = 1;
}
