// ============================================================
// Tests for src/cli/report.ts
// ============================================================

import { describe, it, expect, afterEach } from 'vitest';
import { reportFatal } from '../../src/cli/report';
import { UsageError } from '../../src/cli/args';
import { ConfigError } from '../../src/config/env';

afterEach(() => {
  process.exitCode = undefined;
});

describe('reportFatal', () => {
  it('should point usage errors at --help', () => {
    reportFatal(new UsageError('Unknown option: --colour'));

    expect(console.error).toHaveBeenCalledWith(
      '[cli] Unknown option: --colour\nRun with --help for usage.',
    );
    expect(process.exitCode).toBe(1);
  });

  it('should include the error code when there is one', () => {
    reportFatal(new ConfigError('ANTHROPIC_API_KEY is not set.', 'MISSING_API_KEY'));

    expect(console.error).toHaveBeenCalledWith(
      '[cli] ConfigError (MISSING_API_KEY): ANTHROPIC_API_KEY is not set.',
    );
    expect(process.exitCode).toBe(1);
  });

  it('should log plain errors by name', () => {
    reportFatal(new Error('boom'));

    expect(console.error).toHaveBeenCalledWith('[cli] Error: boom');
    expect(process.exitCode).toBe(1);
  });

  it('should log values that are not errors as they are', () => {
    reportFatal('oops');

    expect(console.error).toHaveBeenCalledWith('[cli] Unexpected failure:', 'oops');
    expect(process.exitCode).toBe(1);
  });
});
