/**
 * Unit tests for the error hierarchy
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  ConfigError,
  DiskSourceError,
  SystemError,
  ValidationError,
  getExitCode,
  isDiskSourceError,
} from '../../../src/core/errors.js';

describe('DiskSourceError', () => {
  it('should format the message with its suggestion', () => {
    const error = new ValidationError('duplicate cookie \'a\'', 'DUPLICATE_COOKIE', 'Remove one of them.');

    assert.strictEqual(error.format(), "Error: duplicate cookie 'a'\n\nFix: Remove one of them.");
  });

  it('should format the message alone without a suggestion', () => {
    const error = new SystemError('loop', 'CHAIN_LOOP');

    assert.strictEqual(error.format(), 'Error: loop');
  });

  it('should list validation findings of a ConfigError', () => {
    const error = new ConfigError('invalid', 'CONFIG_VALIDATION_FAILED', undefined, '/d.yaml', [
      { path: '/source', message: "must have required property 'type'" },
    ]);

    assert.strictEqual(
      error.format(),
      "Error: invalid\n\nValidation errors:\n  - /source: must have required property 'type'"
    );
  });

  it('should keep instanceof working across the hierarchy', () => {
    const error = new ValidationError('bad', 'INVALID_AUTH');

    assert.ok(error instanceof ValidationError);
    assert.ok(error instanceof DiskSourceError);
    assert.ok(error instanceof Error);
    assert.strictEqual(error.name, 'ValidationError');
  });

  it('should carry the cause of a SystemError', () => {
    const cause = new Error('EACCES');
    const error = new SystemError('failed', 'RESOLVER_FAILED', cause, '/a');

    assert.strictEqual(error.cause, cause);
    assert.strictEqual(error.path, '/a');
  });
});

describe('exit codes', () => {
  it('should exit 1 for invalid input', () => {
    assert.strictEqual(new ValidationError('x', 'TARGET_MISMATCH').exitCode, 1);
    assert.strictEqual(new ConfigError('x', 'CONFIG_NOT_FOUND').exitCode, 1);
  });

  it('should exit 2 for system failures', () => {
    assert.strictEqual(new SystemError('x', 'SYMLINK_LOOP').exitCode, 2);
    assert.strictEqual(getExitCode(new SystemError('x', 'KEY_LOOKUP_FAILED')), 2);
  });

  it('should exit 2 for unknown errors', () => {
    assert.strictEqual(getExitCode(new Error('x')), 2);
    assert.strictEqual(isDiskSourceError(new Error('x')), false);
  });
});
