/**
 * Unit tests for verbose output helpers
 *
 * Tests formatCommand() and quoteArgument() from src/udev/verbose.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { formatCommand, quoteArgument, supportsAnsi } from '../../../src/udev/verbose.js';

describe('quoteArgument', () => {
  it('should leave plain arguments alone', () => {
    assert.strictEqual(quoteArgument('--device'), '--device');
    assert.strictEqual(quoteArgument('/dev/sdb'), '/dev/sdb');
  });

  it('should quote arguments with spaces', () => {
    assert.strictEqual(quoteArgument('a b'), "'a b'");
  });

  it('should quote the empty string', () => {
    assert.strictEqual(quoteArgument(''), "''");
  });

  it('should escape embedded single quotes', () => {
    assert.strictEqual(quoteArgument("it's"), "'it'\\''s'");
  });
});

describe('formatCommand', () => {
  it('should produce expected exact format', () => {
    const result = formatCommand('/lib/udev/scsi_id', ['--device', '/dev/sdb'], false);
    assert.strictEqual(result, '\n[CMD] /lib/udev/scsi_id --device /dev/sdb\n\n');
  });

  it('should wrap in ANSI gray when enabled', () => {
    const result = formatCommand('scsi_id', [], true);
    assert.strictEqual(result, '\x1b[90m\n[CMD] scsi_id\n\n\x1b[0m');
  });
});

describe('supportsAnsi', () => {
  it('should return a boolean', () => {
    assert.strictEqual(typeof supportsAnsi(), 'boolean');
  });
});
