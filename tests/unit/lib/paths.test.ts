/**
 * Unit tests for path expansion
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { expandPath } from '../../../src/lib/paths.js';

describe('expandPath', () => {
  it('should expand ~ to the home directory', () => {
    assert.strictEqual(expandPath('~/images/a.img'), join(homedir(), 'images/a.img'));
    assert.strictEqual(expandPath('~'), homedir());
  });

  it('should not expand ~ inside a name', () => {
    assert.strictEqual(expandPath('~other/a.img'), '~other/a.img');
  });

  it('should expand environment variables', () => {
    process.env['DISK_SOURCE_TEST_DIR'] = '/srv/images';
    try {
      assert.strictEqual(expandPath('$DISK_SOURCE_TEST_DIR/a.img'), '/srv/images/a.img');
    } finally {
      delete process.env['DISK_SOURCE_TEST_DIR'];
    }
  });

  it('should keep a $ that names no set variable', () => {
    assert.strictEqual(expandPath('/a/$DISK_SOURCE_UNSET_VAR.img'), '/a/$DISK_SOURCE_UNSET_VAR.img');
  });

  it('should keep ".." for the canonicalizer', () => {
    assert.strictEqual(expandPath('link/../a.img', '/srv'), '/srv/link/../a.img');
    assert.strictEqual(expandPath('~/link/..'), `${homedir()}/link/..`);
  });

  it('should not double the separator after a base ending in a slash', () => {
    assert.strictEqual(expandPath('a.img', '/'), '/a.img');
    assert.strictEqual(expandPath('a.img', '/srv/'), '/srv/a.img');
  });

  it('should keep a relative path relative without a base', () => {
    assert.strictEqual(expandPath('images/a.img'), 'images/a.img');
  });

  it('should resolve a relative path against the base', () => {
    assert.strictEqual(expandPath('images/a.img', '/srv'), '/srv/images/a.img');
  });

  it('should leave an absolute path alone', () => {
    assert.strictEqual(expandPath('/var/a.img', '/srv'), '/var/a.img');
  });
});
