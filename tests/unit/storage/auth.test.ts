/**
 * Unit tests for auth definitions
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { ValidationError } from '../../../src/core/errors.js';
import { IndentedBuffer } from '../../../src/document/buffer.js';
import { documentNode } from '../../../src/document/node.js';
import {
  copyAuthDef,
  formatAuthDef,
  parseAuthDef,
  parseSecretLookup,
} from '../../../src/storage/auth.js';

const SECRET_UUID = 'c4b0a2f4-2d3e-4d7c-9a51-0e6f2b7d1a10';

function assertAuthError(fn: () => void, message: string): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.strictEqual(error.code, 'INVALID_AUTH');
    assert.strictEqual(error.message, message);
    return true;
  });
}

describe('parseSecretLookup', () => {
  it('should parse a uuid reference', () => {
    const lookup = parseSecretLookup(documentNode({ uuid: SECRET_UUID }));
    assert.deepStrictEqual(lookup, { type: 'uuid', uuid: SECRET_UUID });
  });

  it('should parse a usage reference', () => {
    const lookup = parseSecretLookup(documentNode({ usage: 'lun-secret' }));
    assert.deepStrictEqual(lookup, { type: 'usage', usage: 'lun-secret' });
  });

  it('should reject both uuid and usage', () => {
    assertAuthError(
      () => parseSecretLookup(documentNode({ uuid: SECRET_UUID, usage: 'x' })),
      'either secret uuid or usage expected, not both'
    );
  });

  it('should reject a malformed uuid', () => {
    assertAuthError(
      () => parseSecretLookup(documentNode({ uuid: 'not-a-uuid' })),
      "invalid secret uuid 'not-a-uuid'"
    );
  });

  it('should reject neither uuid nor usage', () => {
    assertAuthError(
      () => parseSecretLookup(documentNode({ type: 'iscsi' })),
      'missing secret uuid or usage attribute'
    );
  });

  it('should report the requested error code', () => {
    assert.throws(
      () => parseSecretLookup(documentNode({}), 'INVALID_ENCRYPTION'),
      (error: unknown) => error instanceof ValidationError && error.code === 'INVALID_ENCRYPTION'
    );
  });
});

describe('parseAuthDef', () => {
  it('should parse a chap definition', () => {
    const auth = parseAuthDef(
      documentNode({
        username: 'admin',
        type: 'chap',
        secret: { type: 'iscsi', usage: 'lun-secret' },
      })
    );

    assert.deepStrictEqual(auth, {
      username: 'admin',
      secretType: 'iscsi',
      authType: 'chap',
      secret: { type: 'usage', usage: 'lun-secret' },
    });
  });

  it('should default the auth type to none', () => {
    const auth = parseAuthDef(
      documentNode({ username: 'client.admin', secret: { type: 'ceph', uuid: SECRET_UUID } })
    );

    assert.strictEqual(auth.authType, 'none');
    assert.strictEqual(auth.secretType, 'ceph');
  });

  it('should require a username', () => {
    assertAuthError(
      () => parseAuthDef(documentNode({ secret: { usage: 'x' } })),
      'missing username for auth'
    );
  });

  it('should reject an unknown auth type', () => {
    assertAuthError(
      () => parseAuthDef(documentNode({ username: 'u', type: 'kerberos', secret: { usage: 'x' } })),
      "unknown auth type 'kerberos'"
    );
  });

  it('should require a secret element', () => {
    assertAuthError(
      () => parseAuthDef(documentNode({ username: 'u' })),
      'missing secret element in auth'
    );
  });
});

describe('formatAuthDef', () => {
  it('should emit a typed auth element with its secret', () => {
    const buf = new IndentedBuffer();
    formatAuthDef(buf, {
      username: 'admin',
      secretType: 'iscsi',
      authType: 'chap',
      secret: { type: 'usage', usage: 'lun-secret' },
    });

    assert.strictEqual(
      buf.toString(),
      "<auth type='chap' username='admin'>\n" +
        "  <secret type='iscsi' usage='lun-secret'/>\n" +
        '</auth>\n'
    );
  });

  it('should omit the type when it is none and escape the username', () => {
    const buf = new IndentedBuffer();
    formatAuthDef(buf, {
      username: "o'neil",
      secretType: undefined,
      authType: 'none',
      secret: { type: 'uuid', uuid: SECRET_UUID },
    });

    assert.strictEqual(
      buf.toString(),
      "<auth username='o&apos;neil'>\n" +
        `  <secret uuid='${SECRET_UUID}'/>\n` +
        '</auth>\n'
    );
  });
});

describe('copyAuthDef', () => {
  it('should produce an equal but separate definition', () => {
    const auth = parseAuthDef(documentNode({ username: 'u', secret: { usage: 'x' } }));
    const copy = copyAuthDef(auth);

    assert.deepStrictEqual(copy, auth);
    assert.notStrictEqual(copy.secret, auth.secret);
  });
});
