/**
 * Integration tests for the `inspect` flow
 *
 * Resolve a fixture chain, share it, pick an element by backing store name
 * and render it.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { join } from 'node:path';

import { describeChain } from '../../src/cli/output.js';
import { loadDiskDescription } from '../../src/config/index.js';
import { IndentedBuffer } from '../../src/document/buffer.js';
import { parseChainIndex } from '../../src/storage/backing-string.js';
import { formatStorageSource } from '../../src/storage/format.js';
import { hasBacking, isSameLocation } from '../../src/storage/predicates.js';
import { copyStorageSource, getChainElement, shareStorageSource } from '../../src/storage/source.js';

const VALID_CONFIGS = join(import.meta.dirname, '../fixtures/valid-configs');

describe('inspect flow', () => {
  it('should describe every element of a chain', async () => {
    const disk = await loadDiskDescription(join(VALID_CONFIGS, 'chain.yaml'));

    assert.deepStrictEqual(describeChain(disk.source), [
      {
        index: 0,
        type: 'file',
        format: 'qcow2',
        location: '/var/lib/images/top.qcow2',
        empty: false,
        local: true,
        relative: false,
      },
      {
        index: 1,
        type: 'file',
        format: 'qcow2',
        location: '/var/lib/images/mid.qcow2',
        empty: false,
        local: true,
        relative: false,
      },
      {
        index: 2,
        type: 'file',
        format: 'raw',
        location: 'base.img',
        empty: false,
        local: true,
        relative: true,
      },
    ]);
  });

  it('should select an element by backing store name', async () => {
    const disk = await loadDiskDescription(join(VALID_CONFIGS, 'chain.yaml'));
    const shared = shareStorageSource(disk.source);

    const element = getChainElement(shared, parseChainIndex(disk.target, 'vda[1]'));

    assert.strictEqual(element?.path, '/var/lib/images/mid.qcow2');
    assert.strictEqual(element?.readonly, true);
    assert.strictEqual(hasBacking(element), true);
  });

  it('should render the chain from a selected element', async () => {
    const disk = await loadDiskDescription(join(VALID_CONFIGS, 'chain.yaml'));
    const element = getChainElement(disk.source, 1);
    assert.ok(element);

    const buf = new IndentedBuffer();
    formatStorageSource(buf, element);

    assert.strictEqual(
      buf.toString(),
      [
        "<format type='qcow2'/>",
        "<source file='/var/lib/images/mid.qcow2'/>",
        '<relPath>mid.qcow2</relPath>',
        "<backingStore type='file' index='2'>",
        "  <format type='raw'/>",
        "  <source file='base.img'/>",
        '  <backingStore/>',
        '</backingStore>',
        '',
      ].join('\n')
    );
  });

  it('should keep a shared chain intact when a private copy changes', async () => {
    const disk = await loadDiskDescription(join(VALID_CONFIGS, 'chain.yaml'));
    const shared = shareStorageSource(disk.source);

    const copy = copyStorageSource(shared, true);
    const mid = copy.backingStore;
    assert.ok(mid);
    mid.path = '/var/lib/images/replaced.qcow2';

    assert.strictEqual(isSameLocation(shared, copy), true);
    assert.strictEqual(shared.backingStore?.path, '/var/lib/images/mid.qcow2');
  });
});
