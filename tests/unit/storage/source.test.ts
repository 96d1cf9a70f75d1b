/**
 * Unit tests for the storage source lifecycle
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { SystemError } from '../../../src/core/errors.js';
import {
  chainHasManagedPR,
  chainHasNVMe,
  clearBackingStore,
  clearStorageSource,
  copyStorageSource,
  createStorageSource,
  getChainElement,
  getSecurityLabel,
  initChainElement,
  iterateChain,
  shareStorageSource,
} from '../../../src/storage/source.js';
import type { StorageSource } from '../../../src/storage/types.js';

function fileNode(path: string, id: number = 0): StorageSource {
  const src = createStorageSource();
  src.type = 'file';
  src.format = 'qcow2';
  src.path = path;
  src.id = id;
  return src;
}

/**
 * top.qcow2 -> mid.qcow2 -> base.img
 */
function threeImageChain(): StorageSource {
  const top = fileNode('/images/top.qcow2', 0);
  const mid = fileNode('/images/mid.qcow2', 1);
  const base = fileNode('/images/base.img', 2);
  base.format = 'raw';
  mid.relPath = 'mid.qcow2';
  mid.backingStore = base;
  top.backingStore = mid;
  top.backingStoreRaw = 'mid.qcow2';
  return top;
}

describe('createStorageSource', () => {
  it('should create an empty node', () => {
    const src = createStorageSource();

    assert.strictEqual(src.type, 'none');
    assert.strictEqual(src.protocol, 'none');
    assert.strictEqual(src.format, 'none');
    assert.strictEqual(src.path, undefined);
    assert.strictEqual(src.backingStore, undefined);
    assert.deepStrictEqual(src.hosts, []);
    assert.deepStrictEqual(src.cookies, []);
    assert.strictEqual(src.haveTLS, 'absent');
    assert.strictEqual(src.sslVerify, 'absent');
  });

  it('should return a fresh object each time', () => {
    const a = createStorageSource();
    const b = createStorageSource();
    a.hosts.push({ transport: 'tcp', name: 'a.test', port: 1 });

    assert.strictEqual(b.hosts.length, 0);
  });
});

describe('copyStorageSource', () => {
  it('should copy the whole chain with backingChain', () => {
    const top = threeImageChain();
    const copy = copyStorageSource(top, true);

    assert.deepStrictEqual(copy, top);
    assert.notStrictEqual(copy.backingStore, top.backingStore);
    assert.strictEqual(copy.backingStore?.backingStore?.path, '/images/base.img');
  });

  it('should leave the backing store out without backingChain', () => {
    const top = threeImageChain();
    const copy = copyStorageSource(top, false);

    assert.strictEqual(copy.backingStore, undefined);
    assert.strictEqual(copy.path, '/images/top.qcow2');
    assert.strictEqual(copy.backingStoreRaw, 'mid.qcow2');
  });

  it('should share no sub-objects with the original', () => {
    const src = fileNode('/images/top.qcow2');
    src.type = 'network';
    src.protocol = 'https';
    src.hosts = [{ transport: 'tcp', name: 'one.test', port: 443 }];
    src.cookies = [{ name: 'session', value: 'abc' }];
    src.auth = {
      username: 'admin',
      secretType: 'iscsi',
      authType: 'chap',
      secret: { type: 'usage', usage: 'lun' },
    };
    src.seclabels = [{ model: 'dac', label: '+0:+0', labelskip: false, norelabel: false }];
    src.features = new Set(['lazy_refcounts']);

    const copy = copyStorageSource(src, true);
    const host = copy.hosts[0];
    const label = copy.seclabels[0];
    assert.ok(host && label);
    host.name = 'changed.test';
    label.label = 'changed';
    copy.cookies.push({ name: 'extra', value: 'x' });
    copy.features?.clear();

    assert.strictEqual(src.hosts[0]?.name, 'one.test');
    assert.strictEqual(src.cookies.length, 1);
    assert.strictEqual(src.seclabels[0]?.label, '+0:+0');
    assert.strictEqual(src.features.size, 1);
    assert.notStrictEqual(copy.auth, src.auth);
    assert.notStrictEqual(copy.auth?.secret, src.auth.secret);
    assert.deepStrictEqual(copy.auth, src.auth);
  });

  it('should copy NVMe and reservation settings', () => {
    const src = createStorageSource();
    src.type = 'nvme';
    src.nvme = {
      namespace: 1,
      managed: 'yes',
      pciAddress: { domain: 0, bus: 1, slot: 0, function: 0 },
    };
    src.pr = { managed: 'no', path: '/run/pr.sock' };

    const copy = copyStorageSource(src, false);

    assert.deepStrictEqual(copy.nvme, src.nvme);
    assert.notStrictEqual(copy.nvme?.pciAddress, src.nvme.pciAddress);
    assert.deepStrictEqual(copy.pr, { managed: 'no', path: '/run/pr.sock', managerAlias: undefined });
  });

  it('should leave the original intact when a copy is cleared', () => {
    const top = threeImageChain();
    const first = copyStorageSource(top, true);
    const expected = copyStorageSource(top, true);

    clearStorageSource(first);

    assert.deepStrictEqual(first, createStorageSource());
    assert.strictEqual(top.backingStore?.path, '/images/mid.qcow2');
    assert.strictEqual(top.backingStore?.backingStore?.path, '/images/base.img');
    assert.deepStrictEqual(copyStorageSource(top, true), expected);
  });

  it('should reject a chain that loops back on itself', () => {
    const top = threeImageChain();
    const base = top.backingStore?.backingStore;
    assert.ok(base);
    base.backingStore = top;

    assert.throws(
      () => copyStorageSource(top, true),
      (error: unknown) => error instanceof SystemError && error.code === 'CHAIN_LOOP'
    );
  });

  it('should copy a looped node alone without backingChain', () => {
    const top = fileNode('/images/self.qcow2');
    top.backingStore = top;

    const copy = copyStorageSource(top, false);
    assert.strictEqual(copy.backingStore, undefined);
  });
});

describe('shareStorageSource', () => {
  it('should freeze the node and its chain', () => {
    const top = threeImageChain();
    top.hosts = [{ transport: 'tcp', name: 'a.test', port: 80 }];

    const shared = shareStorageSource(top);

    assert.ok(Object.isFrozen(shared));
    assert.ok(Object.isFrozen(shared.hosts));
    assert.ok(Object.isFrozen(shared.hosts[0]));
    assert.ok(Object.isFrozen(shared.backingStore));
    assert.ok(Object.isFrozen(shared.backingStore?.backingStore));
  });

  it('should not show later changes to the original', () => {
    const top = threeImageChain();
    const shared = shareStorageSource(top);

    top.path = '/images/moved.qcow2';

    assert.strictEqual(shared.path, '/images/top.qcow2');
  });

  it('should be copyable into a mutable node', () => {
    const shared = shareStorageSource(threeImageChain());
    const copy = copyStorageSource(shared, true);

    copy.path = '/images/private.qcow2';

    assert.ok(!Object.isFrozen(copy));
    assert.strictEqual(shared.path, '/images/top.qcow2');
  });
});

describe('clearBackingStore', () => {
  it('should drop the chain, relative path and raw backing string', () => {
    const top = threeImageChain();
    top.relPath = 'top.qcow2';
    const mid = top.backingStore;

    clearBackingStore(top);

    assert.strictEqual(top.backingStore, undefined);
    assert.strictEqual(top.relPath, undefined);
    assert.strictEqual(top.backingStoreRaw, undefined);
    assert.strictEqual(top.path, '/images/top.qcow2');
    assert.strictEqual(mid?.type, 'none');
    assert.strictEqual(mid?.path, undefined);
  });

  it('should accept undefined', () => {
    assert.doesNotThrow(() => clearBackingStore(undefined));
  });

  it('should terminate on a looped chain', () => {
    const top = threeImageChain();
    const base = top.backingStore?.backingStore;
    assert.ok(base);
    base.backingStore = top;

    clearBackingStore(top);

    assert.strictEqual(top.backingStore, undefined);
  });
});

describe('clearStorageSource', () => {
  it('should reset the node to the empty state', () => {
    const top = threeImageChain();
    top.cookies = [{ name: 'a', value: 'b' }];
    top.readonly = true;

    clearStorageSource(top);

    assert.deepStrictEqual(top, createStorageSource());
  });

  it('should be a no-op on an already cleared node', () => {
    const src = fileNode('/images/x.img');

    clearStorageSource(src);
    clearStorageSource(src);

    assert.deepStrictEqual(src, createStorageSource());
  });
});

describe('initChainElement', () => {
  it('should transfer labels and follow the old flags', () => {
    const old = fileNode('/images/top.qcow2');
    old.seclabels = [{ model: 'selinux', label: 'system_u:object_r:svirt_image_t:s0', labelskip: false, norelabel: false }];
    old.shared = true;
    old.readonly = true;
    const newElem = fileNode('/images/base.img');

    initChainElement(newElem, old, true);

    assert.deepStrictEqual(newElem.seclabels, old.seclabels);
    assert.notStrictEqual(newElem.seclabels[0], old.seclabels[0]);
    assert.strictEqual(newElem.shared, true);
    assert.strictEqual(newElem.readonly, true);
  });

  it('should keep labels the new element already has', () => {
    const old = fileNode('/images/top.qcow2');
    old.seclabels = [{ model: 'dac', label: '+1:+1', labelskip: false, norelabel: false }];
    const newElem = fileNode('/images/base.img');
    newElem.seclabels = [{ model: 'dac', label: '+2:+2', labelskip: false, norelabel: false }];

    initChainElement(newElem, old, true);

    assert.strictEqual(newElem.seclabels[0]?.label, '+2:+2');
  });

  it('should not transfer labels without transferLabels', () => {
    const old = fileNode('/images/top.qcow2');
    old.seclabels = [{ model: 'dac', label: '+1:+1', labelskip: false, norelabel: false }];
    old.readonly = true;
    const newElem = fileNode('/images/base.img');

    initChainElement(newElem, old, false);

    assert.deepStrictEqual(newElem.seclabels, []);
    assert.strictEqual(newElem.readonly, true);
  });
});

describe('chain helpers', () => {
  it('should iterate the chain top first', () => {
    const paths = [...iterateChain(threeImageChain())].map((node) => node.path);

    assert.deepStrictEqual(paths, ['/images/top.qcow2', '/images/mid.qcow2', '/images/base.img']);
  });

  it('should stop iterating at a none node', () => {
    const top = fileNode('/images/top.qcow2');
    top.backingStore = createStorageSource();

    assert.strictEqual([...iterateChain(top)].length, 1);
  });

  it('should return the element at an index', () => {
    const top = threeImageChain();

    assert.strictEqual(getChainElement(top, 0)?.path, '/images/top.qcow2');
    assert.strictEqual(getChainElement(top, 2)?.path, '/images/base.img');
    assert.strictEqual(getChainElement(top, 3), undefined);
  });

  it('should find a security label by model', () => {
    const src = fileNode('/images/top.qcow2');
    src.seclabels = [
      { model: 'dac', label: '+0:+0', labelskip: false, norelabel: false },
      { model: 'selinux', labelskip: false, norelabel: true },
    ];

    assert.strictEqual(getSecurityLabel(src, 'selinux')?.norelabel, true);
    assert.strictEqual(getSecurityLabel(src, 'apparmor'), undefined);
  });

  it('should detect a managed reservation anywhere in the chain', () => {
    const top = threeImageChain();
    assert.strictEqual(chainHasManagedPR(top), false);

    const base = top.backingStore?.backingStore;
    assert.ok(base);
    base.pr = { managed: 'yes' };

    assert.strictEqual(chainHasManagedPR(top), true);
  });

  it('should detect an NVMe element in the chain', () => {
    const top = threeImageChain();
    assert.strictEqual(chainHasNVMe(top), false);

    const mid = top.backingStore;
    assert.ok(mid);
    mid.type = 'nvme';

    assert.strictEqual(chainHasNVMe(top), true);
  });
});
