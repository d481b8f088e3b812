/**
 * Tests for inode grouping
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { link, mkdir, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { buildInodeIndex, createFsInodeLookup, resolveManifestPath } from '../../../src/core/metalog/inode-index.js';
import { buildMetalogIndex } from '../../../src/core/metalog/metalog-index.js';
import type { InodeLookup } from '../../../src/types/index.js';
import { createTempDir, metalog, removeTempDir } from '../../test-helpers.js';

function fakeLookup(inodes: Record<string, string>): InodeLookup {
  return async (filename) => inodes[filename] ?? null;
}

describe('resolveManifestPath', () => {
  it('resolves ./ paths against the root', () => {
    assert.equal(resolveManifestPath('./usr/bin/x', '/srv/root'), '/srv/root/usr/bin/x');
    assert.equal(resolveManifestPath('./etc/passwd'), '/etc/passwd');
  });

  it('treats other names as relative to the root', () => {
    assert.equal(resolveManifestPath('etc/foo', '/tmp/r'), '/tmp/r/etc/foo');
  });
});

describe('buildInodeIndex', () => {
  it('groups filenames by inode in index order and drops failed lookups', async () => {
    const index = buildMetalogIndex(metalog(
      './bin/a type=file',
      './bin/b type=file',
      './bin/gone type=file',
      './bin/c type=file'
    ));
    const inodes = await buildInodeIndex(index, fakeLookup({
      './bin/a': '1:10',
      './bin/b': '1:20',
      './bin/c': '1:10'
    }));

    assert.deepEqual([...inodes], [
      ['1:10', ['./bin/a', './bin/c']],
      ['1:20', ['./bin/b']]
    ]);
  });

  it('keeps equal inode numbers on different devices apart', async () => {
    const index = buildMetalogIndex(metalog(
      './bin/a type=file',
      './home/b type=file'
    ));
    const inodes = await buildInodeIndex(index, fakeLookup({
      './bin/a': '1:10',
      './home/b': '2:10'
    }));

    assert.deepEqual([...inodes], [
      ['1:10', ['./bin/a']],
      ['2:10', ['./home/b']]
    ]);
  });
});

describe('createFsInodeLookup', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
    await mkdir(join(root, 'bin'));
    await writeFile(join(root, 'bin', 'a'), 'x');
    await link(join(root, 'bin', 'a'), join(root, 'bin', 'b'));
    await writeFile(join(root, 'bin', 'c'), 'y');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('resolves hard links to the same inode', async () => {
    const lookup = createFsInodeLookup(root);
    const a = await lookup('./bin/a');
    const b = await lookup('./bin/b');
    const c = await lookup('./bin/c');

    assert.notEqual(a, null);
    assert.equal(a, b);
    assert.notEqual(a, c);
  });

  it('prefixes the inode with the device number', async () => {
    const lookup = createFsInodeLookup(root);
    const stats = await stat(join(root, 'bin', 'a'), { bigint: true });
    assert.equal(await lookup('./bin/a'), `${stats.dev}:${stats.ino}`);
  });

  it('returns null for missing files', async () => {
    const lookup = createFsInodeLookup(root);
    assert.equal(await lookup('./bin/missing'), null);
  });
});
