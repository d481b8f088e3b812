/**
 * Tests for record equivalence on shared keys
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { compareRecords } from '../../../src/core/metalog/equivalence.js';
import { record } from '../../test-helpers.js';

describe('compareRecords', () => {
  it('treats empty and single sequences as equal', () => {
    assert.deepEqual(compareRecords([]), { equal: true });
    assert.deepEqual(compareRecords([record('./a', 1, { mode: '0644' })]), { equal: true });
  });

  it('accepts identical records', () => {
    const rows = [
      record('./etc/foo', 1, { mode: '0644', size: '10', type: 'file' }),
      record('./etc/foo', 2, { mode: '0644', size: '10', type: 'file' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: true });
  });

  it('reports the differing key', () => {
    const rows = [
      record('./etc/foo', 1, { mode: '0644', type: 'file' }),
      record('./etc/foo', 2, { mode: '0640', type: 'file' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: false, conflictKey: 'mode' });
  });

  it('ignores keys the other record does not declare', () => {
    const rows = [
      record('./etc/foo', 1, { mode: '0644', size: '10', tags: 'package=base' }),
      record('./etc/foo', 2, { mode: '0644' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: true });
  });

  it('ignores keys the reference does not declare', () => {
    const rows = [
      record('./etc/foo', 1, { mode: '0644' }),
      record('./etc/foo', 2, { mode: '0644', size: '99' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: true });
  });

  it('uses the other record key order to pick the first conflict', () => {
    const rows = [
      record('./etc/foo', 1, { mode: '0644', uname: 'root' }),
      record('./etc/foo', 2, { uname: 'bin', mode: '0640' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: false, conflictKey: 'uname' });
  });

  it('compares every record against the first one', () => {
    const rows = [
      record('./x', 1, { mode: '0755', size: '5' }),
      record('./x', 4, { mode: '0755' }),
      record('./x', 9, { size: '6' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: false, conflictKey: 'size' });
  });

  it('treats differing filenames as a conflict unless ignored', () => {
    const rows = [
      record('./bin/a', 1, { mode: '0755' }),
      record('./bin/b', 2, { mode: '0755' })
    ];
    assert.deepEqual(compareRecords(rows), { equal: false, conflictKey: 'filename' });
    assert.deepEqual(compareRecords(rows, { ignoreFilename: true }), { equal: true });
  });
});
