/**
 * Tests for the filename and package indices
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { buildMetalogIndex, extractPackageNames } from '../../../src/core/metalog/metalog-index.js';
import { MalformedLineError } from '../../../src/utils/errors.js';
import { metalog } from '../../test-helpers.js';

describe('extractPackageNames', () => {
  it('reads the comma list after package=', () => {
    assert.deepEqual(extractPackageNames('package=core'), ['core']);
    assert.deepEqual(extractPackageNames('package=clibs,debug'), ['clibs', 'debug']);
    assert.deepEqual(extractPackageNames('debug,package=a,b'), ['a', 'b']);
  });

  it('takes a single match only', () => {
    assert.deepEqual(extractPackageNames('package=a,package=b'), ['a', 'package=b']);
  });

  it('returns nothing without a package list', () => {
    assert.deepEqual(extractPackageNames('debug'), []);
    assert.deepEqual(extractPackageNames('package='), []);
    assert.deepEqual(extractPackageNames('package=a,,b'), ['a', 'b']);
  });
});

describe('buildMetalogIndex', () => {
  it('counts physical line numbers across comments and blanks', () => {
    const index = buildMetalogIndex(metalog(
      '#mtree 2.0',
      '',
      './bin type=dir mode=0755',
      '  # note',
      './bin/sh type=file mode=0555 size=10'
    ));

    assert.deepEqual([...index.files.keys()], ['./bin', './bin/sh']);
    assert.equal(index.files.get('./bin')?.[0].lineNumber, 3);
    assert.equal(index.files.get('./bin/sh')?.[0].lineNumber, 5);
  });

  it('keeps duplicate records in scan order', () => {
    const index = buildMetalogIndex(metalog(
      './etc/foo mode=0644',
      './etc/bar mode=0644',
      './etc/foo mode=0640'
    ));

    assert.deepEqual(index.files.get('./etc/foo')?.map(r => r.lineNumber), [1, 3]);
    assert.equal(index.files.get('./etc/bar')?.length, 1);
  });

  it('indexes package membership from tags', () => {
    const index = buildMetalogIndex(metalog(
      './bin/x type=file tags=package=core',
      './bin/y type=file tags=package=core,debug',
      './bin/y type=file tags=package=core',
      './etc/z type=file'
    ));

    assert.deepEqual([...index.packages.keys()], ['core', 'debug']);
    assert.deepEqual([...(index.packages.get('core') ?? [])], ['./bin/x', './bin/y']);
    assert.deepEqual([...(index.packages.get('debug') ?? [])], ['./bin/y']);
  });

  it('handles CRLF line endings', () => {
    const index = buildMetalogIndex('./a mode=0644\r\n./b mode=0600\r\n');
    assert.equal(index.files.get('./a')?.[0].attributes.get('mode'), '0644');
    assert.equal(index.files.get('./b')?.[0].lineNumber, 2);
  });

  it('aborts on a malformed line by default', () => {
    assert.throws(
      () => buildMetalogIndex(metalog('./a mode=0644', '# c', './broken')),
      (error: unknown) => error instanceof MalformedLineError && error.lineNumber === 3
    );
  });

  it('records and skips malformed lines under the skip policy', () => {
    const index = buildMetalogIndex(metalog('./a mode=0644', './broken', './c mode=0600'), { malformedLines: 'skip' });

    assert.deepEqual(index.malformed, [{ lineNumber: 2, line: './broken' }]);
    assert.deepEqual([...index.files.keys()], ['./a', './c']);
    assert.equal(index.files.get('./c')?.[0].lineNumber, 3);
  });
});
