import type { MalformedLinePolicy, MetalogIndex, MetalogRecord } from '../../types/index.js';
import { ATTRIBUTE_KEYS, PACKAGE_TAG_PREFIX } from '../../constants/index.js';
import { MalformedLineError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { isSkippableLine, parseRecordLine } from './record-parser.js';

export interface BuildIndexOptions {
  malformedLines?: MalformedLinePolicy;
}

/**
 * Package names declared in a `tags` value.
 *
 * Everything after the first `package=` is split on commas, so tags that follow
 * the package list are read as package names too (`package=a,debug` yields
 * `a` and `debug`). Only one `package=` match is taken per value.
 */
export function extractPackageNames(tags: string): string[] {
  const start = tags.indexOf(PACKAGE_TAG_PREFIX);
  if (start < 0) {
    return [];
  }
  return tags
    .slice(start + PACKAGE_TAG_PREFIX.length)
    .split(',')
    .filter(name => name.length > 0);
}

function addRecord(index: MetalogIndex, record: MetalogRecord): void {
  const bucket = index.files.get(record.filename);
  if (bucket) {
    bucket.push(record);
  } else {
    index.files.set(record.filename, [record]);
  }

  const tags = record.attributes.get(ATTRIBUTE_KEYS.TAGS);
  if (tags === undefined) return;

  for (const pkgName of extractPackageNames(tags)) {
    const members = index.packages.get(pkgName);
    if (members) {
      members.add(record.filename);
    } else {
      index.packages.set(pkgName, new Set([record.filename]));
    }
  }
}

/**
 * Index manifest text by filename and by package in one pass.
 * Line numbers are physical: skipped lines still count.
 */
export function buildMetalogIndex(text: string, options: BuildIndexOptions = {}): MetalogIndex {
  const policy = options.malformedLines ?? 'abort';
  const index: MetalogIndex = { files: new Map(), packages: new Map(), malformed: [] };

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;
    if (isSkippableLine(line)) continue;

    let record: MetalogRecord;
    try {
      record = parseRecordLine(line, lineNumber);
    } catch (error) {
      if (policy === 'skip' && error instanceof MalformedLineError) {
        logger.debug(`Skipping malformed line ${lineNumber}`);
        index.malformed.push({ lineNumber, line });
        continue;
      }
      throw error;
    }
    addRecord(index, record);
  }

  logger.debug('Indexed metalog', {
    files: index.files.size,
    packages: index.packages.size,
    malformed: index.malformed.length
  });
  return index;
}
