import type { InodeFinding, InodeLookup, MetalogIndex, MetalogRecord } from '../../types/index.js';
import { ATTRIBUTE_KEYS, INODE_EXEMPT_TYPES, REPORT_TEXT } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { compareRecords } from '../metalog/equivalence.js';
import { buildInodeIndex } from '../metalog/inode-index.js';

function isComparable(record: MetalogRecord): boolean {
  const type = record.attributes.get(ATTRIBUTE_KEYS.TYPE);
  return type === undefined || !INODE_EXEMPT_TYPES.includes(type);
}

/**
 * Hard-link groups whose members disagree.
 *
 * Only the first record of each filename is used, and links and directories are
 * not compared: sharing an inode is not a contradiction for them.
 */
export async function buildInodeReport(
  index: Pick<MetalogIndex, 'files'>,
  lookup: InodeLookup
): Promise<InodeFinding[]> {
  const inodes = await buildInodeIndex(index, lookup);
  const findings: InodeFinding[] = [];

  for (const [identity, filenames] of inodes) {
    if (filenames.length < 2) continue;

    const records = filenames
      .map(filename => index.files.get(filename)?.[0])
      .filter((record): record is MetalogRecord => record !== undefined && isComparable(record));

    const result = compareRecords(records, { ignoreFilename: true });
    if (!result.equal) {
      logger.debug(`${identity} has conflicting entries`, { filenames, conflictKey: result.conflictKey });
      findings.push({
        filenames,
        lineNumbers: records.map(r => r.lineNumber),
        conflictKey: result.conflictKey
      });
    }
  }

  return findings;
}

export function renderInodeReport(findings: InodeFinding[]): string {
  return findings
    .map(f => `error: ${REPORT_TEXT.INODE_ERROR}: ${f.filenames.join(',')} in line ${f.lineNumbers.join(',')}. off by "${f.conflictKey}"\n`)
    .join('');
}
