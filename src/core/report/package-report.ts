import type { MetalogIndex, MetalogRecord, PackageSummary } from '../../types/index.js';
import { ATTRIBUTE_KEYS, ENTRY_TYPES, MODE_BITS, REPORT_TEXT } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { compareRecords } from '../metalog/equivalence.js';

const OCTAL = /^[0-7]+$/;
const DECIMAL = /^\d+$/;

function parseMode(record: MetalogRecord): number | null {
  const mode = record.attributes.get(ATTRIBUTE_KEYS.MODE);
  if (mode === undefined || !OCTAL.test(mode)) return null;
  return parseInt(mode, 8);
}

interface SizeTotals {
  fileCount: number | null;
  totalSize: bigint | null;
}

/**
 * One inconsistent duplicate makes both numbers unknown for the whole package.
 */
function sumPackage(filenames: Iterable<string>, files: MetalogIndex['files']): SizeTotals {
  let fileCount = 0;
  let totalSize: bigint | null = 0n;

  for (const filename of filenames) {
    const records = files.get(filename) ?? [];
    if (records.length > 1 && !compareRecords(records).equal) {
      return { fileCount: null, totalSize: null };
    }

    const [first] = records;
    if (first && first.attributes.get(ATTRIBUTE_KEYS.TYPE) === ENTRY_TYPES.FILE && totalSize !== null) {
      const size = first.attributes.get(ATTRIBUTE_KEYS.SIZE);
      if (size !== undefined && DECIMAL.test(size)) {
        totalSize += BigInt(size);
      } else {
        logger.debug(`No usable size for ${filename} on line ${first.lineNumber}`);
        totalSize = null;
      }
    }
    fileCount += 1;
  }

  return { fileCount, totalSize };
}

export function summarizePackage(name: string, index: Pick<MetalogIndex, 'files' | 'packages'>): PackageSummary {
  const filenames = index.packages.get(name) ?? new Set<string>();
  const { fileCount, totalSize } = sumPackage(filenames, index.files);

  let setuid = false;
  let setgid = false;
  // every record counts, duplicates included
  for (const filename of filenames) {
    for (const record of index.files.get(filename) ?? []) {
      const mode = parseMode(record);
      if (mode === null) continue;
      if (mode & MODE_BITS.SETUID) setuid = true;
      if (mode & MODE_BITS.SETGID) setgid = true;
    }
  }

  return { name, fileCount, totalSize, setuid, setgid };
}

/**
 * Summaries for every package, sorted by name.
 */
export function buildPackageReport(index: Pick<MetalogIndex, 'files' | 'packages'>): PackageSummary[] {
  return [...index.packages.keys()]
    .sort()
    .map(name => summarizePackage(name, index));
}

export function renderPackageSummary(summary: PackageSummary): string {
  const flags = `${summary.setuid ? ' setuid' : ''}${summary.setgid ? ' setgid' : ''}`;
  return [
    `Package ${summary.name}:${flags}`,
    `  number of files: ${summary.fileCount ?? REPORT_TEXT.UNKNOWN}`,
    `  total size: ${summary.totalSize ?? REPORT_TEXT.UNKNOWN}`
  ].join('\n') + '\n';
}

export function renderPackageReport(summaries: PackageSummary[]): string {
  return summaries.map(renderPackageSummary).join('');
}
