import type { DuplicateFinding, MetalogIndex } from '../../types/index.js';
import { REPORT_TEXT } from '../../constants/index.js';
import { compareRecords } from '../metalog/equivalence.js';

export interface DuplicateReport {
  /** repeated entries that agree on their shared fields */
  warnings: DuplicateFinding[];
  /** repeated entries that disagree */
  errors: DuplicateFinding[];
}

export function buildDuplicateReport(index: Pick<MetalogIndex, 'files'>): DuplicateReport {
  const report: DuplicateReport = { warnings: [], errors: [] };

  for (const filename of [...index.files.keys()].sort()) {
    const records = index.files.get(filename) ?? [];
    if (records.length < 2) continue;

    const lineNumbers = records.map(r => r.lineNumber);
    const result = compareRecords(records);
    if (result.equal) {
      report.warnings.push({ filename, lineNumbers });
    } else {
      report.errors.push({ filename, lineNumbers, conflictKey: result.conflictKey });
    }
  }

  return report;
}

export function renderDuplicateWarnings(findings: DuplicateFinding[]): string {
  return findings
    .map(f => `warning: ${f.filename} ${REPORT_TEXT.DUPLICATE_WARNING}: line ${f.lineNumbers.join(',')}\n`)
    .join('');
}

export function renderDuplicateErrors(findings: DuplicateFinding[]): string {
  return findings
    .map(f => `error: ${f.filename} ${REPORT_TEXT.DUPLICATE_ERROR}: line ${f.lineNumbers.join(',')}. off by "${f.conflictKey ?? ''}"\n`)
    .join('');
}
