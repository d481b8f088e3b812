import type {
  CommandResult,
  DuplicateFinding,
  InodeFinding,
  InodeLookup,
  MalformedLine,
  MalformedLinePolicy,
  PackageSummary
} from '../../types/index.js';
import { REPORT_TEXT } from '../../constants/index.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { buildMetalogIndex } from '../metalog/metalog-index.js';
import { createFsInodeLookup } from '../metalog/inode-index.js';
import { buildPackageReport, renderPackageReport } from './package-report.js';
import { buildDuplicateReport, renderDuplicateErrors, renderDuplicateWarnings } from './duplicate-report.js';
import { buildInodeReport, renderInodeReport } from './inode-report.js';

export interface ReportSections {
  packages: boolean;
  duplicates: boolean;
  inodes: boolean;
}

export interface ReportPipelineOptions {
  metalogPath: string;
  sections: ReportSections;
  malformedLines: MalformedLinePolicy;
  /** root for the default filesystem lookup */
  root: string;
  /** replaces the filesystem lookup */
  inodeLookup?: InodeLookup;
}

export interface ReportPipelineResult {
  packages: PackageSummary[];
  duplicateWarnings: DuplicateFinding[];
  duplicateErrors: DuplicateFinding[];
  inodeErrors: InodeFinding[];
  malformed: MalformedLine[];
  output: string;
}

/**
 * Read a METALOG file and render the enabled report sections in fixed order:
 * packages, duplicate warnings, duplicate errors, inode errors.
 */
export async function runReportPipeline(options: ReportPipelineOptions): Promise<CommandResult<ReportPipelineResult>> {
  logger.info(`Auditing metalog: ${options.metalogPath}`);

  const text = await readTextFile(options.metalogPath);
  const index = buildMetalogIndex(text, { malformedLines: options.malformedLines });

  const result: ReportPipelineResult = {
    packages: [],
    duplicateWarnings: [],
    duplicateErrors: [],
    inodeErrors: [],
    malformed: index.malformed,
    output: ''
  };
  const parts: string[] = [];

  if (options.sections.packages) {
    result.packages = buildPackageReport(index);
    parts.push(`${REPORT_TEXT.PACKAGE_HEADER}\n`, renderPackageReport(result.packages));
  }

  if (options.sections.duplicates) {
    const duplicates = buildDuplicateReport(index);
    result.duplicateWarnings = duplicates.warnings;
    result.duplicateErrors = duplicates.errors;
    parts.push(renderDuplicateWarnings(duplicates.warnings), renderDuplicateErrors(duplicates.errors));
  }

  if (options.sections.inodes) {
    const lookup = options.inodeLookup ?? createFsInodeLookup(options.root);
    result.inodeErrors = await buildInodeReport(index, lookup);
    parts.push(renderInodeReport(result.inodeErrors));
  }

  result.output = parts.join('');

  return {
    success: true,
    data: result,
    warnings: index.malformed.map(m => `line ${m.lineNumber} is malformed, skipped`)
  };
}
