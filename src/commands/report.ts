import { Command } from 'commander';

import type { CommandResult } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { createAuditContext, type AuditFlags } from '../cli/context.js';
import { runReportPipeline, type ReportPipelineResult } from '../core/report/report-pipeline.js';
import { logger } from '../utils/logger.js';

type ReportOptions = AuditFlags;

/**
 * Write skipped-line diagnostics to stderr and the report to stdout.
 */
export function printReport(result: CommandResult<ReportPipelineResult>): void {
  for (const warning of result.warnings ?? []) {
    console.error(`warning: ${warning}`);
  }
  process.stdout.write(result.data?.output ?? '');
}

async function reportCommand(metalogPath: string, options: ReportOptions): Promise<CommandResult<ReportPipelineResult>> {
  const config = await createAuditContext(options);

  const result = await runReportPipeline({
    metalogPath,
    sections: { packages: true, duplicates: true, inodes: config.inodeReport },
    malformedLines: config.malformedLines,
    root: config.root
  });

  logger.info(`Report complete for ${metalogPath}`, {
    packages: result.data?.packages.length,
    duplicateWarnings: result.data?.duplicateWarnings.length,
    duplicateErrors: result.data?.duplicateErrors.length
  });
  printReport(result);
  return result;
}

export function setupReportCommand(program: Command): void {
  program
    .command('report', { isDefault: true })
    .argument('<metalog>', 'path to the METALOG file')
    .description('Report package sizes, setuid/setgid files and duplicate entries')
    .option('--inodes', 'also check hard links against the filesystem')
    .option('--root <dir>', 'directory that ./ paths in the metalog resolve against')
    .option('--config <file>', 'YAML config file (default: .metalog-audit.yml)')
    .option('--skip-malformed', 'skip malformed lines instead of stopping')
    .option('--verbose', 'log debug output to stderr')
    .action(withErrorHandling(async (metalogPath: string, options: ReportOptions) => {
      await reportCommand(metalogPath, options);
    }));
}
