import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { createAuditContext, type AuditFlags } from '../cli/context.js';
import { runReportPipeline } from '../core/report/report-pipeline.js';
import { printReport } from './report.js';

type InodesOptions = Omit<AuditFlags, 'inodes'>;

async function inodesCommand(metalogPath: string, options: InodesOptions): Promise<void> {
  const config = await createAuditContext(options);

  const result = await runReportPipeline({
    metalogPath,
    sections: { packages: false, duplicates: false, inodes: true },
    malformedLines: config.malformedLines,
    root: config.root
  });

  printReport(result);
}

export function setupInodesCommand(program: Command): void {
  program
    .command('inodes')
    .argument('<metalog>', 'path to the METALOG file')
    .description('Report hard links whose metalog entries disagree')
    .option('--root <dir>', 'directory that ./ paths in the metalog resolve against')
    .option('--config <file>', 'YAML config file (default: .metalog-audit.yml)')
    .option('--skip-malformed', 'skip malformed lines instead of stopping')
    .option('--verbose', 'log debug output to stderr')
    .action(withErrorHandling(async (metalogPath: string, options: InodesOptions) => {
      await inodesCommand(metalogPath, options);
    }));
}
