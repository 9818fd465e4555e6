#!/usr/bin/env node

/**
 * compliance-csv CLI
 *
 * Usage:
 *   compliance-csv well-architected --framework <file> --findings <glob...>
 *       Write the AWS Well-Architected compliance table as a ;-delimited CSV
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { runWellArchitected } from './report.js';
import { createConsoleLogger, formatFailure } from '../output/logger.js';
import type { RowSummary } from '../compliance/index.js';

const program = new Command();

program
  .name('compliance-csv')
  .description('Flatten security findings into compliance framework CSV reports')
  .version('0.1.0');

// ─── well-architected ────────────────────────────────────────────────

program
  .command('well-architected')
  .description('Write the AWS Well-Architected compliance table for a set of findings')
  .requiredOption('-f, --framework <file>', 'Framework definition JSON')
  .requiredOption('--findings <patterns...>', 'Findings JSON files or glob patterns')
  .option('-d, --dir <dir>', 'Project root for relative paths and config', '.')
  .option('-n, --name <name>', 'Framework key used in findings (default: Framework-Version)')
  .option('-o, --output <file>', 'Write the CSV here instead of the configured output directory')
  .option('--output-dir <dir>', 'Output directory (overrides env and config)')
  .option('--prefix <prefix>', 'Report filename prefix (overrides env and config)')
  .option('--assessment-date <date>', 'Assessment date for manual requirement rows')
  .option('-q, --quiet', 'Only print warnings and errors')
  .action(async (opts: {
    framework: string; findings: string[]; dir: string; name?: string; output?: string;
    outputDir?: string; prefix?: string; assessmentDate?: string; quiet?: boolean;
  }) => {
    const logger = createConsoleLogger({ quiet: opts.quiet });

    let run: Awaited<ReturnType<typeof runWellArchitected>>;
    try {
      run = await runWellArchitected({
        root: resolve(opts.dir),
        framework: opts.framework,
        findings: opts.findings,
        name: opts.name,
        output: opts.output,
        outputDir: opts.outputDir,
        prefix: opts.prefix,
        assessmentDate: opts.assessmentDate,
        logger,
      });
    } catch (err) {
      console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
      process.exit(1);
    }

    const { result } = run;
    if (result.status === 'failed') {
      console.error(chalk.red(`✗ Could not write ${run.path}: ${formatFailure(result.error)}`));
      process.exit(1);
    }
    if (result.status === 'skipped') {
      logger.warn(`Nothing written (${result.reason}); ${run.findings} finding(s) loaded`);
      return;
    }

    if (!opts.quiet) printSummary(run.summary);
    console.error(chalk.green(`✓ Wrote ${result.rows} row(s) to ${run.path}`));
  });

function printSummary(summary: RowSummary) {
  const { counts } = summary;
  console.log(`Rows:     ${summary.total} (${summary.muted} muted)`);
  console.log(`${'─'.repeat(40)}`);
  console.log(`PASS:     ${chalk.green(counts.pass)}`);
  console.log(`FAIL:     ${chalk.red(counts.fail)}`);
  console.log(`MANUAL:   ${chalk.yellow(counts.manual)}`);
  if (counts.other > 0) console.log(`Other:    ${counts.other}`);
  console.log(`${'─'.repeat(40)}`);
  for (const s of summary.sections) {
    console.log(`${s.section || '(none)'}: ${s.pass} pass, ${s.fail} fail, ${s.manual} manual`);
  }
}

await program.parseAsync();
