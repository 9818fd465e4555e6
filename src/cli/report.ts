/**
 * compliance-csv — Report command pipeline: load, transform, write.
 * Kept apart from commander wiring so it can be driven directly.
 */

import { resolve } from 'node:path';
import { WellArchitectedOutput, complianceName, summarizeRows, type RowSummary } from '../compliance/index.js';
import { loadFindings, loadFramework } from '../loader/index.js';
import { reportPath, resolveConfig } from '../config/index.js';
import type { Logger } from '../output/logger.js';
import type { WriteResult } from '../types/index.js';

export interface WellArchitectedRunOptions {
  /** Project root for relative paths and the project config */
  root: string;
  framework: string;
  findings: string[];
  /** Key findings use for this framework; defaults to Framework-Version */
  name?: string;
  /** Explicit output file; otherwise derived from the resolved config */
  output?: string;
  outputDir?: string;
  prefix?: string;
  assessmentDate?: string;
  logger: Logger;
}

export interface WellArchitectedRunResult {
  path: string;
  findings: number;
  summary: RowSummary;
  result: WriteResult;
}

export async function runWellArchitected(opts: WellArchitectedRunOptions): Promise<WellArchitectedRunResult> {
  const { root, logger } = opts;
  const framework = await loadFramework(resolve(root, opts.framework));
  const name = opts.name ?? complianceName(framework);
  const findings = await loadFindings(opts.findings, { cwd: root });
  logger.info(`Loaded ${findings.length} finding(s) for ${name}`);

  const config = resolveConfig(root, { outputDir: opts.outputDir, filenamePrefix: opts.prefix });
  const path = resolve(root, opts.output ?? reportPath(config, name));

  const output = new WellArchitectedOutput({ filePath: path, assessmentDate: opts.assessmentDate, logger });
  output.load(findings, framework, name);
  const result = output.batchWriteDataToFile();

  return { path, findings: findings.length, summary: summarizeRows(output.data), result };
}
