/**
 * compliance-csv — Framework and findings loaders.
 */

import fg from 'fast-glob';
import { readFile } from 'node:fs/promises';
import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { ComplianceFramework, Finding } from '../types/index.js';
import { findingsFileSchema, frameworkSchema } from './schemas.js';

export class InputError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'InputError';
    this.file = file;
  }
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

async function readJson<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, 'utf-8'));
  } catch (err) {
    throw new InputError(file, err instanceof Error ? err.message : String(err));
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new InputError(file, formatIssues(parsed.error));
  return parsed.data;
}

/** Read and validate one compliance framework definition. */
export async function loadFramework(file: string): Promise<ComplianceFramework> {
  return readJson(file, frameworkSchema);
}

export interface LoadFindingsOptions {
  /** Directory the patterns are relative to */
  cwd?: string;
}

/**
 * Load findings from every JSON file matching the patterns. Files are read
 * in sorted path order; each holds an array of findings or a single one.
 */
export async function loadFindings(patterns: string | string[], options: LoadFindingsOptions = {}): Promise<Finding[]> {
  const files = await fg(patterns, {
    cwd: options.cwd ?? process.cwd(),
    absolute: true,
    onlyFiles: true,
  });
  files.sort();

  const findings: Finding[] = [];
  for (const file of files) {
    for (const finding of await readJson(file, findingsFileSchema)) findings.push(finding);
  }
  return findings;
}
