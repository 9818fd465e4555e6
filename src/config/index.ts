/**
 * compliance-csv — Output configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Explicit flags (--output-dir, --prefix)
 *   2. COMPLIANCE_CSV_OUTPUT_DIR / COMPLIANCE_CSV_PREFIX env vars
 *   3. Project config: <root>/.compliance-csv/config.json
 *   4. Defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

export interface OutputConfig {
  outputDir: string;
  filenamePrefix: string;
}

export const DEFAULT_CONFIG: OutputConfig = {
  outputDir: 'output',
  filenamePrefix: 'compliance-report',
};

const savedConfigSchema = z.object({
  outputDir: z.string().min(1).optional(),
  filenamePrefix: z.string().min(1).optional(),
});

type SavedConfig = z.infer<typeof savedConfigSchema>;

const CONFIG_DIR = '.compliance-csv';
const CONFIG_FILE = 'config.json';

export function projectConfigPath(root: string): string {
  return join(root, CONFIG_DIR, CONFIG_FILE);
}

/** Read the project config; missing or malformed files count as empty. */
export function loadProjectConfig(root: string): SavedConfig {
  const path = projectConfigPath(root);
  if (!existsSync(path)) return {};
  try {
    const parsed = savedConfigSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export function resolveConfig(
  root: string,
  flags: Partial<OutputConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): OutputConfig {
  const saved = loadProjectConfig(root);
  return {
    outputDir: flags.outputDir || env.COMPLIANCE_CSV_OUTPUT_DIR || saved.outputDir || DEFAULT_CONFIG.outputDir,
    filenamePrefix: flags.filenamePrefix || env.COMPLIANCE_CSV_PREFIX || saved.filenamePrefix || DEFAULT_CONFIG.filenamePrefix,
  };
}

/** `<outputDir>/compliance/<prefix>_<name>.csv`, with the name lower-cased. */
export function reportPath(config: OutputConfig, name: string): string {
  return join(config.outputDir, 'compliance', `${config.filenamePrefix}_${name.toLowerCase()}.csv`);
}
