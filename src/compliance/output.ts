/**
 * compliance-csv — Compliance output session.
 *
 * Owns the rows produced for one framework and the destination they are
 * written to. Subclasses supply the row shape and the transform.
 */

import type { ComplianceFramework, Finding, WriteResult } from '../types/index.js';
import { FileDestination, type ReportDestination } from '../output/destination.js';
import { writeRows, type FlatRow } from '../output/csv.js';
import { silentLogger, type Logger } from '../output/logger.js';

export interface ComplianceOutputOptions {
  /** Open this file as the destination once rows exist */
  filePath?: string;
  /** Use an already-opened destination instead of a file */
  destination?: ReportDestination;
  /** Assessment date for rows that have no finding */
  assessmentDate?: string;
  logger?: Logger;
}

/**
 * Key that findings use to reference a framework:
 * `Framework-Version`, or just `Framework` when unversioned.
 */
export function complianceName(framework: Pick<ComplianceFramework<unknown>, 'Framework' | 'Version'>): string {
  return framework.Version ? `${framework.Framework}-${framework.Version}` : framework.Framework;
}

export abstract class ComplianceOutput<Row extends FlatRow<Row>> {
  protected readonly rows: Row[] = [];
  protected abstract readonly columns: readonly (keyof Row & string)[];
  protected readonly options: ComplianceOutputOptions;
  protected readonly logger: Logger;
  private destination: ReportDestination | null;

  constructor(options: ComplianceOutputOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.destination = options.destination ?? null;
  }

  /** Rows accumulated so far, in emission order */
  get data(): readonly Row[] {
    return this.rows;
  }

  abstract transform(findings: readonly Finding[], framework: ComplianceFramework, frameworkName: string): void;

  /**
   * Transform findings under the framework's own compliance name. Nothing
   * happens without findings; the file destination is opened only when
   * rows were produced.
   */
  load(findings: readonly Finding[], framework: ComplianceFramework, frameworkName = complianceName(framework)): this {
    if (findings.length === 0) return this;
    this.transform(findings, framework, frameworkName);
    if (!this.destination && this.options.filePath && this.rows.length > 0) {
      this.createFileDestination(this.options.filePath);
    }
    return this;
  }

  createFileDestination(filePath: string): ReportDestination {
    this.destination = new FileDestination(filePath);
    return this.destination;
  }

  batchWriteDataToFile(): WriteResult {
    return writeRows(this.rows, this.destination, { columns: this.columns, logger: this.logger });
  }
}
