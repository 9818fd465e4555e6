/**
 * compliance-csv — AWS Well-Architected compliance table.
 *
 * Denormalizes findings into one row per (finding × requirement ×
 * attribute), then appends MANUAL rows for requirements no automated
 * check can satisfy.
 */

import type {
  ComplianceFramework, Finding, Requirement,
  WellArchitectedAttribute, WellArchitectedRow,
} from '../types/index.js';
import { ComplianceOutput } from './output.js';

// ─── Columns ─────────────────────────────────────────────────────────

export const WELL_ARCHITECTED_COLUMNS = [
  'Provider',
  'Description',
  'AccountId',
  'Region',
  'AssessmentDate',
  'Requirements_Id',
  'Requirements_Description',
  'Requirements_Attributes_Name',
  'Requirements_Attributes_WellArchitectedQuestionId',
  'Requirements_Attributes_WellArchitectedPracticeId',
  'Requirements_Attributes_Section',
  'Requirements_Attributes_SubSection',
  'Requirements_Attributes_LevelOfRisk',
  'Requirements_Attributes_AssessmentMethod',
  'Requirements_Attributes_Description',
  'Requirements_Attributes_ImplementationGuidanceUrl',
  'Status',
  'StatusExtended',
  'ResourceId',
  'ResourceName',
  'CheckId',
  'Muted',
] as const satisfies readonly (keyof WellArchitectedRow)[];

// Fails to compile if a row field is missing from the column list
type UnlistedColumns = Exclude<keyof WellArchitectedRow, (typeof WELL_ARCHITECTED_COLUMNS)[number]>;
const columnsCoverRow: [UnlistedColumns] extends [never] ? true : never = true;
void columnsCoverRow;

// ─── Transform ───────────────────────────────────────────────────────

export const MANUAL_STATUS = 'MANUAL';

export interface TransformOptions {
  /**
   * Assessment date stamped on MANUAL rows. Defaults to the most recent
   * finding timestamp, or an empty string when there are no findings.
   */
  assessmentDate?: string;
}

/**
 * Flatten findings into Well-Architected rows.
 *
 * Order: findings (input order) × requirements (definition order) ×
 * attributes (definition order), followed by the MANUAL rows in
 * requirement/attribute definition order.
 */
export function transformWellArchitected(
  findings: readonly Finding[],
  framework: ComplianceFramework,
  frameworkName: string,
  options: TransformOptions = {},
): WellArchitectedRow[] {
  return appendWellArchitectedRows([], findings, framework, frameworkName, options);
}

/** Same as transformWellArchitected, appending to a caller-owned row list. */
export function appendWellArchitectedRows(
  rows: WellArchitectedRow[],
  findings: readonly Finding[],
  framework: ComplianceFramework,
  frameworkName: string,
  options: TransformOptions = {},
): WellArchitectedRow[] {
  for (const finding of findings) {
    const satisfied = finding.compliance[frameworkName] ?? [];
    if (satisfied.length === 0) continue;
    for (const requirement of framework.Requirements) {
      if (!satisfied.includes(requirement.Id)) continue;
      for (const attribute of requirement.Attributes) {
        rows.push({
          Provider: finding.provider,
          Description: framework.Description,
          AccountId: finding.account_uid,
          Region: finding.region,
          AssessmentDate: finding.timestamp.toISOString(),
          ...requirementColumns(requirement, attribute),
          Status: finding.status,
          StatusExtended: finding.status_extended,
          ResourceId: finding.resource_uid,
          ResourceName: finding.resource_name,
          CheckId: finding.check_id,
          Muted: finding.muted,
        });
      }
    }
  }

  const assessmentDate = options.assessmentDate ?? latestTimestamp(findings);
  for (const requirement of framework.Requirements) {
    if (requirement.Checks.length > 0) continue;
    for (const attribute of requirement.Attributes) {
      rows.push({
        Provider: framework.Provider.toLowerCase(),
        Description: framework.Description,
        AccountId: '',
        Region: '',
        AssessmentDate: assessmentDate,
        ...requirementColumns(requirement, attribute),
        Status: MANUAL_STATUS,
        StatusExtended: 'Manual check',
        ResourceId: 'manual_check',
        ResourceName: 'Manual check',
        CheckId: 'manual',
        Muted: false,
      });
    }
  }

  return rows;
}

function requirementColumns(requirement: Requirement, attribute: WellArchitectedAttribute) {
  return {
    Requirements_Id: requirement.Id,
    Requirements_Description: requirement.Description,
    Requirements_Attributes_Name: attribute.Name,
    Requirements_Attributes_WellArchitectedQuestionId: attribute.WellArchitectedQuestionId,
    Requirements_Attributes_WellArchitectedPracticeId: attribute.WellArchitectedPracticeId,
    Requirements_Attributes_Section: attribute.Section,
    Requirements_Attributes_SubSection: attribute.SubSection,
    Requirements_Attributes_LevelOfRisk: attribute.LevelOfRisk,
    Requirements_Attributes_AssessmentMethod: attribute.AssessmentMethod,
    Requirements_Attributes_Description: attribute.Description,
    Requirements_Attributes_ImplementationGuidanceUrl: attribute.ImplementationGuidanceUrl,
  };
}

function latestTimestamp(findings: readonly Finding[]): string {
  let latest: Date | null = null;
  for (const f of findings) {
    if (!latest || f.timestamp.getTime() > latest.getTime()) latest = f.timestamp;
  }
  return latest ? latest.toISOString() : '';
}

// ─── Output session ──────────────────────────────────────────────────

export class WellArchitectedOutput extends ComplianceOutput<WellArchitectedRow> {
  protected readonly columns = WELL_ARCHITECTED_COLUMNS;

  transform(findings: readonly Finding[], framework: ComplianceFramework, frameworkName: string): void {
    appendWellArchitectedRows(this.rows, findings, framework, frameworkName, {
      assessmentDate: this.options.assessmentDate,
    });
  }
}
