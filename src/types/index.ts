/**
 * compliance-csv — Core type definitions
 *
 * Framework definitions keep the PascalCase keys of the compliance JSON
 * files they are loaded from; findings use the snake_case keys of the
 * scanner output.
 */

// ─── Findings ────────────────────────────────────────────────────────

export interface Finding {
  provider: string;
  account_uid: string;
  region: string;
  timestamp: Date;
  /** Framework name → ids of the requirements this finding satisfies */
  compliance: Record<string, string[]>;
  /** PASS, FAIL or MANUAL for built-in checks; custom checks may report others */
  status: string;
  status_extended: string;
  resource_uid: string;
  resource_name: string;
  check_id: string;
  muted: boolean;
}

// ─── Framework definition ────────────────────────────────────────────

export interface WellArchitectedAttribute {
  Name: string;
  WellArchitectedQuestionId: string;
  WellArchitectedPracticeId: string;
  Section: string;
  SubSection: string;
  LevelOfRisk: string;
  AssessmentMethod: string;
  Description: string;
  ImplementationGuidanceUrl: string;
}

export interface Requirement<A = WellArchitectedAttribute> {
  Id: string;
  Description: string;
  /** Automated checks able to satisfy this requirement; empty = manual only */
  Checks: string[];
  Attributes: A[];
}

export interface ComplianceFramework<A = WellArchitectedAttribute> {
  Framework: string;
  Version: string;
  Provider: string;
  Description: string;
  Requirements: Requirement<A>[];
}

// ─── Output rows ─────────────────────────────────────────────────────

export interface WellArchitectedRow {
  readonly Provider: string;
  readonly Description: string;
  readonly AccountId: string;
  readonly Region: string;
  readonly AssessmentDate: string;
  readonly Requirements_Id: string;
  readonly Requirements_Description: string;
  readonly Requirements_Attributes_Name: string;
  readonly Requirements_Attributes_WellArchitectedQuestionId: string;
  readonly Requirements_Attributes_WellArchitectedPracticeId: string;
  readonly Requirements_Attributes_Section: string;
  readonly Requirements_Attributes_SubSection: string;
  readonly Requirements_Attributes_LevelOfRisk: string;
  readonly Requirements_Attributes_AssessmentMethod: string;
  readonly Requirements_Attributes_Description: string;
  readonly Requirements_Attributes_ImplementationGuidanceUrl: string;
  readonly Status: string;
  readonly StatusExtended: string;
  readonly ResourceId: string;
  readonly ResourceName: string;
  readonly CheckId: string;
  readonly Muted: boolean;
}

/** Values a report cell can hold before it is rendered to text */
export type CellValue = string | number | boolean;

// ─── Write results ───────────────────────────────────────────────────

export type SkipReason = 'no-destination' | 'destination-closed' | 'no-rows';

export interface WriteFailure {
  /** Error class name */
  name: string;
  /** Line the error originated from (0 when unknown) */
  line: number;
  message: string;
}

export type WriteResult =
  | { status: 'written'; rows: number }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'failed'; error: WriteFailure };
