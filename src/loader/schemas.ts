/**
 * compliance-csv — Input schemas.
 *
 * Framework files use the PascalCase layout of the published compliance
 * definitions; findings files use the scanner's snake_case keys.
 */

import { z } from 'zod';

export const attributeSchema = z.object({
  Name: z.string(),
  WellArchitectedQuestionId: z.string(),
  WellArchitectedPracticeId: z.string(),
  Section: z.string(),
  SubSection: z.string().default(''),
  LevelOfRisk: z.string(),
  AssessmentMethod: z.string(),
  Description: z.string(),
  ImplementationGuidanceUrl: z.string(),
});

export const requirementSchema = z.object({
  Id: z.string().min(1),
  Description: z.string(),
  Checks: z.array(z.string()).default([]),
  Attributes: z.array(attributeSchema),
});

export const frameworkSchema = z.object({
  Framework: z.string().min(1),
  Version: z.string().default(''),
  Provider: z.string().min(1),
  Description: z.string(),
  Requirements: z.array(requirementSchema),
});

export const findingSchema = z.object({
  provider: z.string(),
  account_uid: z.string().default(''),
  region: z.string().default(''),
  timestamp: z.coerce.date(),
  compliance: z.record(z.array(z.string())).default({}),
  status: z.string(),
  status_extended: z.string().default(''),
  resource_uid: z.string().default(''),
  resource_name: z.string().default(''),
  check_id: z.string(),
  muted: z.boolean().default(false),
});

/** A findings file holds either an array of findings or a single one */
export const findingsFileSchema = z.preprocess(
  value => (Array.isArray(value) ? value : [value]),
  z.array(findingSchema),
);
