/**
 * compliance-csv — Row summary for terminal output.
 */

import type { WellArchitectedRow } from '../types/index.js';

export interface StatusCounts {
  pass: number;
  fail: number;
  manual: number;
  other: number;
}

export interface SectionSummary extends StatusCounts {
  section: string;
}

export interface RowSummary {
  total: number;
  muted: number;
  counts: StatusCounts;
  /** Sections in first-seen order */
  sections: SectionSummary[];
}

function emptyCounts(): StatusCounts {
  return { pass: 0, fail: 0, manual: 0, other: 0 };
}

function bump(counts: StatusCounts, status: string): void {
  switch (status) {
    case 'PASS': counts.pass++; break;
    case 'FAIL': counts.fail++; break;
    case 'MANUAL': counts.manual++; break;
    default: counts.other++;
  }
}

export function summarizeRows(rows: readonly WellArchitectedRow[]): RowSummary {
  const counts = emptyCounts();
  const bySection = new Map<string, SectionSummary>();
  let muted = 0;

  for (const row of rows) {
    bump(counts, row.Status);
    if (row.Muted) muted++;

    const name = row.Requirements_Attributes_Section;
    let section = bySection.get(name);
    if (!section) {
      section = { section: name, ...emptyCounts() };
      bySection.set(name, section);
    }
    bump(section, row.Status);
  }

  return { total: rows.length, muted, counts, sections: [...bySection.values()] };
}
