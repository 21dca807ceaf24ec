import type { CoverageConflict } from '../indexer/types.js';

export interface ReportSummary {
  filesTotal: number;
  filesWithCopyright: number;
  filesWithLicense: number;
  compliant: boolean;
}

/**
 * Findings of one lint run. Path lists and license lists are sorted; the
 * report holds no reference to the index it was built from.
 */
export interface ComplianceReport {
  /** Unrecognised identifiers, each with the files using it. */
  bad: Readonly<Record<string, readonly string[]>>;
  /** Declared licenses that SPDX has deprecated. */
  deprecated: readonly string[];
  licensesWithoutExtension: readonly string[];
  /** Used identifiers with no text in the licenses directory. */
  missing: Readonly<Record<string, readonly string[]>>;
  unused: readonly string[];
  readErrors: Readonly<Record<string, readonly string[]>>;
  filesWithoutCopyright: readonly string[];
  filesWithoutLicense: readonly string[];
  coverageConflicts: readonly CoverageConflict[];
  usedLicenses: readonly string[];
  summary: Readonly<ReportSummary>;
}

export type ReportFormatter = (report: ComplianceReport) => string;
