import type { FileMetadata } from '../extractor/types.js';

export interface DeclaredLicense {
  id: string;
  /** Includes the dot; empty when the file has none. */
  extension: string;
  path: string;
  /** Text of a project-local license. */
  text?: string;
}

export type CoverageField = 'copyright' | 'license';

/** A file that several coverage annotations assign different values to. */
export interface CoverageConflict {
  path: string;
  field: CoverageField;
  /** Zero-based positions of the conflicting annotations in the declaration. */
  annotations: number[];
}

export interface ProjectIndex {
  root: string;
  files: ReadonlyMap<string, FileMetadata>;
  declaredLicenses: ReadonlyMap<string, DeclaredLicense>;
  licensesWithoutExtension: readonly string[];
  /** Read errors of texts in the licenses directory, by path. */
  licenseReadErrors: ReadonlyMap<string, readonly string[]>;
  usedLicenses: ReadonlySet<string>;
  coverageConflicts: readonly CoverageConflict[];
  coverageSource?: string;
}
