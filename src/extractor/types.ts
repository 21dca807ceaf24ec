import type { LicenseExpression } from '../spdx/expression.js';

export type MetadataSource = 'header' | 'sidecar' | 'none';

export interface FileMetadata {
  /** Path relative to the project root, with forward slashes. */
  readonly path: string;
  readonly copyrightLines: ReadonlySet<string>;
  readonly licenseExpressions: readonly LicenseExpression[];
  readonly readErrors: readonly string[];
  readonly source: MetadataSource;
  readonly sidecarPath?: string;
  readonly binary: boolean;
  /** SHA-1 of the file contents, when requested. */
  readonly checksum?: string;
  /** Set when a coverage declaration supplied the field. */
  readonly coveredCopyright?: boolean;
  readonly coveredLicense?: boolean;
}

export interface ExtractOptions {
  windowLines?: number;
  checksum?: boolean;
}
