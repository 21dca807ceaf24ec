import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import micromatch from 'micromatch';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import { formatCopyright } from '../extractor/tags.js';
import type { FileMetadata } from '../extractor/types.js';
import { parseExpression, renderExpression } from '../spdx/expression.js';
import type { LicenseExpression } from '../spdx/expression.js';
import type { CoverageConflict, CoverageField } from './types.js';

export const COVERAGE_FILE = 'spdx-lint.coverage.json';

const stringOrList = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const annotationSchema = z
  .object({
    path: stringOrList,
    copyright: stringOrList.optional(),
    license: stringOrList.optional(),
    comment: z.string().optional(),
  })
  .strict()
  .refine(annotation => annotation.copyright !== undefined || annotation.license !== undefined, {
    message: 'an annotation needs a copyright or a license',
  });

const declarationSchema = z
  .object({
    version: z.literal(1),
    annotations: z.array(annotationSchema),
  })
  .strict();

export interface CoverageAnnotation {
  index: number;
  patterns: string[];
  copyrightLines?: string[];
  expressions?: LicenseExpression[];
}

export interface CoverageDeclaration {
  source: string;
  annotations: CoverageAnnotation[];
}

export interface CoverageResult {
  files: Map<string, FileMetadata>;
  conflicts: CoverageConflict[];
}

function toList(value: string | string[]): string[] {
  return Array.isArray(value) ? value : [value];
}

export function parseCoverageDeclaration(source: string, raw: unknown): CoverageDeclaration {
  const parsed = declarationSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(source, issues);
  }

  const annotations = parsed.data.annotations.map((annotation, index): CoverageAnnotation => {
    let expressions: LicenseExpression[] | undefined;
    if (annotation.license !== undefined) {
      expressions = toList(annotation.license).map(license => {
        try {
          return parseExpression(license);
        } catch (error) {
          throw new ConfigError(source, `annotations.${index}.license: ${errorMessage(error)}`);
        }
      });
    }

    return {
      index,
      patterns: toList(annotation.path),
      copyrightLines: annotation.copyright !== undefined
        ? toList(annotation.copyright).map(statement => formatCopyright(statement))
        : undefined,
      expressions,
    };
  });

  return { source, annotations };
}

/**
 * Loads the coverage declaration at the project root. Returns null when there
 * is none; a malformed one is a ConfigError, which ends the run.
 */
export async function loadCoverageDeclaration(
  root: string,
  fileName: string = COVERAGE_FILE,
): Promise<CoverageDeclaration | null> {
  let content: string;
  try {
    content = await readFile(join(root, fileName), 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ConfigError(fileName, errorMessage(error));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(fileName, `invalid JSON: ${errorMessage(error)}`);
  }

  return parseCoverageDeclaration(fileName, raw);
}

function signature(annotation: CoverageAnnotation, field: CoverageField): string | undefined {
  if (field === 'copyright') {
    return annotation.copyrightLines ? [...annotation.copyrightLines].sort().join('\n') : undefined;
  }
  return annotation.expressions ? annotation.expressions.map(renderExpression).join('\n') : undefined;
}

function detectConflict(path: string, matches: CoverageAnnotation[], field: CoverageField): CoverageConflict | null {
  const setting = matches.filter(annotation => signature(annotation, field) !== undefined);
  const distinct = new Set(setting.map(annotation => signature(annotation, field)));
  if (distinct.size <= 1) return null;
  return { path, field, annotations: setting.map(annotation => annotation.index) };
}

/**
 * Fills in what a file's own header or sidecar leaves empty. Fields the file
 * declares itself are never replaced. When several annotations match, the
 * last one that sets a field supplies it, and differing values are reported
 * as conflicts.
 */
export function applyCoverage(
  files: ReadonlyMap<string, FileMetadata>,
  declaration: CoverageDeclaration,
): CoverageResult {
  const result = new Map<string, FileMetadata>();
  const conflicts: CoverageConflict[] = [];

  for (const [path, metadata] of files) {
    const matches = declaration.annotations.filter(annotation =>
      micromatch.isMatch(path, annotation.patterns, { dot: true }),
    );
    if (matches.length === 0) {
      result.set(path, metadata);
      continue;
    }

    for (const field of ['copyright', 'license'] as const) {
      const conflict = detectConflict(path, matches, field);
      if (conflict) conflicts.push(conflict);
    }

    const copyrightLines = [...matches].reverse().find(a => a.copyrightLines)?.copyrightLines;
    const expressions = [...matches].reverse().find(a => a.expressions)?.expressions;

    const fillCopyright = metadata.copyrightLines.size === 0 && copyrightLines !== undefined;
    const fillLicense = metadata.licenseExpressions.length === 0 && expressions !== undefined;

    if (!fillCopyright && !fillLicense) {
      result.set(path, metadata);
      continue;
    }

    result.set(path, Object.freeze({
      ...metadata,
      copyrightLines: fillCopyright && copyrightLines ? new Set(copyrightLines) : metadata.copyrightLines,
      licenseExpressions: fillLicense && expressions ? Object.freeze([...expressions]) : metadata.licenseExpressions,
      coveredCopyright: fillCopyright,
      coveredLicense: fillLicense,
    }));
  }

  return { files: result, conflicts };
}
