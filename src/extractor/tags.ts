import { commentStyleRegistry } from '../comments/registry.js';
import { ParseError, errorMessage } from '../errors.js';
import { containsExpression, parseExpression } from '../spdx/expression.js';
import type { LicenseExpression } from '../spdx/expression.js';

export const COPYRIGHT_TAG = 'SPDX-FileCopyrightText:';
export const LICENSE_TAG = 'SPDX-License-Identifier:';

const IGNORE_START = 'SPDX-Lint-IgnoreStart';
const IGNORE_END = 'SPDX-Lint-IgnoreEnd';

export interface ExtractedTags {
  copyrightLines: string[];
  expressions: LicenseExpression[];
  /** Raw values of license tags that did not parse. */
  invalidLicenses: string[];
  errors: string[];
}

// Longest first, so that `--}}` is removed whole rather than as `}}`.
const END_MARKERS = commentStyleRegistry.endMarkers();

// Order matters: the SPDX tag is tried first so that "CopyrightText:" is never
// read as the legacy "Copyright" phrasing.
const COPYRIGHT_PATTERNS: RegExp[] = [
  /(SPDX-(?:File|Snippet)CopyrightText:)\s*(.*)$/,
  /(Copyright(?:\s?\([cC]\))?)\s+(.*)$/,
  /(©)\s*(.*)$/,
];

const LICENSE_PATTERN = /SPDX-License-Identifier:\s*(.*)$/;

function stripEnd(value: string): string {
  let result = value.trimEnd();
  let marker = END_MARKERS.find(candidate => result.endsWith(candidate));
  while (marker !== undefined) {
    result = result.slice(0, -marker.length).trimEnd();
    marker = END_MARKERS.find(candidate => result.endsWith(candidate));
  }
  return result.trim();
}

export function matchCopyright(line: string): string | undefined {
  for (const pattern of COPYRIGHT_PATTERNS) {
    const match = pattern.exec(line);
    if (match) {
      const statement = stripEnd(match[2]);
      return statement ? `${match[1]} ${statement}` : undefined;
    }
  }
  return undefined;
}

/** Rewrites a copyright line of any accepted phrasing as an SPDX-FileCopyrightText line. */
export function normalizeCopyright(line: string): string {
  const trimmed = line.trim();
  if (trimmed.startsWith(COPYRIGHT_TAG) || trimmed.startsWith('SPDX-SnippetCopyrightText:')) {
    return trimmed;
  }
  const legacy = /^(?:Copyright(?:\s?\([cC]\))?|©)\s*(.*)$/.exec(trimmed);
  return `${COPYRIGHT_TAG} ${legacy ? legacy[1] : trimmed}`;
}

const COPYRIGHT_LINE = /^(?:SPDX-(?:File|Snippet)CopyrightText:|Copyright\b|©)/;

/**
 * Turns a holder into a copyright line. Statements that already are
 * copyright lines keep their year and are only normalised.
 */
export function formatCopyright(statement: string, year?: string | number): string {
  const trimmed = statement.trim();
  if (COPYRIGHT_LINE.test(trimmed)) {
    return normalizeCopyright(trimmed);
  }
  return `${COPYRIGHT_TAG} ${year !== undefined ? `${year} ` : ''}${trimmed}`;
}

export function describeParseError(value: string, error: unknown): string {
  if (error instanceof ParseError) {
    return `Invalid SPDX-License-Identifier '${value}': ${error.message} at position ${error.position}`;
  }
  return `Invalid SPDX-License-Identifier '${value}': ${errorMessage(error)}`;
}

/**
 * Reads copyright and license tags from the first `windowLines` lines of
 * `text`. A malformed expression is recorded in `errors` and the remaining
 * lines are still read.
 */
export function extractTags(text: string, windowLines: number = Number.POSITIVE_INFINITY): ExtractedTags {
  const copyrightLines: string[] = [];
  const expressions: LicenseExpression[] = [];
  const invalidLicenses: string[] = [];
  const errors: string[] = [];
  let ignoring = false;

  const lines = text.split(/\r?\n/);
  const limit = Math.min(lines.length, windowLines);

  for (let i = 0; i < limit; i++) {
    const line = lines[i];

    if (ignoring) {
      if (line.includes(IGNORE_END)) ignoring = false;
      continue;
    }
    if (line.includes(IGNORE_START)) {
      ignoring = !line.includes(IGNORE_END);
      continue;
    }

    const licenseMatch = LICENSE_PATTERN.exec(line);
    if (licenseMatch) {
      const value = stripEnd(licenseMatch[1]);
      try {
        const expression = parseExpression(value);
        if (!containsExpression(expressions, expression)) {
          expressions.push(expression);
        }
      } catch (error) {
        if (!invalidLicenses.includes(value)) invalidLicenses.push(value);
        errors.push(describeParseError(value, error));
      }
      continue;
    }

    const copyright = matchCopyright(line);
    if (copyright && !copyrightLines.includes(copyright)) {
      copyrightLines.push(copyright);
    }
  }

  return { copyrightLines, expressions, invalidLicenses, errors };
}

export function hasTags(tags: ExtractedTags): boolean {
  return tags.copyrightLines.length > 0 || tags.expressions.length > 0 || tags.errors.length > 0;
}
