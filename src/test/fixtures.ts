import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { FileMetadata } from '../extractor/types.js';
import { parseExpression } from '../spdx/expression.js';

/** Creates a throwaway project directory holding the given files. */
export async function createProject(files: Record<string, string | Uint8Array>): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'spdx-lint-project-'));
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content);
  }
  return root;
}

export function header(copyright: string | null, license: string | null, comment = '#'): string {
  const lines: string[] = [];
  if (copyright) lines.push(`${comment} SPDX-FileCopyrightText: ${copyright}`);
  if (license) lines.push(`${comment} SPDX-License-Identifier: ${license}`);
  return `${lines.join('\n')}\n\ncode\n`;
}

export function metadata(
  path: string,
  copyrightLines: string[] = [],
  licenses: string[] = [],
  extra: Partial<FileMetadata> = {},
): FileMetadata {
  const result: FileMetadata = {
    path,
    copyrightLines: new Set(copyrightLines),
    licenseExpressions: licenses.map(license => parseExpression(license)),
    readErrors: [],
    source: copyrightLines.length > 0 || licenses.length > 0 ? 'header' : 'none',
    binary: false,
    ...extra,
  };
  return Object.freeze(result);
}
