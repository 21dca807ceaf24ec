import { createHash, randomUUID } from 'node:crypto';
import { basename } from 'node:path';
import { expressionSymbols } from '../spdx/expression.js';
import { isLocalIdentifier } from '../spdx/identifiers.js';
import type { FileMetadata } from '../extractor/types.js';
import type { ProjectIndex } from '../indexer/types.js';
import { TOOL_NAME, TOOL_VERSION } from '../version.js';

export interface BomOptions {
  /** ISO timestamp; defaults to now. */
  created?: string;
  namespace?: string;
  creatorPerson?: string;
  creatorOrganization?: string;
}

export function spdxFileId(path: string): string {
  return `SPDXRef-${createHash('md5').update(path).digest('hex')}`;
}

function compareBy<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => (key(a) < key(b) ? -1 : key(a) > key(b) ? 1 : 0);
}

function wrapText(text: string): string {
  return `<text>${text}</text>`;
}

function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

function fileEntry(metadata: FileMetadata): string[] {
  const lines = [
    `FileName: ./${metadata.path}`,
    `SPDXID: ${spdxFileId(metadata.path)}`,
  ];
  if (metadata.checksum) {
    lines.push(`FileChecksum: SHA1: ${metadata.checksum}`);
  }
  lines.push('LicenseConcluded: NOASSERTION');

  // One license id per line; operators and exceptions have no place here.
  const licenseIds = new Set(
    metadata.licenseExpressions.flatMap(expression =>
      expressionSymbols(expression).filter(symbol => symbol.role === 'license').map(symbol => symbol.id),
    ),
  );
  if (licenseIds.size === 0) {
    lines.push('LicenseInfoInFile: NONE');
  } else {
    for (const id of [...licenseIds].sort()) {
      lines.push(`LicenseInfoInFile: ${id}`);
    }
  }

  const copyright = [...metadata.copyrightLines].sort();
  lines.push(`FileCopyrightText: ${copyright.length > 0 ? wrapText(copyright.join('\n')) : 'NONE'}`);
  return lines;
}

/**
 * Renders an SPDX 2.1 tag-value document describing every indexed file and
 * the texts of the project-local licenses in use.
 */
export function formatBom(index: ProjectIndex, options: BomOptions = {}): string {
  const {
    created = formatTimestamp(new Date()),
    namespace = `http://spdx.org/spdxdocs/spdx-v2.1-${randomUUID()}`,
    creatorPerson = 'Anonymous ()',
    creatorOrganization = 'Anonymous ()',
  } = options;

  const files = [...index.files.values()].sort(compareBy(file => file.path));

  const lines = [
    'SPDXVersion: SPDX-2.1',
    'DataLicense: CC0-1.0',
    'SPDXID: SPDXRef-DOCUMENT',
    `DocumentName: ${basename(index.root)}`,
    `DocumentNamespace: ${namespace}`,
    `Creator: Person: ${creatorPerson}`,
    `Creator: Organization: ${creatorOrganization}`,
    `Creator: Tool: ${TOOL_NAME}-${TOOL_VERSION}`,
    `Created: ${created}`,
    `CreatorComment: ${wrapText(`This document was created automatically from the copyright and license information found by ${TOOL_NAME}.`)}`,
    ...files.map(file => `Relationship: SPDXRef-DOCUMENT describes ${spdxFileId(file.path)}`),
  ];

  for (const file of files) {
    lines.push('', ...fileEntry(file));
  }

  const localLicenses = [...index.declaredLicenses.values()]
    .filter(license => isLocalIdentifier(license.id) && index.usedLicenses.has(license.id))
    .sort(compareBy(license => license.id));
  for (const license of localLicenses) {
    lines.push('', `LicenseID: ${license.id}`, `ExtractedText: ${wrapText(license.text ?? '')}`);
  }

  return `${lines.join('\n')}\n`;
}
