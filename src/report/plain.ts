import { basename } from 'node:path';
import type { ComplianceReport } from './types.js';

function section(title: string, paragraphs: string[][]): string[] {
  return [`# ${title}`, '', ...paragraphs.flatMap(paragraph => [...paragraph, ''])];
}

function bulletList(intro: string, items: readonly string[]): string[] {
  return [intro, ...items.map(item => `* ${item}`)];
}

function groupedList(groups: Readonly<Record<string, readonly string[]>>): string[][] {
  return Object.entries(groups).map(([id, paths]) => bulletList(`'${id}' found in:`, paths));
}

function missingInformation(report: ComplianceReport): string[] {
  const withoutLicense = new Set(report.filesWithoutLicense);
  const both = report.filesWithoutCopyright.filter(path => withoutLicense.has(path));
  const bothSet = new Set(both);
  const copyrightOnly = report.filesWithoutCopyright.filter(path => !bothSet.has(path));
  const licenseOnly = report.filesWithoutLicense.filter(path => !bothSet.has(path));

  const paragraphs: string[][] = [];
  if (both.length > 0) {
    paragraphs.push(bulletList('The following files have no copyright and licensing information:', both));
  }
  if (copyrightOnly.length > 0) {
    paragraphs.push(bulletList('The following files have no copyright information:', copyrightOnly));
  }
  if (licenseOnly.length > 0) {
    paragraphs.push(bulletList('The following files have no licensing information:', licenseOnly));
  }
  return paragraphs.length > 0 ? section('MISSING COPYRIGHT AND LICENSING INFORMATION', paragraphs) : [];
}

function summaryLine(label: string, values: readonly string[]): string {
  return `* ${label}: ${values.length > 0 ? values.join(', ') : '0'}`;
}

/** Renders the report as categorised plain text, ending with the verdict. */
export function formatPlain(report: ComplianceReport): string {
  const lines: string[] = [...missingInformation(report)];

  if (Object.keys(report.bad).length > 0) {
    lines.push(...section('BAD LICENSES', groupedList(report.bad)));
  }
  if (report.deprecated.length > 0) {
    lines.push(...section('DEPRECATED LICENSES', [
      bulletList('The following licenses are deprecated by SPDX:', report.deprecated),
    ]));
  }
  if (report.licensesWithoutExtension.length > 0) {
    lines.push(...section('LICENSES WITHOUT FILE EXTENSION', [
      bulletList('The following licenses have no file extension:', report.licensesWithoutExtension),
    ]));
  }
  if (Object.keys(report.missing).length > 0) {
    lines.push(...section('MISSING LICENSES', groupedList(report.missing)));
  }
  if (report.unused.length > 0) {
    lines.push(...section('UNUSED LICENSES', [
      bulletList('The following licenses are not used:', report.unused),
    ]));
  }
  if (Object.keys(report.readErrors).length > 0) {
    const errors = Object.entries(report.readErrors).flatMap(([path, messages]) =>
      messages.map(message => `${path}: ${message}`),
    );
    lines.push(...section('READ ERRORS', [bulletList('Could not read:', errors)]));
  }
  if (report.coverageConflicts.length > 0) {
    const conflicts = report.coverageConflicts.map(conflict =>
      `${conflict.path} (${conflict.field}: annotations ${conflict.annotations.join(', ')})`,
    );
    lines.push(...section('COVERAGE CONFLICTS', [
      bulletList('The following files match coverage annotations that disagree:', conflicts),
    ]));
  }

  const { summary } = report;
  lines.push(
    '# SUMMARY',
    '',
    summaryLine('Bad licenses', Object.keys(report.bad)),
    summaryLine('Deprecated licenses', report.deprecated),
    summaryLine('Licenses without file extension', report.licensesWithoutExtension.map(path => basename(path))),
    summaryLine('Missing licenses', Object.keys(report.missing)),
    summaryLine('Unused licenses', report.unused),
    summaryLine('Used licenses', report.usedLicenses),
    `* Read errors: ${Object.keys(report.readErrors).length}`,
    `* Coverage conflicts: ${report.coverageConflicts.length}`,
    `* Files with copyright information: ${summary.filesWithCopyright} / ${summary.filesTotal}`,
    `* Files with license information: ${summary.filesWithLicense} / ${summary.filesTotal}`,
    '',
    summary.compliant ? 'The project is compliant.' : 'The project is not compliant.',
  );

  return `${lines.join('\n')}\n`;
}
