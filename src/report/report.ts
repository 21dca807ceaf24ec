import { expressionSymbols } from '../spdx/expression.js';
import { classifyAnyIdentifier, classifyIdentifier } from '../spdx/identifiers.js';
import type { ProjectIndex } from '../indexer/types.js';
import type { ComplianceReport } from './types.js';

type Groups = Map<string, Set<string>>;

function addTo(groups: Groups, key: string, value: string): void {
  const group = groups.get(key);
  if (group) {
    group.add(value);
  } else {
    groups.set(key, new Set([value]));
  }
}

// fromEntries defines own properties, so a path such as `__proto__` is kept.
function freezeGroups(groups: Groups): Readonly<Record<string, readonly string[]>> {
  return Object.freeze(Object.fromEntries(
    [...groups.keys()].sort().map((key): [string, readonly string[]] => [key, Object.freeze([...(groups.get(key) ?? [])].sort())]),
  ));
}

function sorted(values: Iterable<string>): readonly string[] {
  return Object.freeze([...values].sort());
}

/**
 * Cross-references the declared and used licenses of an index and collects
 * the files that lack copyright or license information.
 */
export function generateReport(index: ProjectIndex): ComplianceReport {
  const badGroups: Groups = new Map();
  const usage: Groups = new Map();
  const readErrors: Groups = new Map();
  const filesWithoutCopyright: string[] = [];
  const filesWithoutLicense: string[] = [];

  for (const [path, metadata] of index.files) {
    if (metadata.copyrightLines.size === 0) filesWithoutCopyright.push(path);
    if (metadata.licenseExpressions.length === 0) filesWithoutLicense.push(path);
    for (const message of metadata.readErrors) addTo(readErrors, path, message);

    for (const expression of metadata.licenseExpressions) {
      for (const symbol of expressionSymbols(expression)) {
        addTo(usage, symbol.id, path);
        if (classifyIdentifier(symbol.id, symbol.role) === 'bad') {
          addTo(badGroups, symbol.id, path);
        }
      }
    }
  }

  for (const [path, messages] of index.licenseReadErrors) {
    for (const message of messages) addTo(readErrors, path, message);
  }

  const missingGroups: Groups = new Map();
  for (const id of index.usedLicenses) {
    if (index.declaredLicenses.has(id) || badGroups.has(id)) continue;
    for (const path of usage.get(id) ?? []) addTo(missingGroups, id, path);
  }

  const declared = [...index.declaredLicenses.keys()];
  const unused = declared.filter(id => !index.usedLicenses.has(id));
  const deprecated = declared.filter(id => classifyAnyIdentifier(id) === 'deprecated');

  const filesTotal = index.files.size;
  const compliant =
    badGroups.size === 0 &&
    missingGroups.size === 0 &&
    filesWithoutCopyright.length === 0 &&
    filesWithoutLicense.length === 0;

  return Object.freeze({
    bad: freezeGroups(badGroups),
    deprecated: sorted(deprecated),
    licensesWithoutExtension: sorted(index.licensesWithoutExtension),
    missing: freezeGroups(missingGroups),
    unused: sorted(unused),
    readErrors: freezeGroups(readErrors),
    filesWithoutCopyright: sorted(filesWithoutCopyright),
    filesWithoutLicense: sorted(filesWithoutLicense),
    coverageConflicts: Object.freeze(index.coverageConflicts.map(conflict => Object.freeze({
      ...conflict,
      annotations: [...conflict.annotations],
    }))),
    usedLicenses: sorted(index.usedLicenses),
    summary: Object.freeze({
      filesTotal,
      filesWithCopyright: filesTotal - filesWithoutCopyright.length,
      filesWithLicense: filesTotal - filesWithoutLicense.length,
      compliant,
    }),
  });
}

export function isCompliant(report: ComplianceReport): boolean {
  return report.summary.compliant;
}
