import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

export type IdentifierClass = 'current' | 'deprecated' | 'local' | 'bad';

export type IdentifierRole = 'license' | 'exception';

interface IdentifierTable {
  current: ReadonlySet<string>;
  deprecated: ReadonlySet<string>;
}

/** Prefix reserved for project-local licenses. */
export const LICENSE_REF_PREFIX = 'LicenseRef-';
/** Prefix reserved for project-local license additions (exceptions). */
export const ADDITION_REF_PREFIX = 'AdditionRef-';

const DOCUMENT_REF = /^DocumentRef-[A-Za-z0-9.-]+:LicenseRef-[A-Za-z0-9.-]+$/;

function loadIds(module: string): string[] {
  const value: unknown = require(module);
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Malformed identifier list: ${module}`);
  }
  return value;
}

// The SPDX license list, as published in spdx-license-ids and spdx-exceptions.
const licenses: IdentifierTable = Object.freeze({
  current: new Set(loadIds('spdx-license-ids/index.json')),
  deprecated: new Set(loadIds('spdx-license-ids/deprecated.json')),
});
const exceptions: IdentifierTable = Object.freeze({
  current: new Set(loadIds('spdx-exceptions/index.json')),
  deprecated: new Set<string>(),
});

export function isLocalIdentifier(id: string, role: IdentifierRole = 'license'): boolean {
  if (id.startsWith(LICENSE_REF_PREFIX) || DOCUMENT_REF.test(id)) {
    return id.length > LICENSE_REF_PREFIX.length;
  }
  return role === 'exception' && id.startsWith(ADDITION_REF_PREFIX) && id.length > ADDITION_REF_PREFIX.length;
}

/**
 * Sorts an identifier into exactly one of the four classes. Lookups are
 * case-sensitive: `mit` is not `MIT`.
 */
export function classifyIdentifier(id: string, role: IdentifierRole = 'license'): IdentifierClass {
  const table = role === 'license' ? licenses : exceptions;
  if (table.current.has(id)) return 'current';
  if (table.deprecated.has(id)) return 'deprecated';
  if (isLocalIdentifier(id, role)) return 'local';
  return 'bad';
}

/** Classifies an id that may be either a license or an exception, e.g. a LICENSES/ file name. */
export function classifyAnyIdentifier(id: string): IdentifierClass {
  const asLicense = classifyIdentifier(id, 'license');
  return asLicense === 'bad' ? classifyIdentifier(id, 'exception') : asLicense;
}
