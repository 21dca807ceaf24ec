import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { classifyAnyIdentifier, isLocalIdentifier } from '../spdx/identifiers.js';
import { SIDECAR_SUFFIX } from '../extractor/metadata.js';
import { ReadError, errorMessage } from '../errors.js';
import type { DeclaredLicense } from './types.js';

export const LICENSES_DIRECTORY = 'LICENSES';

export interface LicensesDirectory {
  declared: Map<string, DeclaredLicense>;
  withoutExtension: string[];
  /** Texts that could not be read, by path. */
  readErrors: Map<string, string[]>;
}

/**
 * Splits a file name in LICENSES/ into identifier and extension. Names that
 * are themselves an identifier (`GPL-2.0`, `MIT`) have no extension.
 */
export function splitLicenseFileName(name: string): { id: string; extension: string } {
  const dot = name.lastIndexOf('.');
  const whole = classifyAnyIdentifier(name);
  if (dot <= 0 || whole === 'current' || whole === 'deprecated') {
    return { id: name, extension: '' };
  }
  return { id: name.slice(0, dot), extension: name.slice(dot) };
}

function isMissingDirectory(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Reads the declared license texts. Texts of project-local licenses are kept
 * for the bill of materials; one that cannot be read still counts as declared.
 */
export async function readLicensesDirectory(root: string): Promise<LicensesDirectory> {
  const declared = new Map<string, DeclaredLicense>();
  const withoutExtension: string[] = [];
  const readErrors = new Map<string, string[]>();

  let names: string[];
  try {
    const entries = await readdir(join(root, LICENSES_DIRECTORY), { withFileTypes: true });
    names = entries.filter(entry => entry.isFile() || entry.isSymbolicLink()).map(entry => entry.name).sort();
  } catch (error) {
    if (isMissingDirectory(error)) {
      return { declared, withoutExtension, readErrors };
    }
    throw error;
  }

  for (const name of names) {
    if (name.endsWith(SIDECAR_SUFFIX)) continue;

    const path = `${LICENSES_DIRECTORY}/${name}`;
    const { id, extension } = splitLicenseFileName(name);
    if (!extension) {
      withoutExtension.push(path);
    }
    if (declared.has(id)) {
      console.error(`Duplicate license text for ${id}: ${path} is ignored`);
      continue;
    }

    let text: string | undefined;
    if (isLocalIdentifier(id)) {
      try {
        text = await readFile(join(root, path), 'utf-8');
      } catch (error) {
        readErrors.set(path, [new ReadError(path, errorMessage(error)).message]);
      }
    }
    declared.set(id, { id, extension, path, text });
  }

  return { declared, withoutExtension, readErrors };
}
