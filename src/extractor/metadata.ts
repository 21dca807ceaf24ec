import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { ReadError, errorMessage } from '../errors.js';
import { config } from '../config.js';
import { extractTags, hasTags } from './tags.js';
import type { ExtractedTags } from './tags.js';
import type { ExtractOptions, FileMetadata, MetadataSource } from './types.js';

export const SIDECAR_SUFFIX = '.license';

const BINARY_SNIFF_BYTES = 8000;

export function isBinary(buffer: Uint8Array): boolean {
  const limit = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < limit; i++) {
    if (buffer[i] === 0) return true;
  }
  return false;
}

export function decodeText(path: string, buffer: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    throw new ReadError(path, 'not valid UTF-8');
  }
}

export function sidecarPathFor(path: string): string {
  return `${path}${SIDECAR_SUFFIX}`;
}

async function readOptional(path: string): Promise<Buffer | null> {
  try {
    return await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new ReadError(path, errorMessage(error));
  }
}

function createMetadata(
  path: string,
  tags: ExtractedTags | null,
  source: MetadataSource,
  extra: { binary: boolean; sidecarPath?: string; checksum?: string; readErrors?: string[] },
): FileMetadata {
  return Object.freeze({
    path,
    copyrightLines: new Set(tags?.copyrightLines ?? []),
    licenseExpressions: Object.freeze([...(tags?.expressions ?? [])]),
    readErrors: Object.freeze([...(extra.readErrors ?? []), ...(tags?.errors ?? [])]),
    source,
    sidecarPath: extra.sidecarPath,
    binary: extra.binary,
    checksum: extra.checksum,
  });
}

/**
 * Extracts the copyright and license tags of one file. A `<file>.license`
 * sidecar, when present, is read instead of the file's own header. Never
 * throws: I/O and decoding failures end up in `readErrors`.
 */
export async function extractFileMetadata(
  root: string,
  relativePath: string,
  options: ExtractOptions = {},
): Promise<FileMetadata> {
  const { windowLines = config.scanner.windowLines, checksum = false } = options;
  const absolutePath = join(root, relativePath);
  const sidecarRelative = sidecarPathFor(relativePath);

  try {
    const content = await readFile(absolutePath).catch((error: unknown) => {
      throw new ReadError(relativePath, errorMessage(error));
    });
    const binary = isBinary(content);
    const digest = checksum ? createHash('sha1').update(content).digest('hex') : undefined;

    const sidecar = await readOptional(join(root, sidecarRelative));
    if (sidecar) {
      const tags = extractTags(decodeText(sidecarRelative, sidecar), windowLines);
      return createMetadata(relativePath, tags, 'sidecar', { binary, sidecarPath: sidecarRelative, checksum: digest });
    }

    if (binary) {
      return createMetadata(relativePath, null, 'none', { binary, checksum: digest });
    }

    const tags = extractTags(decodeText(relativePath, content), windowLines);
    return createMetadata(relativePath, tags, hasTags(tags) ? 'header' : 'none', { binary, checksum: digest });
  } catch (error) {
    return createMetadata(relativePath, null, 'none', {
      binary: false,
      readErrors: [errorMessage(error)],
    });
  }
}
