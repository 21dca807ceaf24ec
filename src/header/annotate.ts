import { readFile, writeFile } from 'node:fs/promises';
import { commentStyleRegistry } from '../comments/registry.js';
import type { CommentForm, CommentStyle } from '../comments/types.js';
import { StyleError, TemplateError } from '../errors.js';
import { decodeText, isBinary, sidecarPathFor } from '../extractor/metadata.js';
import { formatCopyright } from '../extractor/tags.js';
import { parseExpression } from '../spdx/expression.js';
import { config } from '../config.js';
import { synthesizeHeader } from './synthesizer.js';
import type { HeaderMode, HeaderRequest } from './synthesizer.js';

export interface AnnotateOptions {
  /** Copyright holders (`Jane Doe <jane@example.com>`) or complete copyright lines. */
  copyrights?: string[];
  year?: string | number;
  licenses?: string[];
  template?: string;
  templateIsCommented?: boolean;
  mode?: HeaderMode;
  mergeCopyrights?: boolean;
  skipExisting?: boolean;
  /** Name of a comment style to use instead of the detected one. */
  style?: string;
  form?: CommentForm;
  /** `always` writes `<file>.license` even for commentable files. */
  sidecar?: 'auto' | 'always';
  /** Write a sidecar for file types that take no comments. */
  fallbackSidecar?: boolean;
  /** Skip files with no usable comment style instead of aborting. */
  skipUnrecognised?: boolean;
}

export type AnnotateAction = 'updated' | 'unchanged' | 'skipped' | 'failed';

export interface AnnotateResult {
  path: string;
  /** File that was (or would have been) written: the file itself or its sidecar. */
  target: string;
  action: AnnotateAction;
  sidecar: boolean;
  message?: string;
}

export function buildRequest(options: AnnotateOptions): HeaderRequest {
  const copyrightLines = (options.copyrights ?? []).map(c => formatCopyright(c, options.year));
  const expressions = (options.licenses ?? []).map(license => parseExpression(license));

  if (copyrightLines.length === 0 && expressions.length === 0) {
    throw new Error('Nothing to write: give at least one copyright or license');
  }

  return {
    copyrightLines,
    expressions,
    template: options.template,
    templateIsCommented: options.templateIsCommented,
    mode: options.mode ?? config.header.mode,
    mergeCopyrights: options.mergeCopyrights ?? config.header.mergeCopyrights,
    skipExisting: options.skipExisting,
    form: options.form,
  };
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return decodeText(path, await readFile(path));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

async function writeIfChanged(target: string, before: string, after: string): Promise<AnnotateAction> {
  if (before === after) return 'unchanged';
  await writeFile(target, after, 'utf-8');
  return 'updated';
}

async function annotateWithRequest(path: string, request: HeaderRequest, options: AnnotateOptions): Promise<AnnotateResult> {
  const sidecarPath = sidecarPathFor(path);
  const existingSidecar = await readIfExists(sidecarPath);
  const buffer = await readFile(path);

  let style: CommentStyle | null = null;
  let text = '';
  let useSidecar = options.sidecar === 'always' || existingSidecar !== null || isBinary(buffer);

  if (!useSidecar) {
    text = decodeText(path, buffer);
    try {
      style = commentStyleRegistry.resolve(path, text, { style: options.style, form: options.form });
    } catch (error) {
      if (!(error instanceof StyleError)) throw error;
      if (options.fallbackSidecar && !options.style && commentStyleRegistry.isUncommentable(path)) {
        useSidecar = true;
      } else if (options.skipUnrecognised) {
        return { path, target: path, action: 'skipped', sidecar: false, message: error.message };
      } else {
        throw error;
      }
    }
  }

  const target = useSidecar ? sidecarPath : path;
  const before = useSidecar ? existingSidecar ?? '' : text;

  try {
    const after = synthesizeHeader(before, useSidecar ? null : style, request);
    return { path, target, action: await writeIfChanged(target, before, after), sidecar: useSidecar };
  } catch (error) {
    if (error instanceof TemplateError) {
      return { path, target, action: 'failed', sidecar: useSidecar, message: error.message };
    }
    throw error;
  }
}

/**
 * Writes copyright and license tags into one file, or into its `.license`
 * sidecar when the file is binary, already has a sidecar, cannot hold
 * comments (with `fallbackSidecar`), or `sidecar` is `always`.
 */
export async function annotateFile(path: string, options: AnnotateOptions): Promise<AnnotateResult> {
  return annotateWithRequest(path, buildRequest(options), options);
}

/**
 * Annotates each file in turn. A TemplateError fails only its own file; a
 * StyleError skips the file when `skipUnrecognised` is set and otherwise
 * aborts the run.
 */
export async function annotateFiles(paths: string[], options: AnnotateOptions): Promise<AnnotateResult[]> {
  const request = buildRequest(options);
  const results: AnnotateResult[] = [];

  for (const path of paths) {
    const result = await annotateWithRequest(path, request, options);
    if (result.action === 'failed' || result.action === 'skipped') {
      console.error(`Skipped ${path}: ${result.message ?? 'unknown reason'}`);
    }
    results.push(result);
  }

  return results;
}
