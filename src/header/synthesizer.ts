import { commentText, findCommentBlock, uncommentText } from '../comments/comment.js';
import type { CommentForm, CommentStyle } from '../comments/types.js';
import { extractTags, hasTags, normalizeCopyright } from '../extractor/tags.js';
import type { ExtractedTags } from '../extractor/tags.js';
import { containsExpression } from '../spdx/expression.js';
import type { LicenseExpression } from '../spdx/expression.js';
import { DEFAULT_TEMPLATE, renderTemplate } from './template.js';

export type HeaderMode = 'replace' | 'append';

export interface HeaderRequest {
  /** Complete tag lines, e.g. `SPDX-FileCopyrightText: 2024 Jane Doe`. */
  copyrightLines: readonly string[];
  expressions: readonly LicenseExpression[];
  template?: string;
  /** The template already carries its own comment delimiters. */
  templateIsCommented?: boolean;
  mode?: HeaderMode;
  mergeCopyrights?: boolean;
  skipExisting?: boolean;
  form?: CommentForm;
}

export interface HeaderSpan {
  /** Shebang line kept above the header, including its newline. */
  prefix: string;
  start: number;
  end: number;
  text: string;
  tags: ExtractedTags;
}

export function splitShebang(content: string): { prefix: string; body: string } {
  if (!content.startsWith('#!')) {
    return { prefix: '', body: content };
  }
  const newline = content.indexOf('\n');
  if (newline === -1) {
    return { prefix: `${content}\n`, body: '' };
  }
  return { prefix: content.slice(0, newline + 1), body: content.slice(newline + 1) };
}

/**
 * Locates the existing license header: the first comment block after an
 * optional shebang, provided it carries copyright or license tags. Offsets
 * are relative to `content`.
 */
export function findHeader(content: string, style: CommentStyle): HeaderSpan | null {
  const { prefix, body } = splitShebang(content);
  const block = findCommentBlock(body, style);
  if (!block) return null;

  const tags = extractTags(uncommentText(block.text, style));
  if (!hasTags(tags)) return null;

  return {
    prefix,
    start: prefix.length + block.start,
    end: prefix.length + block.end,
    text: block.text,
    tags,
  };
}

const YEARS = /^(\d{4}(?:\s*-\s*\d{4})?(?:\s*,\s*\d{4}(?:\s*-\s*\d{4})?)*),?\s+(.*)$/;
const TAG = /^(SPDX-(?:File|Snippet)CopyrightText:)\s+(.*)$/;

/**
 * Collapses copyright lines that name the same holder into one line whose
 * year is the full range, e.g. `2019 Jane` and `2023 Jane` become
 * `2019 - 2023 Jane`.
 */
export function mergeCopyrightLines(lines: readonly string[]): string[] {
  const groups = new Map<string, { prefix: string; statement: string; years: number[] }>();
  const passthrough: string[] = [];

  for (const line of lines) {
    const tag = TAG.exec(line);
    if (!tag) {
      passthrough.push(line);
      continue;
    }
    const [, prefix, rest] = tag;
    const withYears = YEARS.exec(rest);
    const statement = withYears ? withYears[2] : rest;
    const years = withYears ? (withYears[1].match(/\d{4}/g) ?? []).map(Number) : [];

    const key = `${prefix} ${statement}`;
    const group = groups.get(key) ?? { prefix, statement, years: [] };
    group.years.push(...years);
    groups.set(key, group);
  }

  const merged = Array.from(groups.values()).map(({ prefix, statement, years }) => {
    if (years.length === 0) return `${prefix} ${statement}`;
    const min = Math.min(...years);
    const max = Math.max(...years);
    return `${prefix} ${min === max ? min : `${min} - ${max}`} ${statement}`;
  });

  return [...new Set([...merged, ...passthrough])].sort();
}

function combineCopyrights(requested: readonly string[], existing: readonly string[], merge: boolean): string[] {
  const lines = [...new Set([...requested, ...existing.map(normalizeCopyright)])].sort();
  return merge ? mergeCopyrightLines(lines) : lines;
}

function combineExpressions(
  requested: readonly LicenseExpression[],
  existing: readonly LicenseExpression[],
): LicenseExpression[] {
  const combined: LicenseExpression[] = [];
  for (const expression of [...requested, ...existing]) {
    if (!containsExpression(combined, expression)) combined.push(expression);
  }
  return combined;
}

function stripLeadingBlankLines(text: string): string {
  return text.replace(/^(?:[ \t]*\r?\n)+/, '');
}

function joinHeader(before: string, header: string, rest: string): string {
  return `${before}${header}\n${rest ? `\n${rest}` : ''}`;
}

/**
 * Builds the new content of a file whose comment style is `style`, or of a
 * sidecar when `style` is null (the whole text is then the header).
 *
 * In replace mode the tag lines of the old header survive next to the
 * requested ones, unparseable license lines included, and the rest of the
 * old header is dropped; in append mode the old header is left alone and the
 * new block follows it. Running the
 * same request twice leaves the content unchanged.
 */
export function synthesizeHeader(content: string, style: CommentStyle | null, request: HeaderRequest): string {
  const {
    template = DEFAULT_TEMPLATE,
    templateIsCommented = false,
    mode = 'replace',
    mergeCopyrights = false,
    skipExisting = false,
    form,
  } = request;

  if (skipExisting && hasTags(extractTags(content))) {
    return content;
  }

  const wrap = (text: string): string =>
    style && !templateIsCommented ? commentText(text, style, form) : text;

  if (!style) {
    const old = extractTags(content);
    if (mode === 'append' && content.trim()) {
      const block = renderTemplate(template, combineCopyrights(request.copyrightLines, [], mergeCopyrights), request.expressions);
      return `${content.trimEnd()}\n\n${block}\n`;
    }
    const block = renderTemplate(
      template,
      combineCopyrights(request.copyrightLines, old.copyrightLines, mergeCopyrights),
      combineExpressions(request.expressions, old.expressions),
      old.invalidLicenses,
    );
    return `${block}\n`;
  }

  const header = findHeader(content, style);
  const { prefix, body } = splitShebang(content);

  if (!header) {
    const block = wrap(renderTemplate(
      template,
      combineCopyrights(request.copyrightLines, [], mergeCopyrights),
      request.expressions,
    ));
    return joinHeader(prefix, block, stripLeadingBlankLines(body));
  }

  const rest = stripLeadingBlankLines(content.slice(header.end));

  if (mode === 'append') {
    const block = wrap(renderTemplate(
      template,
      combineCopyrights(request.copyrightLines, [], mergeCopyrights),
      request.expressions,
    ));
    return joinHeader(`${content.slice(0, header.end)}\n\n`, block, rest);
  }

  const block = wrap(renderTemplate(
    template,
    combineCopyrights(request.copyrightLines, header.tags.copyrightLines, mergeCopyrights),
    combineExpressions(request.expressions, header.tags.expressions),
    header.tags.invalidLicenses,
  ));
  return joinHeader(prefix, block, rest);
}
