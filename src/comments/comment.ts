import { StyleError } from '../errors.js';
import type { CommentForm, CommentStyle } from './types.js';

export interface CommentBlock {
  /** Offset of the first character of the block. */
  start: number;
  /** Offset just past the last character of the block's final line. */
  end: number;
  text: string;
}

function preferredForm(style: CommentStyle, form?: CommentForm): CommentForm {
  const chosen = form ?? (style.singleLinePrefix !== undefined ? 'single' : 'multi');
  if (chosen === 'single' && style.singleLinePrefix === undefined) {
    throw new StyleError(style.name, `Comment style '${style.name}' has no single-line form`);
  }
  if (chosen === 'multi' && !style.multiLine) {
    throw new StyleError(style.name, `Comment style '${style.name}' has no multi-line form`);
  }
  return chosen;
}

/**
 * Wraps plain text in a comment. Single-line comments are preferred when the
 * style has them; `form` overrides that.
 */
export function commentText(text: string, style: CommentStyle, form?: CommentForm): string {
  const lines = text.split('\n').map(line => line.trimEnd());

  if (preferredForm(style, form) === 'single') {
    const prefix = style.singleLinePrefix ?? '';
    return lines.map(line => (line ? `${prefix} ${line}` : prefix)).join('\n');
  }

  const { start, middle, end, indent } = style.multiLine ?? { start: '', end: '', indent: '' };
  const inner = lines.map(line => {
    if (middle === undefined) return line;
    return line ? `${indent}${middle} ${line}` : `${indent}${middle}`;
  });
  return [start, ...inner, `${indent}${end}`].join('\n');
}

function stripPrefix(line: string, prefix: string): string {
  const trimmed = line.trimStart();
  if (!trimmed.startsWith(prefix)) return line;
  const rest = trimmed.slice(prefix.length);
  return rest.startsWith(' ') ? rest.slice(1) : rest;
}

/** Removes comment delimiters from a block found by {@link findCommentBlock}. */
export function uncommentText(block: string, style: CommentStyle): string {
  const multi = style.multiLine;
  const trimmed = block.trim();

  if (multi && trimmed.startsWith(multi.start) && trimmed.endsWith(multi.end)) {
    const body = trimmed.slice(multi.start.length, trimmed.length - multi.end.length);
    const lines = body.split('\n');
    return lines
      .map(line => (multi.middle !== undefined ? stripPrefix(line, multi.middle) : line.trim()))
      .map(line => line.trimEnd())
      .join('\n')
      .replace(/^\s*\n/, '')
      .trimEnd();
  }

  const prefix = style.singleLinePrefix;
  if (prefix !== undefined) {
    return block
      .split('\n')
      .map(line => stripPrefix(line, prefix).trimEnd())
      .join('\n');
  }

  return block;
}

/**
 * Finds the comment block that starts on the first non-blank line of `text`.
 * Multi-line delimiters are tried first, since some single-line prefixes
 * (`--`) are also the start of a multi-line delimiter (`--[[`).
 */
export function findCommentBlock(text: string, style: CommentStyle): CommentBlock | null {
  const leading = /^(?:[ \t]*\n)*/.exec(text);
  const start = leading ? leading[0].length : 0;
  const firstLineEnd = lineEnd(text, start);
  const firstLine = text.slice(start, firstLineEnd).trimStart();

  const multi = style.multiLine;
  if (multi && firstLine.startsWith(multi.start)) {
    const openAt = text.indexOf(multi.start, start) + multi.start.length;
    const closeAt = text.indexOf(multi.end, openAt);
    if (closeAt === -1) return null;
    const end = lineEnd(text, closeAt + multi.end.length);
    return { start, end, text: text.slice(start, end) };
  }

  const prefix = style.singleLinePrefix;
  if (prefix !== undefined && firstLine.startsWith(prefix)) {
    let end = firstLineEnd;
    while (end < text.length) {
      const nextStart = end + 1;
      const nextEnd = lineEnd(text, nextStart);
      if (!text.slice(nextStart, nextEnd).trimStart().startsWith(prefix)) break;
      end = nextEnd;
    }
    return { start, end, text: text.slice(start, end) };
  }

  return null;
}

function lineEnd(text: string, from: number): number {
  const newline = text.indexOf('\n', from);
  return newline === -1 ? text.length : newline;
}
