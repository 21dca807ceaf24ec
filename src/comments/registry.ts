import { readFileSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { StyleError } from '../errors.js';
import type { CommentForm, CommentStyle, MultiLineDelimiters } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

type RuleKind = 'filename' | 'extension' | 'interpreter';

export interface StyleRule {
  kind: RuleKind;
  pattern: string;
  style: CommentStyle | null;
}

export interface ResolveOptions {
  style?: string;
  form?: CommentForm;
}

interface RawStyle {
  singleLine?: unknown;
  multiLine?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringMap(value: unknown, section: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new Error(`comment-styles.json: '${section}' must be an object`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new Error(`comment-styles.json: '${section}.${key}' must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function readMultiLine(name: string, value: unknown): MultiLineDelimiters | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value) || typeof value.start !== 'string' || typeof value.end !== 'string') {
    throw new Error(`comment-styles.json: style '${name}' has malformed multiLine delimiters`);
  }
  return Object.freeze({
    start: value.start,
    middle: typeof value.middle === 'string' ? value.middle : undefined,
    end: value.end,
    indent: typeof value.indent === 'string' ? value.indent : '',
  });
}

function readStyle(name: string, raw: RawStyle): CommentStyle {
  const singleLinePrefix = typeof raw.singleLine === 'string' ? raw.singleLine : undefined;
  const multiLine = readMultiLine(name, raw.multiLine);
  if (!singleLinePrefix && !multiLine) {
    throw new Error(`comment-styles.json: style '${name}' declares no comment form`);
  }
  return Object.freeze({ name, singleLinePrefix, multiLine });
}

/**
 * Maps file names to comment styles through an ordered rule table: exact
 * file name, then extension (longest compound suffix first), then the
 * interpreter named on a shebang line. First match wins.
 */
export class CommentStyleRegistry {
  private readonly styles: ReadonlyMap<string, CommentStyle>;
  private readonly rules: readonly StyleRule[];

  constructor(tablePath: string = resolve(__dirname, '../../data/comment-styles.json')) {
    const raw: unknown = JSON.parse(readFileSync(tablePath, 'utf-8'));
    if (!isRecord(raw) || !isRecord(raw.styles)) {
      throw new Error(`Malformed comment style table: ${tablePath}`);
    }

    const styles = new Map<string, CommentStyle>();
    for (const [name, style] of Object.entries(raw.styles)) {
      if (!isRecord(style)) {
        throw new Error(`comment-styles.json: style '${name}' must be an object`);
      }
      styles.set(name, readStyle(name, style));
    }
    this.styles = styles;

    const styleFor = (name: string): CommentStyle => {
      const style = styles.get(name);
      if (!style) {
        throw new Error(`comment-styles.json: unknown style '${name}'`);
      }
      return style;
    };

    const rules: StyleRule[] = [];
    for (const [pattern, name] of Object.entries(readStringMap(raw.filenames, 'filenames'))) {
      rules.push({ kind: 'filename', pattern, style: styleFor(name) });
    }
    for (const [pattern, name] of Object.entries(readStringMap(raw.extensions, 'extensions'))) {
      rules.push({ kind: 'extension', pattern: pattern.toLowerCase(), style: styleFor(name) });
    }
    const uncommentable = Array.isArray(raw.uncommentable) ? raw.uncommentable : [];
    for (const pattern of uncommentable) {
      if (typeof pattern === 'string') {
        rules.push({ kind: 'extension', pattern: pattern.toLowerCase(), style: null });
      }
    }
    for (const [pattern, name] of Object.entries(readStringMap(raw.interpreters, 'interpreters'))) {
      rules.push({ kind: 'interpreter', pattern, style: styleFor(name) });
    }
    this.rules = Object.freeze(rules);
  }

  lookup(filename: string, content?: string): CommentStyle | null {
    const match = this.match(filename, content);
    return match ? match.style : null;
  }

  /** True when the file type is known and explicitly takes no comments (JSON, images). */
  isUncommentable(filename: string): boolean {
    const match = this.match(filename);
    return match !== undefined && match.style === null;
  }

  byName(name: string): CommentStyle | undefined {
    return this.styles.get(name);
  }

  /** All multi-line end delimiters, longest first. */
  endMarkers(): string[] {
    const markers = new Set<string>();
    for (const style of this.styles.values()) {
      if (style.multiLine) markers.add(style.multiLine.end);
    }
    return Array.from(markers).sort((a, b) => b.length - a.length);
  }

  resolve(filename: string, content: string | undefined, options: ResolveOptions = {}): CommentStyle {
    let style: CommentStyle | null | undefined;

    if (options.style) {
      style = this.byName(options.style);
      if (!style) {
        throw new StyleError(filename, `Unknown comment style '${options.style}'`);
      }
    } else {
      style = this.lookup(filename, content);
      if (!style) {
        throw new StyleError(filename, `Could not determine a comment style for ${filename}`);
      }
    }

    if (options.form === 'single' && !supportsSingleLine(style)) {
      throw new StyleError(filename, `Comment style '${style.name}' has no single-line form`);
    }
    if (options.form === 'multi' && !supportsMultiLine(style)) {
      throw new StyleError(filename, `Comment style '${style.name}' has no multi-line form`);
    }

    return style;
  }

  private match(filename: string, content?: string): StyleRule | undefined {
    const name = basename(filename);

    const byFilename = this.rules.find(rule => rule.kind === 'filename' && rule.pattern === name);
    if (byFilename) return byFilename;

    for (const suffix of extensionCandidates(name)) {
      const byExtension = this.rules.find(rule => rule.kind === 'extension' && rule.pattern === suffix);
      if (byExtension) return byExtension;
    }

    if (content !== undefined) {
      const interpreter = shebangInterpreter(content);
      if (interpreter) {
        const candidates = [interpreter, interpreter.replace(/[\d.]+$/, '')];
        for (const candidate of candidates) {
          const byInterpreter = this.rules.find(rule => rule.kind === 'interpreter' && rule.pattern === candidate);
          if (byInterpreter) return byInterpreter;
        }
      }
    }

    return undefined;
  }
}

/** `a.d.ts` yields `.d.ts` then `.ts`. Leading dots of hidden files are not extensions. */
export function extensionCandidates(name: string): string[] {
  const lower = name.toLowerCase();
  const candidates: string[] = [];
  for (let i = 1; i < lower.length; i++) {
    if (lower[i] === '.') {
      candidates.push(lower.slice(i));
    }
  }
  return candidates;
}

export function shebangInterpreter(content: string): string | undefined {
  const firstLine = content.split('\n', 1)[0];
  const match = /^#!\s*(\S+)(.*)$/.exec(firstLine);
  if (!match) return undefined;

  const program = basename(match[1]);
  if (program !== 'env') return program;

  const argument = match[2].trim().split(/\s+/).find(part => part.length > 0 && !part.startsWith('-'));
  return argument ? basename(argument) : undefined;
}

export function supportsSingleLine(style: CommentStyle): boolean {
  return style.singleLinePrefix !== undefined;
}

export function supportsMultiLine(style: CommentStyle): boolean {
  return style.multiLine !== undefined;
}

export const commentStyleRegistry = new CommentStyleRegistry();
