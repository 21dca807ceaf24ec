import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { annotateFiles } from '../header/annotate.js';
import type { AnnotateResult } from '../header/annotate.js';
import type { Tool } from './index.js';
import { errorResult, parseArgs, textResult } from './utils.js';

const argsSchema = z.object({
  root: z.string().optional(),
  paths: z.array(z.string().min(1)).min(1),
  copyrights: z.array(z.string().min(1)).optional(),
  year: z.union([z.string(), z.number().int()]).optional(),
  licenses: z.array(z.string().min(1)).optional(),
  template: z.string().optional(),
  templateIsCommented: z.boolean().optional(),
  mode: z.enum(['replace', 'append']).optional(),
  mergeCopyrights: z.boolean().optional(),
  skipExisting: z.boolean().optional(),
  style: z.string().optional(),
  form: z.enum(['single', 'multi']).optional(),
  sidecar: z.enum(['auto', 'always']).optional(),
  fallbackSidecar: z.boolean().optional(),
  skipUnrecognised: z.boolean().optional(),
});

function describe(result: AnnotateResult): string {
  const target = result.sidecar ? ` -> ${result.target}` : '';
  const message = result.message ? `: ${result.message}` : '';
  return `- ${result.path}${target} [${result.action}]${message}`;
}

export const annotateFilesTool: Tool = {
  name: 'annotate_files',
  description: `Write SPDX copyright and license tags into file headers.

Uses the comment syntax of each file type. Binary files, files that already have a <file>.license sidecar, and (with fallbackSidecar) files that cannot hold comments get the tags in a sidecar instead.`,
  inputSchema: {
    type: 'object',
    properties: {
      root: { type: 'string', description: 'Directory relative paths are resolved against' },
      paths: { type: 'array', items: { type: 'string' }, description: 'Files to annotate' },
      copyrights: { type: 'array', items: { type: 'string' }, description: 'Copyright holders or complete copyright statements' },
      year: { type: ['string', 'number'], description: 'Year or year range to put before each holder' },
      licenses: { type: 'array', items: { type: 'string' }, description: 'SPDX license expressions' },
      template: { type: 'string', description: 'Header template with {{ copyright_lines }} and {{ license_lines }}' },
      templateIsCommented: { type: 'boolean', description: 'The template already contains comment syntax' },
      mode: { type: 'string', enum: ['replace', 'append'], description: 'Merge into the existing header or add a second one' },
      mergeCopyrights: { type: 'boolean', description: 'Collapse lines of the same holder into one year range' },
      skipExisting: { type: 'boolean', description: 'Leave files that already carry tags alone' },
      style: { type: 'string', description: 'Comment style to use instead of the detected one' },
      form: { type: 'string', enum: ['single', 'multi'], description: 'Force single-line or multi-line comments' },
      sidecar: { type: 'string', enum: ['auto', 'always'], description: 'Always write <file>.license' },
      fallbackSidecar: { type: 'boolean', description: 'Use a sidecar for file types without comments' },
      skipUnrecognised: { type: 'boolean', description: 'Skip files with an unknown comment style' },
    },
    required: ['paths'],
  },
  handler: async (args) => {
    try {
      const { root, paths, ...options } = parseArgs(argsSchema, args);
      const base = root ?? process.cwd();
      const absolute = paths.map(path => (isAbsolute(path) ? path : resolve(base, path)));

      const results = await annotateFiles(absolute, options);
      const updated = results.filter(result => result.action === 'updated').length;

      return textResult([
        `Annotated ${updated} of ${results.length} files:`,
        ...results.map(describe),
      ].join('\n'));
    } catch (error) {
      return errorResult('Error annotating files', error);
    }
  },
};
