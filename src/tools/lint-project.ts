import { z } from 'zod';
import { indexer } from '../indexer/index.js';
import { generateReport } from '../report/report.js';
import { formatJson } from '../report/json.js';
import { formatPlain } from '../report/plain.js';
import type { Tool } from './index.js';
import { errorResult, parseArgs, rememberReport, textResult } from './utils.js';

const argsSchema = z.object({
  path: z.string().min(1),
  format: z.enum(['plain', 'json']).default('plain'),
  exclude: z.array(z.string()).optional(),
  git: z.boolean().optional(),
  includeSubmodules: z.boolean().optional(),
  includeMesonSubprojects: z.boolean().optional(),
});

export const lintProjectTool: Tool = {
  name: 'lint_project',
  description: `Check a project for copyright and license compliance.

Every file must carry an SPDX-FileCopyrightText and an SPDX-License-Identifier tag (in its header, a <file>.license sidecar, or the coverage declaration), every license used must have its text in LICENSES/, and every text there must be used. Returns the categorised findings and the verdict.`,
  inputSchema: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Project root path' },
      format: { type: 'string', enum: ['plain', 'json'], description: 'Report format', default: 'plain' },
      exclude: { type: 'array', items: { type: 'string' }, description: 'Glob patterns of files to leave out' },
      git: { type: 'boolean', description: 'Apply git ignore rules' },
      includeSubmodules: { type: 'boolean', description: 'Lint files inside git submodules' },
      includeMesonSubprojects: { type: 'boolean', description: 'Lint checked-out meson subprojects' },
    },
    required: ['path'],
  },
  handler: async (args) => {
    try {
      const { path, format, ...scanOptions } = parseArgs(argsSchema, args);
      const index = await indexer.indexProject(path, scanOptions);
      const report = generateReport(index);
      rememberReport(index.root, report);

      return textResult(format === 'json' ? formatJson(report) : formatPlain(report));
    } catch (error) {
      return errorResult('Error linting project', error);
    }
  },
};
