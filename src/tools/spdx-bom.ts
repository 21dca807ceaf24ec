import { z } from 'zod';
import { indexer } from '../indexer/index.js';
import { formatBom } from '../report/bom.js';
import type { Tool } from './index.js';
import { errorResult, parseArgs, textResult } from './utils.js';

const argsSchema = z.object({
  path: z.string().min(1),
  exclude: z.array(z.string()).optional(),
  git: z.boolean().optional(),
  creatorPerson: z.string().optional(),
  creatorOrganization: z.string().optional(),
});

export const spdxBom: Tool = {
  name: 'spdx_bom',
  description: 'Produce an SPDX 2.1 tag-value bill of materials listing every file of a project with its copyright and license information.',
  inputSchema: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Project root path' },
      exclude: { type: 'array', items: { type: 'string' }, description: 'Glob patterns of files to leave out' },
      git: { type: 'boolean', description: 'Apply git ignore rules' },
      creatorPerson: { type: 'string', description: 'Creator: Person field, e.g. "Jane Doe (jane@example.com)"' },
      creatorOrganization: { type: 'string', description: 'Creator: Organization field' },
    },
    required: ['path'],
  },
  handler: async (args) => {
    try {
      const { path, exclude, git, creatorPerson, creatorOrganization } = parseArgs(argsSchema, args);
      const index = await indexer.indexProject(path, { exclude, git, checksum: true });
      return textResult(formatBom(index, { creatorPerson, creatorOrganization }));
    } catch (error) {
      return errorResult('Error building bill of materials', error);
    }
  },
};
