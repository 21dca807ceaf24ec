import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { lintProjectTool } from './lint-project.js';
import { spdxBom } from './spdx-bom.js';
import { annotateFilesTool } from './annotate-files.js';
import { checkExpression } from './check-expression.js';

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
}

export interface Tool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: (args: unknown) => Promise<CallToolResult>;
}

export const tools: Tool[] = [
  lintProjectTool,
  spdxBom,
  annotateFilesTool,
  checkExpression,
];

export {
  lintProjectTool,
  spdxBom,
  annotateFilesTool,
  checkExpression,
};
