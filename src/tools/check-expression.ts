import { z } from 'zod';
import { ParseError } from '../errors.js';
import { parseExpression, renderExpression, validateExpression } from '../spdx/expression.js';
import type { Tool } from './index.js';
import { errorResult, parseArgs, textResult } from './utils.js';

const argsSchema = z.object({
  expression: z.string(),
});

export const checkExpression: Tool = {
  name: 'check_expression',
  description: 'Parse an SPDX license expression and classify each identifier as current, deprecated, project-local or bad.',
  inputSchema: {
    type: 'object',
    properties: {
      expression: { type: 'string', description: 'License expression, e.g. "GPL-2.0-or-later WITH Classpath-exception-2.0 OR MIT"' },
    },
    required: ['expression'],
  },
  handler: async (args) => {
    try {
      const { expression } = parseArgs(argsSchema, args);
      const parsed = parseExpression(expression);
      const symbols = validateExpression(parsed);
      const valid = symbols.every(symbol => symbol.class !== 'bad');

      const lines = [
        `Expression: ${renderExpression(parsed)}`,
        `Valid: ${valid ? 'yes' : 'no'}`,
        '',
        ...symbols.map(symbol => `- ${symbol.id} (${symbol.role}): ${symbol.class}`),
      ];
      return textResult(lines.join('\n'));
    } catch (error) {
      if (error instanceof ParseError) {
        return errorResult(`Invalid expression at position ${error.position}`, error);
      }
      return errorResult('Error checking expression', error);
    }
  },
};
