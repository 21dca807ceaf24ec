import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { ComplianceReport } from '../report/types.js';

export function textResult(text: string): CallToolResult {
  return {
    content: [{ type: 'text', text }],
  };
}

export function errorResult(context: string, error: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: `${context}: ${error instanceof Error ? error.message : String(error)}` }],
    isError: true,
  };
}

/** Validates tool arguments, naming every offending field in the error. */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid arguments: ${issues}`);
  }
  return parsed.data;
}

export interface CachedReport {
  root: string;
  generatedAt: string;
  report: ComplianceReport;
}

// The most recent lint result, served as a resource
let lastReport: CachedReport | null = null;

export function rememberReport(root: string, report: ComplianceReport): void {
  lastReport = { root, generatedAt: new Date().toISOString(), report };
}

export function getLastReport(): CachedReport | null {
  return lastReport;
}
