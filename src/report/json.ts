import { TOOL_VERSION } from '../version.js';
import type { ComplianceReport } from './types.js';

export function formatJson(report: ComplianceReport): string {
  return `${JSON.stringify({ lintVersion: TOOL_VERSION, ...report }, null, 2)}\n`;
}
