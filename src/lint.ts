import { formatBom } from './report/bom.js';
import { formatJson } from './report/json.js';
import { formatPlain } from './report/plain.js';
import { generateReport } from './report/report.js';
import { indexer } from './indexer/index.js';
import type { IndexOptions } from './indexer/index.js';
import type { ComplianceReport, ReportFormatter } from './report/types.js';
import type { Config } from './config.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export type ReportFormat = Config['report']['format'];

export const formatters: Record<Exclude<ReportFormat, 'bom'>, ReportFormatter> = {
  plain: formatPlain,
  json: formatJson,
};

/** Writes the formatted report and returns the verdict. */
export function lint(
  report: ComplianceReport,
  formatter: ReportFormatter = formatPlain,
  out: OutputStream = process.stdout,
): boolean {
  out.write(formatter(report));
  return report.summary.compliant;
}

/**
 * Indexes a project and writes the chosen rendering. The bill of materials
 * is written in place of the report; the verdict is returned either way.
 */
export async function lintProject(
  root: string,
  format: ReportFormat,
  out: OutputStream = process.stdout,
  options: IndexOptions = {},
): Promise<boolean> {
  const index = await indexer.indexProject(root, format === 'bom' ? { checksum: true, ...options } : options);
  const report = generateReport(index);

  if (format === 'bom') {
    out.write(formatBom(index));
    return report.summary.compliant;
  }
  return lint(report, formatters[format], out);
}
