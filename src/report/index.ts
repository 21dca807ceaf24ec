export { generateReport, isCompliant } from './report.js';
export { formatPlain } from './plain.js';
export { formatJson } from './json.js';
export { formatBom, spdxFileId } from './bom.js';
export type { BomOptions } from './bom.js';
export type { ComplianceReport, ReportFormatter, ReportSummary } from './types.js';
