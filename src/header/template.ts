import { TemplateError } from '../errors.js';
import { extractTags, matchCopyright, LICENSE_TAG } from '../extractor/tags.js';
import { containsExpression, renderExpression } from '../spdx/expression.js';
import type { LicenseExpression } from '../spdx/expression.js';

export const DEFAULT_TEMPLATE = '{{ copyright_lines }}\n\n{{ license_lines }}';

const PLACEHOLDER = /\{\{\s*([A-Za-z_]+)\s*\}\}/g;

type Placeholder = 'copyright_lines' | 'license_lines';

function isPlaceholder(name: string): name is Placeholder {
  return name === 'copyright_lines' || name === 'license_lines';
}

function normalizeBlankLines(text: string): string {
  const out: string[] = [];
  for (const line of text.split('\n').map(l => l.trimEnd())) {
    if (line === '' && (out.length === 0 || out[out.length - 1] === '')) continue;
    out.push(line);
  }
  while (out.length > 0 && out[out.length - 1] === '') out.pop();
  return out.join('\n');
}

/**
 * Renders a header template. Only `{{ copyright_lines }}` and
 * `{{ license_lines }}` exist; each expands to one tag line per entry.
 * `rawLicenses` are license values that do not parse; they follow the
 * expressions verbatim. Runs of blank lines collapse to one and outer blank
 * lines are dropped.
 */
export function renderTemplate(
  template: string,
  copyrightLines: readonly string[],
  expressions: readonly LicenseExpression[],
  rawLicenses: readonly string[] = [],
): string {
  const licenseValues = [...expressions.map(renderExpression), ...rawLicenses];
  const values: Record<Placeholder, string> = {
    copyright_lines: copyrightLines.join('\n'),
    license_lines: licenseValues.map(value => `${LICENSE_TAG} ${value}`).join('\n'),
  };

  const rendered = template.replace(PLACEHOLDER, (_match, name: string) => {
    if (!isPlaceholder(name)) {
      throw new TemplateError(`Unknown template placeholder '${name}'`);
    }
    return values[name];
  });

  const text = normalizeBlankLines(rendered);
  const found = extractTags(text);

  const missingCopyright = copyrightLines.filter(line => !found.copyrightLines.includes(matchCopyright(line) ?? line));
  const missingLicense = expressions.filter(e => !containsExpression(found.expressions, e));
  if (missingCopyright.length > 0 || missingLicense.length > 0) {
    const missing = [...missingCopyright, ...missingLicense.map(renderExpression)];
    throw new TemplateError(`Rendered header is missing: ${missing.join(', ')}`);
  }

  return text;
}
