import { describe, it, expect, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import { rm } from 'node:fs/promises';
import { formatBom, formatJson, formatPlain, generateReport, spdxFileId } from '../report/index.js';
import { collectUsedLicenses } from '../indexer/index.js';
import { splitLicenseFileName } from '../indexer/licenses.js';
import { lint, lintProject } from '../lint.js';
import type { OutputStream } from '../lint.js';
import type { FileMetadata } from '../extractor/types.js';
import type { CoverageConflict, DeclaredLicense, ProjectIndex } from '../indexer/types.js';
import { createProject, header, metadata } from './fixtures.js';

function declared(path: string, text?: string): DeclaredLicense {
  const { id, extension } = splitLicenseFileName(path.slice('LICENSES/'.length));
  return { id, extension, path, text };
}

function projectIndex(
  files: FileMetadata[],
  licenses: DeclaredLicense[],
  coverageConflicts: CoverageConflict[] = [],
  licenseReadErrors: Map<string, string[]> = new Map(),
): ProjectIndex {
  return {
    root: '/tmp/demo-project',
    files: new Map(files.map(file => [file.path, file])),
    declaredLicenses: new Map(licenses.map(license => [license.id, license])),
    licensesWithoutExtension: licenses.filter(license => !license.extension).map(license => license.path),
    licenseReadErrors,
    usedLicenses: collectUsedLicenses(files),
    coverageConflicts,
  };
}

function collect(): OutputStream & { chunks: string[] } {
  const chunks: string[] = [];
  return {
    chunks,
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
  };
}

const untaggedFile = projectIndex(
  [metadata('x.py', ['SPDX-FileCopyrightText: 2024 Jane Doe'], ['MIT']), metadata('y.py')],
  [declared('LICENSES/MIT.txt')],
);

describe('generateReport', () => {
  it('lists files without information', () => {
    const report = generateReport(untaggedFile);

    expect(report.filesWithoutCopyright).toEqual(['y.py']);
    expect(report.filesWithoutLicense).toEqual(['y.py']);
    expect(report.usedLicenses).toEqual(['MIT']);
    expect(report.summary).toEqual({ filesTotal: 2, filesWithCopyright: 1, filesWithLicense: 1, compliant: false });
  });

  it('classifies identifiers by the role they play', () => {
    const report = generateReport(projectIndex(
      [
        metadata('a.py', ['Acme'], ['Foo-1.0 OR MIT']),
        metadata('b.py', ['Acme'], ['MIT WITH Bogus-exception']),
        metadata('c.py', ['Acme'], ['Classpath-exception-2.0']),
        metadata('d.py', ['Acme'], ['LicenseRef-Acme']),
        metadata('e.py', ['Acme'], ['mit']),
        metadata('f.java', ['Acme'], ['GPL-2.0-or-later WITH Classpath-exception-2.0']),
      ],
      [declared('LICENSES/MIT.txt'), declared('LICENSES/GPL-2.0-or-later.txt'), declared('LICENSES/Classpath-exception-2.0.txt')],
    ));

    expect(report.bad).toEqual({
      'Bogus-exception': ['b.py'],
      'Classpath-exception-2.0': ['c.py'],
      'Foo-1.0': ['a.py'],
      mit: ['e.py'],
    });
    expect(report.missing).toEqual({ 'LicenseRef-Acme': ['d.py'] });
    expect(report.unused).toEqual([]);
    expect(report.summary.compliant).toBe(false);
  });

  it('keeps the categories apart', () => {
    const report = generateReport(projectIndex(
      [metadata('a.py', ['Acme'], ['MIT AND Apache-2.0 AND Foo-1.0'])],
      [declared('LICENSES/MIT.txt'), declared('LICENSES/BSD-3-Clause.txt')],
    ));

    expect(report.bad).toEqual({ 'Foo-1.0': ['a.py'] });
    expect(report.missing).toEqual({ 'Apache-2.0': ['a.py'] });
    expect(report.unused).toEqual(['BSD-3-Clause']);

    const bad = Object.keys(report.bad);
    const missing = Object.keys(report.missing);
    expect(bad.filter(id => missing.includes(id) || report.unused.includes(id))).toEqual([]);
    expect(missing.filter(id => report.unused.includes(id))).toEqual([]);
  });

  it('does not fail on warnings alone', () => {
    const report = generateReport(projectIndex(
      [metadata('a.py', ['Acme'], ['MIT'])],
      [declared('LICENSES/MIT.txt'), declared('LICENSES/GPL-2.0')],
      [{ path: 'a.py', field: 'license', annotations: [0, 1] }],
    ));

    expect(report.deprecated).toEqual(['GPL-2.0']);
    expect(report.unused).toEqual(['GPL-2.0']);
    expect(report.licensesWithoutExtension).toEqual(['LICENSES/GPL-2.0']);
    expect(report.coverageConflicts).toHaveLength(1);
    expect(report.summary.compliant).toBe(true);
  });
});

describe('formatPlain', () => {
  it('renders missing information and the verdict', () => {
    expect(formatPlain(generateReport(untaggedFile))).toBe(
      '# MISSING COPYRIGHT AND LICENSING INFORMATION\n' +
      '\n' +
      'The following files have no copyright and licensing information:\n' +
      '* y.py\n' +
      '\n' +
      '# SUMMARY\n' +
      '\n' +
      '* Bad licenses: 0\n' +
      '* Deprecated licenses: 0\n' +
      '* Licenses without file extension: 0\n' +
      '* Missing licenses: 0\n' +
      '* Unused licenses: 0\n' +
      '* Used licenses: MIT\n' +
      '* Read errors: 0\n' +
      '* Coverage conflicts: 0\n' +
      '* Files with copyright information: 1 / 2\n' +
      '* Files with license information: 1 / 2\n' +
      '\n' +
      'The project is not compliant.\n',
    );
  });

  it('renders warnings for a compliant project', () => {
    const report = generateReport(projectIndex(
      [metadata('a.py', ['Acme'], ['MIT'])],
      [declared('LICENSES/MIT.txt'), declared('LICENSES/GPL-2.0')],
    ));

    expect(formatPlain(report)).toBe(
      '# DEPRECATED LICENSES\n' +
      '\n' +
      'The following licenses are deprecated by SPDX:\n' +
      '* GPL-2.0\n' +
      '\n' +
      '# LICENSES WITHOUT FILE EXTENSION\n' +
      '\n' +
      'The following licenses have no file extension:\n' +
      '* LICENSES/GPL-2.0\n' +
      '\n' +
      '# UNUSED LICENSES\n' +
      '\n' +
      'The following licenses are not used:\n' +
      '* GPL-2.0\n' +
      '\n' +
      '# SUMMARY\n' +
      '\n' +
      '* Bad licenses: 0\n' +
      '* Deprecated licenses: GPL-2.0\n' +
      '* Licenses without file extension: GPL-2.0\n' +
      '* Missing licenses: 0\n' +
      '* Unused licenses: GPL-2.0\n' +
      '* Used licenses: MIT\n' +
      '* Read errors: 0\n' +
      '* Coverage conflicts: 0\n' +
      '* Files with copyright information: 1 / 1\n' +
      '* Files with license information: 1 / 1\n' +
      '\n' +
      'The project is compliant.\n',
    );
  });

  it('keeps read errors of any path', () => {
    const report = generateReport(projectIndex(
      [metadata('__proto__', [], [], { readErrors: ['Could not read __proto__: not valid UTF-8'] })],
      [],
    ));

    expect(Object.entries(report.readErrors)).toEqual([
      ['__proto__', ['Could not read __proto__: not valid UTF-8']],
    ]);
  });

  it('adds read errors of license texts', () => {
    const report = generateReport(projectIndex(
      [metadata('x.py', ['SPDX-FileCopyrightText: 2024 Jane Doe'], ['LicenseRef-Acme'])],
      [declared('LICENSES/LicenseRef-Acme.txt')],
      [],
      new Map([['LICENSES/LicenseRef-Acme.txt', ['Could not read LICENSES/LicenseRef-Acme.txt: EACCES']]]),
    ));

    expect(report.readErrors).toEqual({
      'LICENSES/LicenseRef-Acme.txt': ['Could not read LICENSES/LicenseRef-Acme.txt: EACCES'],
    });
    expect(report.missing).toEqual({});
  });

  it('renders read errors and coverage conflicts', () => {
    const report = generateReport(projectIndex(
      [metadata('bad.txt', [], [], { readErrors: ['Could not read bad.txt: not valid UTF-8'] })],
      [],
      [{ path: 'bad.txt', field: 'license', annotations: [0, 2] }],
    ));
    const lines = formatPlain(report).split('\n');

    expect(lines.slice(5, 15)).toEqual([
      '# READ ERRORS',
      '',
      'Could not read:',
      '* bad.txt: Could not read bad.txt: not valid UTF-8',
      '',
      '# COVERAGE CONFLICTS',
      '',
      'The following files match coverage annotations that disagree:',
      '* bad.txt (license: annotations 0, 2)',
      '',
    ]);
    expect(lines).toContain('* Read errors: 1');
    expect(lines).toContain('* Coverage conflicts: 1');
  });

  it('groups bad licenses by identifier', () => {
    const report = generateReport(projectIndex(
      [metadata('a.py', ['Acme'], ['Foo-1.0']), metadata('b.py', ['Acme'], ['Foo-1.0 OR Bar'])],
      [],
    ));
    const lines = formatPlain(report).split('\n');

    expect(lines.slice(0, 10)).toEqual([
      '# BAD LICENSES',
      '',
      "'Bar' found in:",
      '* b.py',
      '',
      "'Foo-1.0' found in:",
      '* a.py',
      '* b.py',
      '',
      '# SUMMARY',
    ]);
  });
});

describe('formatJson', () => {
  it('writes the report with the tool version', () => {
    const parsed: unknown = JSON.parse(formatJson(generateReport(untaggedFile)));

    expect(parsed).toMatchObject({
      lintVersion: '0.1.0',
      filesWithoutLicense: ['y.py'],
      usedLicenses: ['MIT'],
      summary: { compliant: false, filesTotal: 2 },
    });
  });
});

describe('formatBom', () => {
  function md5(text: string): string {
    return createHash('md5').update(text).digest('hex');
  }

  const index = projectIndex(
    [
      metadata(
        'src/b.py',
        ['SPDX-FileCopyrightText: 2024 Jane Doe', 'SPDX-FileCopyrightText: 2020 Acme'],
        ['MIT OR LicenseRef-Acme', 'LicenseRef-Acme AND GPL-2.0-or-later WITH Classpath-exception-2.0'],
        { checksum: 'abc123' },
      ),
      metadata('README.md'),
    ],
    [
      declared('LICENSES/MIT.txt'),
      declared('LICENSES/LicenseRef-Acme.txt', 'Acme terms\n'),
      declared('LICENSES/LicenseRef-Unused.txt', 'Unused terms\n'),
    ],
  );

  it('names files by a hash of their path', () => {
    expect(spdxFileId('README.md')).toBe(`SPDXRef-${md5('README.md')}`);
  });

  it('describes every file and the local licenses in use', () => {
    const bom = formatBom(index, {
      created: '2024-01-02T03:04:05Z',
      namespace: 'http://example.com/spdx/demo',
    });

    expect(bom).toBe([
      'SPDXVersion: SPDX-2.1',
      'DataLicense: CC0-1.0',
      'SPDXID: SPDXRef-DOCUMENT',
      'DocumentName: demo-project',
      'DocumentNamespace: http://example.com/spdx/demo',
      'Creator: Person: Anonymous ()',
      'Creator: Organization: Anonymous ()',
      'Creator: Tool: spdx-lint-0.1.0',
      'Created: 2024-01-02T03:04:05Z',
      'CreatorComment: <text>This document was created automatically from the copyright and license information found by spdx-lint.</text>',
      `Relationship: SPDXRef-DOCUMENT describes SPDXRef-${md5('README.md')}`,
      `Relationship: SPDXRef-DOCUMENT describes SPDXRef-${md5('src/b.py')}`,
      '',
      'FileName: ./README.md',
      `SPDXID: SPDXRef-${md5('README.md')}`,
      'LicenseConcluded: NOASSERTION',
      'LicenseInfoInFile: NONE',
      'FileCopyrightText: NONE',
      '',
      'FileName: ./src/b.py',
      `SPDXID: SPDXRef-${md5('src/b.py')}`,
      'FileChecksum: SHA1: abc123',
      'LicenseConcluded: NOASSERTION',
      'LicenseInfoInFile: GPL-2.0-or-later',
      'LicenseInfoInFile: LicenseRef-Acme',
      'LicenseInfoInFile: MIT',
      'FileCopyrightText: <text>SPDX-FileCopyrightText: 2020 Acme\nSPDX-FileCopyrightText: 2024 Jane Doe</text>',
      '',
      'LicenseID: LicenseRef-Acme',
      'ExtractedText: <text>Acme terms\n</text>',
      '',
    ].join('\n'));
  });

  it('fills in a timestamp and a unique namespace', () => {
    const lines = formatBom(index).split('\n');

    expect(lines[4]).toMatch(/^DocumentNamespace: http:\/\/spdx\.org\/spdxdocs\/spdx-v2\.1-[0-9a-f-]{36}$/);
    expect(lines[8]).toMatch(/^Created: \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('names the creator when given', () => {
    const lines = formatBom(index, { creatorPerson: 'Jane Doe', creatorOrganization: 'Acme' }).split('\n');

    expect(lines[5]).toBe('Creator: Person: Jane Doe');
    expect(lines[6]).toBe('Creator: Organization: Acme');
  });
});

describe('lint', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) await rm(root, { recursive: true, force: true });
    root = undefined;
  });

  it('writes the report and returns the verdict', () => {
    const out = collect();
    const report = generateReport(untaggedFile);

    expect(lint(report, formatPlain, out)).toBe(false);
    expect(out.chunks).toEqual([formatPlain(report)]);
  });

  it('lints a project on disk', async () => {
    root = await createProject({
      'LICENSES/MIT.txt': 'MIT license text\n',
      'x.py': header('2024 Jane Doe', 'MIT'),
    });
    const out = collect();

    expect(await lintProject(root, 'json', out, { git: false })).toBe(true);
    expect(JSON.parse(out.chunks.join(''))).toMatchObject({ summary: { compliant: true, filesTotal: 1 } });
  });

  it('writes a bill of materials with checksums', async () => {
    const content = header('2024 Jane Doe', 'MIT');
    root = await createProject({
      'LICENSES/MIT.txt': 'MIT license text\n',
      'x.py': content,
    });
    const out = collect();

    expect(await lintProject(root, 'bom', out, { git: false })).toBe(true);
    const lines = out.chunks.join('').split('\n');
    expect(lines[0]).toBe('SPDXVersion: SPDX-2.1');
    expect(lines).toContain(`FileChecksum: SHA1: ${createHash('sha1').update(content).digest('hex')}`);
    expect(lines).toContain('LicenseInfoInFile: MIT');
  });
});
