import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { StyleError, TemplateError } from '../errors.js';
import { commentStyleRegistry } from '../comments/registry.js';
import type { CommentStyle } from '../comments/types.js';
import { formatCopyright } from '../extractor/tags.js';
import { parseExpression } from '../spdx/expression.js';
import { renderTemplate } from '../header/template.js';
import { findHeader, mergeCopyrightLines, synthesizeHeader } from '../header/synthesizer.js';
import type { HeaderRequest } from '../header/synthesizer.js';
import { annotateFile, annotateFiles, buildRequest } from '../header/annotate.js';

const JANE = 'SPDX-FileCopyrightText: 2024 Jane Doe';

function style(name: string): CommentStyle {
  const found = commentStyleRegistry.byName(name);
  if (!found) throw new Error(`missing style ${name}`);
  return found;
}

function request(overrides: Partial<HeaderRequest> = {}): HeaderRequest {
  return {
    copyrightLines: [JANE],
    expressions: [parseExpression('MIT')],
    ...overrides,
  };
}

describe('renderTemplate', () => {
  it('expands both placeholders and collapses blank lines', () => {
    const text = renderTemplate(
      '\n\nThis file is part of Demo.\n\n\n{{ copyright_lines }}\n{{license_lines}}\n\n',
      [JANE],
      [parseExpression('MIT OR Apache-2.0')],
    );
    expect(text).toBe(
      'This file is part of Demo.\n\nSPDX-FileCopyrightText: 2024 Jane Doe\nSPDX-License-Identifier: MIT OR Apache-2.0',
    );
  });

  it('fails when requested content does not make it into the header', () => {
    expect(() => renderTemplate('{{ copyright_lines }}', [JANE], [parseExpression('MIT')])).toThrow(TemplateError);
    expect(() => renderTemplate('{{ copyright_lines }}', [JANE], [parseExpression('MIT')])).toThrow(
      'Rendered header is missing: MIT',
    );
    expect(() => renderTemplate('Demo project', [JANE], [])).toThrow(`Rendered header is missing: ${JANE}`);
  });

  it('rejects unknown placeholders', () => {
    expect(() => renderTemplate('{{ year }} {{ copyright_lines }}', [JANE], [])).toThrow(
      "Unknown template placeholder 'year'",
    );
  });
});

describe('mergeCopyrightLines', () => {
  it('collapses the years of one holder into a range', () => {
    expect(mergeCopyrightLines([
      'SPDX-FileCopyrightText: 2019 Jane Doe',
      'SPDX-FileCopyrightText: 2023 Jane Doe',
      'SPDX-FileCopyrightText: 2021 Acme',
    ])).toEqual([
      'SPDX-FileCopyrightText: 2019 - 2023 Jane Doe',
      'SPDX-FileCopyrightText: 2021 Acme',
    ]);
  });

  it('keeps a single year as it is', () => {
    expect(mergeCopyrightLines([JANE, JANE])).toEqual([JANE]);
  });
});

describe('formatCopyright', () => {
  it('builds a tag line from a holder', () => {
    expect(formatCopyright('Jane Doe', 2024)).toBe(JANE);
    expect(formatCopyright('Jane Doe')).toBe('SPDX-FileCopyrightText: Jane Doe');
  });

  it('normalises legacy phrasing', () => {
    expect(formatCopyright('Copyright (c) 2020 Foo Inc.')).toBe('SPDX-FileCopyrightText: 2020 Foo Inc.');
    expect(formatCopyright('© 2021 Bar')).toBe('SPDX-FileCopyrightText: 2021 Bar');
  });
});

describe('synthesizeHeader', () => {
  it('writes a new header above the code', () => {
    expect(synthesizeHeader("print('hi')\n", style('python'), request())).toBe(
      "# SPDX-FileCopyrightText: 2024 Jane Doe\n#\n# SPDX-License-Identifier: MIT\n\nprint('hi')\n",
    );
  });

  it('keeps the shebang on the first line', () => {
    expect(synthesizeHeader('#!/usr/bin/env python3\nprint(1)\n', style('python'), request())).toBe(
      '#!/usr/bin/env python3\n# SPDX-FileCopyrightText: 2024 Jane Doe\n#\n# SPDX-License-Identifier: MIT\n\nprint(1)\n',
    );
  });

  it('writes multi-line comments on request', () => {
    expect(synthesizeHeader('int x;\n', style('c'), request({ form: 'multi' }))).toBe(
      '/*\n * SPDX-FileCopyrightText: 2024 Jane Doe\n *\n * SPDX-License-Identifier: MIT\n */\n\nint x;\n',
    );
  });

  it('is idempotent in replace mode', () => {
    const samples: Array<[string, CommentStyle, HeaderRequest]> = [
      ["print('hi')\n", style('python'), request()],
      ['int x;\n', style('c'), request({ form: 'multi' })],
      ['<p>hi</p>\n', style('html'), request()],
      ['#!/bin/sh\necho\n', style('python'), request({ template: 'Demo.\n\n{{ copyright_lines }}\n{{ license_lines }}' })],
    ];

    for (const [content, commentStyle, req] of samples) {
      const once = synthesizeHeader(content, commentStyle, req);
      expect(synthesizeHeader(once, commentStyle, req)).toBe(once);
    }
  });

  it('keeps old tag lines next to the requested ones', () => {
    const content = '# Copyright (c) 2019 Old Corp\n# SPDX-License-Identifier: GPL-2.0-only\n\ncode\n';
    expect(synthesizeHeader(content, style('python'), request())).toBe(
      '# SPDX-FileCopyrightText: 2019 Old Corp\n' +
      '# SPDX-FileCopyrightText: 2024 Jane Doe\n' +
      '#\n' +
      '# SPDX-License-Identifier: MIT\n' +
      '# SPDX-License-Identifier: GPL-2.0-only\n' +
      '\n' +
      'code\n',
    );
  });

  it('keeps an old license line that does not parse', () => {
    const content = '# SPDX-FileCopyrightText: 2020 Old\n# SPDX-License-Identifier: MIT OR\n\nx = 1\n';
    const replaced = synthesizeHeader(content, style('python'), request({
      copyrightLines: [],
      expressions: [parseExpression('Apache-2.0')],
    }));

    expect(replaced).toBe(
      '# SPDX-FileCopyrightText: 2020 Old\n' +
      '#\n' +
      '# SPDX-License-Identifier: Apache-2.0\n' +
      '# SPDX-License-Identifier: MIT OR\n' +
      '\n' +
      'x = 1\n',
    );
    expect(synthesizeHeader(replaced, style('python'), request({
      copyrightLines: [],
      expressions: [parseExpression('Apache-2.0')],
    }))).toBe(replaced);
  });

  it('merges copyright years when asked', () => {
    const content = '# SPDX-FileCopyrightText: 2020 Jane Doe\n# SPDX-License-Identifier: MIT\n\ncode\n';
    expect(synthesizeHeader(content, style('python'), request({ mergeCopyrights: true }))).toBe(
      '# SPDX-FileCopyrightText: 2020 - 2024 Jane Doe\n#\n# SPDX-License-Identifier: MIT\n\ncode\n',
    );
  });

  it('adds a second block in append mode', () => {
    const content = '# SPDX-FileCopyrightText: 2020 Old\n# SPDX-License-Identifier: MIT\n\ncode\n';
    const appended = synthesizeHeader(content, style('python'), request({
      mode: 'append',
      expressions: [parseExpression('Apache-2.0')],
    }));
    expect(appended).toBe(
      '# SPDX-FileCopyrightText: 2020 Old\n# SPDX-License-Identifier: MIT\n\n' +
      '# SPDX-FileCopyrightText: 2024 Jane Doe\n#\n# SPDX-License-Identifier: Apache-2.0\n\ncode\n',
    );
  });

  it('leaves tagged content alone with skipExisting', () => {
    const content = '// SPDX-License-Identifier: Apache-2.0\nint x;\n';
    expect(synthesizeHeader(content, style('c'), request({ skipExisting: true }))).toBe(content);
  });

  it('writes plain text for a sidecar', () => {
    expect(synthesizeHeader('', null, request())).toBe(
      'SPDX-FileCopyrightText: 2024 Jane Doe\n\nSPDX-License-Identifier: MIT\n',
    );
  });

  it('ignores a leading comment without tags', () => {
    const content = '# just a note\ncode\n';
    expect(findHeader(content, style('python'))).toBeNull();
    expect(synthesizeHeader(content, style('python'), request())).toBe(
      '# SPDX-FileCopyrightText: 2024 Jane Doe\n#\n# SPDX-License-Identifier: MIT\n\n# just a note\ncode\n',
    );
  });
});

describe('annotateFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'spdx-lint-annotate-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('requires something to write', () => {
    expect(() => buildRequest({})).toThrow('Nothing to write: give at least one copyright or license');
  });

  it('writes the header once and then reports the file unchanged', async () => {
    const path = join(dir, 'tool.py');
    await writeFile(path, "print('hi')\n");
    const options = { copyrights: ['Jane Doe'], year: 2024, licenses: ['MIT'] };

    const first = await annotateFile(path, options);
    expect(first).toEqual({ path, target: path, action: 'updated', sidecar: false });
    expect(await readFile(path, 'utf-8')).toBe(
      "# SPDX-FileCopyrightText: 2024 Jane Doe\n#\n# SPDX-License-Identifier: MIT\n\nprint('hi')\n",
    );

    const second = await annotateFile(path, options);
    expect(second.action).toBe('unchanged');
  });

  it('writes a sidecar for binary files', async () => {
    const path = join(dir, 'image.png');
    const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x01]);
    await writeFile(path, bytes);

    const result = await annotateFile(path, { copyrights: [JANE], licenses: ['MIT'] });
    expect(result).toEqual({ path, target: `${path}.license`, action: 'updated', sidecar: true });
    expect(await readFile(`${path}.license`, 'utf-8')).toBe(
      'SPDX-FileCopyrightText: 2024 Jane Doe\n\nSPDX-License-Identifier: MIT\n',
    );
    expect(Buffer.compare(await readFile(path), bytes)).toBe(0);
  });

  it('falls back to a sidecar for file types without comments', async () => {
    const path = join(dir, 'data.json');
    await writeFile(path, '{}\n');

    await expect(annotateFile(path, { licenses: ['MIT'] })).rejects.toThrow(StyleError);

    const result = await annotateFile(path, { licenses: ['MIT'], fallbackSidecar: true });
    expect(result.target).toBe(`${path}.license`);
    expect(await readFile(path, 'utf-8')).toBe('{}\n');
    expect(await readFile(`${path}.license`, 'utf-8')).toBe('SPDX-License-Identifier: MIT\n');
  });

  it('fails only the file whose template loses content', async () => {
    const path = join(dir, 'tool.py');
    await writeFile(path, 'code\n');

    const result = await annotateFile(path, {
      copyrights: [JANE],
      licenses: ['MIT'],
      template: '{{ copyright_lines }}',
    });
    expect(result).toEqual({
      path,
      target: path,
      action: 'failed',
      sidecar: false,
      message: 'Rendered header is missing: MIT',
    });
    expect(await readFile(path, 'utf-8')).toBe('code\n');
  });
});

describe('annotateFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'spdx-lint-annotate-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('skips a file whose style lacks the forced form and carries on', async () => {
    const css = join(dir, 'style.css');
    const py = join(dir, 'tool.py');
    await writeFile(css, 'body {}\n');
    await writeFile(py, 'code\n');

    const results = await annotateFiles([css, py], {
      copyrights: [JANE],
      licenses: ['MIT'],
      form: 'single',
      skipUnrecognised: true,
    });

    expect(results.map(result => result.action)).toEqual(['skipped', 'updated']);
    expect(results[0].message).toBe("Comment style 'css' has no single-line form");
    expect(await readFile(css, 'utf-8')).toBe('body {}\n');
    expect(await readFile(py, 'utf-8')).toBe(
      '# SPDX-FileCopyrightText: 2024 Jane Doe\n#\n# SPDX-License-Identifier: MIT\n\ncode\n',
    );
  });

  it('aborts on an unsupported form unless skipping is enabled', async () => {
    const css = join(dir, 'style.css');
    await writeFile(css, 'body {}\n');

    await expect(annotateFiles([css], { licenses: ['MIT'], form: 'single' })).rejects.toThrow(
      "Comment style 'css' has no single-line form",
    );
    expect(existsSync(`${css}.license`)).toBe(false);
  });
});
