import fastGlob from 'fast-glob';
const { glob, escapePath } = fastGlob;
import { access } from 'node:fs/promises';
import { join } from 'node:path';
import micromatch from 'micromatch';
import { config } from '../config.js';
import { gitIgnore } from '../git/ignore.js';
import { SIDECAR_SUFFIX } from '../extractor/metadata.js';
import { LICENSES_DIRECTORY } from './licenses.js';
import { COVERAGE_FILE } from './coverage.js';

export interface ScanOptions {
  exclude?: string[];
  /** Apply git's ignore rules. */
  git?: boolean;
  includeSubmodules?: boolean;
  includeMesonSubprojects?: boolean;
  coverageFile?: string;
}

const VCS_DIRECTORIES = ['.git', '.hg', '.sl', '.svn'];

function isUnder(path: string, directory: string): boolean {
  return path.startsWith(`${directory}/`);
}

function isInSubproject(path: string): boolean {
  return isUnder(path, 'subprojects') && path.indexOf('/', 'subprojects/'.length) !== -1;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class FileScanner {
  /**
   * Lists the files under `root` that must carry copyright and license
   * information, as sorted root-relative paths.
   */
  async scan(root: string, options: ScanOptions = {}): Promise<string[]> {
    const {
      exclude = config.scanner.exclude,
      git = config.git.enabled,
      includeSubmodules = config.git.includeSubmodules,
      includeMesonSubprojects = config.git.includeMesonSubprojects,
      coverageFile = COVERAGE_FILE,
    } = options;

    const { ignored, submodules } = git
      ? await gitIgnore.getIgnoreInfo(root)
      : { ignored: [], submodules: [] };

    const skippedDirectories = [
      ...ignored.filter(p => p.endsWith('/')).map(p => p.slice(0, -1)),
      ...(includeSubmodules ? [] : submodules),
    ];
    const ignoredFiles = new Set(ignored.filter(p => !p.endsWith('/')));

    const ignorePatterns = [
      ...VCS_DIRECTORIES.map(dir => `**/${dir}/**`),
      `${LICENSES_DIRECTORY}/**`,
      ...skippedDirectories.map(dir => `${escapePath(dir)}/**`),
    ];
    // Wrap files stay; the checked-out subprojects do not.
    const skipSubprojects = !includeMesonSubprojects && await exists(join(root, 'meson.build'));

    const entries = await glob('**/*', {
      cwd: root,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      stats: true,
      ignore: ignorePatterns,
    });

    const all = new Set(entries.map(entry => entry.path));
    const files: string[] = [];

    for (const entry of entries) {
      const path = entry.path;

      if (entry.dirent.isSymbolicLink() || (entry.stats && entry.stats.size === 0)) {
        continue;
      }
      if (ignoredFiles.has(path) || skippedDirectories.some(dir => isUnder(path, dir))) {
        continue;
      }
      if (skipSubprojects && isInSubproject(path)) {
        continue;
      }
      if (exclude.length > 0 && micromatch.isMatch(path, exclude, { dot: true })) {
        continue;
      }
      if (path === coverageFile || path.endsWith('.spdx')) {
        continue;
      }
      // A sidecar is metadata for its subject, not a subject of its own.
      if (path.endsWith(SIDECAR_SUFFIX) && all.has(path.slice(0, -SIDECAR_SUFFIX.length))) {
        continue;
      }

      files.push(path);
    }

    return files.sort();
  }
}
