import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { config } from '../config.js';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 64 * 1024 * 1024;

export interface IgnoreInfo {
  /** Ignored files, and ignored directories with a trailing slash, relative to the root. */
  ignored: string[];
  submodules: string[];
}

/**
 * Asks git which paths under a root it ignores. Outside a work tree, or when
 * git is missing, nothing is ignored.
 */
class GitIgnoreService {
  private availability = new Map<string, boolean>();

  async getIgnoreInfo(root: string): Promise<IgnoreInfo> {
    if (!(await this.isWorkTree(root))) {
      return { ignored: [], submodules: [] };
    }

    const [ignored, submodules] = await Promise.all([
      this.listIgnored(root),
      this.listSubmodules(root),
    ]);
    return { ignored, submodules };
  }

  private async isWorkTree(root: string): Promise<boolean> {
    const cached = this.availability.get(root);
    if (cached !== undefined) {
      return cached;
    }

    let available = false;
    try {
      const { stdout } = await execFileAsync(config.git.gitBinary, ['rev-parse', '--is-inside-work-tree'], {
        cwd: root,
      });
      available = stdout.trim() === 'true';
    } catch (error) {
      console.error(`Git ignore rules not applied to ${root}:`, error instanceof Error ? error.message : error);
    }

    this.availability.set(root, available);
    return available;
  }

  private async listIgnored(root: string): Promise<string[]> {
    const { stdout } = await execFileAsync(
      config.git.gitBinary,
      ['ls-files', '--others', '--ignored', '--exclude-standard', '--directory', '-z'],
      { cwd: root, maxBuffer: MAX_BUFFER },
    );
    return stdout.split('\0').filter(Boolean);
  }

  private async listSubmodules(root: string): Promise<string[]> {
    try {
      const { stdout } = await execFileAsync(
        config.git.gitBinary,
        ['config', '--file', '.gitmodules', '--get-regexp', '\\.path$'],
        { cwd: root },
      );
      return stdout
        .trim()
        .split('\n')
        .filter(Boolean)
        .map(line => line.slice(line.indexOf(' ') + 1).trim());
    } catch {
      // git config exits 1 when .gitmodules is absent or has no paths
      return [];
    }
  }
}

export const gitIgnore = new GitIgnoreService();
