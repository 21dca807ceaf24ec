import { resolve } from 'node:path';
import { FileScanner } from './file-scanner.js';
import type { ScanOptions } from './file-scanner.js';
import { MetadataExtractor } from './metadata-extractor.js';
import { COVERAGE_FILE, applyCoverage, loadCoverageDeclaration } from './coverage.js';
import { readLicensesDirectory } from './licenses.js';
import { config } from '../config.js';
import { expressionSymbols } from '../spdx/expression.js';
import type { FileMetadata } from '../extractor/types.js';
import type { CoverageConflict, ProjectIndex } from './types.js';

export interface IndexOptions extends ScanOptions {
  windowLines?: number;
  checksum?: boolean;
  maxConcurrency?: number;
  /** Skip the coverage declaration even when one exists. */
  ignoreCoverage?: boolean;
}

/** Every identifier a file's expressions mention, exceptions included. */
export function collectUsedLicenses(files: Iterable<FileMetadata>): Set<string> {
  const used = new Set<string>();
  for (const metadata of files) {
    for (const expression of metadata.licenseExpressions) {
      for (const symbol of expressionSymbols(expression)) {
        used.add(symbol.id);
      }
    }
  }
  return used;
}

export class Indexer {
  private fileScanner: FileScanner;
  private metadataExtractor: MetadataExtractor;

  constructor() {
    this.fileScanner = new FileScanner();
    this.metadataExtractor = new MetadataExtractor();
  }

  /**
   * Builds the index of a project. Extraction runs concurrently; merging the
   * per-file results, the coverage declaration and the licenses directory
   * happens afterwards in one place.
   */
  async indexProject(projectPath: string, options: IndexOptions = {}): Promise<ProjectIndex> {
    const root = resolve(projectPath);
    const startTime = Date.now();
    const {
      windowLines = config.scanner.windowLines,
      checksum = config.scanner.checksum,
      maxConcurrency = config.scanner.concurrency,
      ignoreCoverage = false,
      ...scanOptions
    } = options;
    const coverageFile = scanOptions.coverageFile ?? COVERAGE_FILE;

    console.error(`Scanning ${root}`);

    // Load the declaration first so a malformed one fails before any reading.
    const coverage = ignoreCoverage ? null : await loadCoverageDeclaration(root, coverageFile);

    const paths = await this.fileScanner.scan(root, { ...scanOptions, coverageFile });
    const extraction = await this.metadataExtractor.extractBatch(root, paths, {
      windowLines,
      checksum,
      maxConcurrency,
    });

    let files: ReadonlyMap<string, FileMetadata> = extraction.files;
    let coverageConflicts: CoverageConflict[] = [];
    if (coverage) {
      const merged = applyCoverage(files, coverage);
      files = merged.files;
      coverageConflicts = merged.conflicts;
    }

    const licenses = await readLicensesDirectory(root);
    const usedLicenses = collectUsedLicenses(files.values());

    const filesCovered = [...files.values()].filter(m => m.coveredCopyright || m.coveredLicense).length;
    console.error(
      `Indexing complete: ${paths.length} files (${filesCovered} covered), ` +
      `${licenses.declared.size} declared licenses, ` +
      `${extraction.stats.filesWithErrors} files with errors, ${Date.now() - startTime}ms`,
    );

    return Object.freeze({
      root,
      files,
      declaredLicenses: licenses.declared,
      licensesWithoutExtension: Object.freeze(licenses.withoutExtension),
      licenseReadErrors: licenses.readErrors,
      usedLicenses,
      coverageConflicts: Object.freeze(coverageConflicts),
      coverageSource: coverage?.source,
    });
  }
}

export const indexer = new Indexer();
