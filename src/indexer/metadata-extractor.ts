import { config } from '../config.js';
import { extractFileMetadata } from '../extractor/metadata.js';
import type { ExtractOptions, FileMetadata } from '../extractor/types.js';

export interface ExtractionOptions extends ExtractOptions {
  maxConcurrency?: number;
}

export interface ExtractionStats {
  totalFiles: number;
  filesWithErrors: number;
  processingTimeMs: number;
}

export interface ExtractedMetadata {
  /** Keyed by relative path, in the order the paths were given. */
  files: Map<string, FileMetadata>;
  stats: ExtractionStats;
}

/**
 * Reads the metadata of many files with bounded concurrency. Results are
 * collected per path and inserted in input order, so the outcome does not
 * depend on which read finishes first.
 */
export class MetadataExtractor {
  async extractBatch(root: string, paths: string[], options: ExtractionOptions = {}): Promise<ExtractedMetadata> {
    const startTime = Date.now();
    const { maxConcurrency = config.scanner.concurrency, ...extractOptions } = options;
    const limit = Math.max(1, maxConcurrency);

    const results = new Map<string, FileMetadata>();
    let filesWithErrors = 0;
    const pending: Promise<void>[] = [];

    for (const path of paths) {
      pending.push(
        extractFileMetadata(root, path, extractOptions).then(metadata => {
          results.set(path, metadata);
          if (metadata.readErrors.length > 0) filesWithErrors++;
        }),
      );

      if (pending.length >= limit) {
        await Promise.all(pending);
        pending.length = 0;
      }
    }
    await Promise.all(pending);

    const files = new Map<string, FileMetadata>();
    for (const path of paths) {
      const metadata = results.get(path);
      if (metadata) files.set(path, metadata);
    }

    const stats: ExtractionStats = {
      totalFiles: paths.length,
      filesWithErrors,
      processingTimeMs: Date.now() - startTime,
    };

    return { files, stats };
  }
}
