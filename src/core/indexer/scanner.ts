/**
 * Source Scanner
 *
 * Discovers and catalogs every file under a project's source directory.
 * Dotfiles and vendor/build directories are skipped; paths come back
 * project-relative and sorted, and that order is the discovery index.
 *
 * @module
 */

import * as path from "node:path";
import * as fsPromises from "node:fs/promises";
import {
  findFiles,
  readSourceFile,
  calculateContentHash,
  detectLanguage,
  getRelativePath,
} from "../../utils/fs.js";
import { mapConcurrent } from "../../utils/async.js";
import { ConfigurationError, ErrorCode } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export interface ScannedFile {
  /** Project-relative path with forward slashes */
  path: string;
  absolutePath: string;
  language: string;
  size: number;
  hash: string;
  isBinary: boolean;
  discoveryIndex: number;
}

export interface ScanResult {
  files: ScannedFile[];
  totalSize: number;
  scanTimeMs: number;
  byLanguage: Map<string, number>;
}

export interface ScanOptions {
  /** Extra glob patterns to exclude */
  ignore?: string[];
  concurrency?: number;
  onProgress?: (current: number, total: number, file: string) => void;
}

// =============================================================================
// Scanner
// =============================================================================

/**
 * @example
 * ```typescript
 * const scanner = new SourceScanner("/work/legacy-app");
 * const { files } = await scanner.scan();
 * for (const file of files) {
 *   console.log(`${file.discoveryIndex} ${file.path} (${file.language})`);
 * }
 * ```
 */
export class SourceScanner {
  constructor(private readonly rootDir: string) {}

  async scan(options: ScanOptions = {}): Promise<ScanResult> {
    const startTime = Date.now();
    const { ignore = [], concurrency = 10, onProgress } = options;

    const stats = await fsPromises.stat(this.rootDir).catch((error: unknown) => {
      throw new ConfigurationError(`Source directory not readable: ${this.rootDir}`, ErrorCode.CONFIG_MISSING, {
        sourceDir: this.rootDir,
        cause: String(error),
      });
    });
    if (!stats.isDirectory()) {
      throw new ConfigurationError(`Source path is not a directory: ${this.rootDir}`, ErrorCode.CONFIG_INVALID, {
        sourceDir: this.rootDir,
      });
    }

    const absolutePaths = await findFiles({ patterns: ["**/*"], ignore, cwd: this.rootDir, absolute: true });
    const relative = absolutePaths
      .map((absolutePath) => ({ absolutePath, path: getRelativePath(absolutePath, this.rootDir) }))
      .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    let processed = 0;
    const files = await mapConcurrent(
      relative,
      async (entry, index): Promise<ScannedFile> => {
        const { content, isBinary } = await readSourceFile(entry.absolutePath);
        processed++;
        onProgress?.(processed, relative.length, entry.path);
        return {
          path: entry.path,
          absolutePath: entry.absolutePath,
          language: detectLanguage(entry.path),
          size: content.length,
          hash: calculateContentHash(content),
          isBinary,
          discoveryIndex: index,
        };
      },
      concurrency
    );

    const byLanguage = new Map<string, number>();
    let totalSize = 0;
    for (const file of files) {
      byLanguage.set(file.language, (byLanguage.get(file.language) ?? 0) + 1);
      totalSize += file.size;
    }

    return { files, totalSize, scanTimeMs: Date.now() - startTime, byLanguage };
  }

  resolve(relativePath: string): string {
    return path.join(this.rootDir, ...relativePath.split("/"));
  }
}
