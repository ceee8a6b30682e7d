/**
 * File System Utilities
 * File discovery, language detection and content hashing for source trees
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
}

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  "**/node_modules/**",
  "**/.git/**",
  "**/__pycache__/**",
  "**/.venv/**",
  "**/venv/**",
  "**/dist/**",
  "**/build/**",
  "**/coverage/**",
];

/**
 * Find files matching glob patterns. Dotfiles are never returned and the
 * result is sorted so discovery order is stable across runs.
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const { patterns, ignore = [], cwd = process.cwd(), absolute = false } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles: true,
    ignore: [...DEFAULT_IGNORE_PATTERNS, ...ignore],
    dot: false,
  });
  return files.sort();
}

/**
 * Path relative to the project root, always with forward slashes
 */
export function getRelativePath(filePath: string, projectRoot: string): string {
  return path.relative(projectRoot, filePath).split(path.sep).join("/");
}

const LANGUAGE_MAP: Record<string, string> = {
  ".py": "python",
  ".pyw": "python",
  ".js": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".ts": "typescript",
  ".jsx": "react",
  ".tsx": "react",
  ".vue": "vue",
  ".html": "html",
  ".htm": "html",
  ".css": "css",
  ".scss": "scss",
  ".sass": "sass",
  ".less": "less",
  ".java": "java",
  ".kt": "kotlin",
  ".cs": "csharp",
  ".go": "go",
  ".rb": "ruby",
  ".php": "php",
  ".c": "c",
  ".h": "c",
  ".cpp": "cpp",
  ".hpp": "cpp",
  ".cob": "cobol",
  ".cbl": "cobol",
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".toml": "toml",
  ".ini": "ini",
  ".cfg": "ini",
  ".properties": "properties",
  ".xml": "xml",
  ".sql": "sql",
  ".csv": "csv",
  ".md": "markdown",
  ".txt": "text",
  ".sh": "shell",
};

/**
 * Detect a file's language/type tag from its extension; "unknown" when the
 * extension is not recognized.
 */
export function detectLanguage(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return LANGUAGE_MAP[ext] ?? "unknown";
}

/**
 * Calculate MD5 hash from string content
 */
export function calculateContentHash(content: string | Buffer): string {
  return crypto.createHash("md5").update(content).digest("hex");
}

/**
 * Read a file as raw bytes. NUL bytes in the first block mark the file as
 * binary.
 */
export async function readSourceFile(filePath: string): Promise<{ content: Buffer; isBinary: boolean }> {
  const content = await fsPromises.readFile(filePath);
  const probe = content.subarray(0, 8000);
  return { content, isBinary: probe.includes(0) };
}
