/**
 * Syntax Parsing Module
 *
 * Tree-sitter grammars turned into file Skeletons.
 *
 * @module
 */

export type { ISyntaxParser } from "../interfaces/ISyntaxParser.js";
export * from "./parser-manager.js";
export * from "./python-extractor.js";
export * from "./tree-sitter-parser.js";

import type { ISyntaxParser } from "../interfaces/ISyntaxParser.js";
import { TreeSitterParser } from "./tree-sitter-parser.js";

/**
 * Creates and initializes the default syntax parser.
 *
 * @example
 * ```typescript
 * const parser = await createSyntaxParser();
 * const result = parser.parse("def main(): pass", "python", "main.py");
 * await parser.close();
 * ```
 */
export async function createSyntaxParser(): Promise<ISyntaxParser> {
  const parser = new TreeSitterParser();
  await parser.initialize();
  return parser;
}
