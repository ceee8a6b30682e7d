/**
 * Parser Manager
 *
 * Loads Tree-sitter grammars from their npm packages and hands out one
 * parser per language.
 *
 * @module
 */

import { Parser, Language, type Tree } from "web-tree-sitter";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { MigrationError, ErrorCode } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Languages with a syntactic grammar. Every other language tag goes to the
 * inference capability.
 */
export type GrammarLanguage = "python";

export interface ParseResult {
  tree: Tree;
  sourceCode: string;
  language: GrammarLanguage;
  parseTimeMs: number;
  hasErrors: boolean;
}

// =============================================================================
// Constants
// =============================================================================

const LANGUAGE_GRAMMARS: Record<GrammarLanguage, { module: string; wasm: string }> = {
  python: { module: "tree-sitter-python", wasm: "tree-sitter-python.wasm" },
};

export function isGrammarLanguage(language: string): language is GrammarLanguage {
  return Object.hasOwn(LANGUAGE_GRAMMARS, language);
}

// =============================================================================
// Parser Manager Class
// =============================================================================

/**
 * Manages Tree-sitter parsers for the supported grammars.
 *
 * @example
 * ```typescript
 * const manager = new ParserManager();
 * await manager.initialize();
 * const result = manager.parseCode("def main(args: list): pass", "python");
 * console.log(result.tree.rootNode.type); // "module"
 * await manager.close();
 * ```
 */
export class ParserManager {
  private parsers = new Map<GrammarLanguage, Parser>();
  private initialization: Promise<void> | null = null;
  private initialized = false;

  /**
   * Initializes Tree-sitter and loads every grammar. Concurrent callers
   * share one initialization.
   */
  async initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.load();
    }
    await this.initialization;
  }

  private async load(): Promise<void> {
    await Parser.init();
    for (const language of Object.keys(LANGUAGE_GRAMMARS).filter(isGrammarLanguage)) {
      const grammar = await Language.load(this.resolveWasmPath(language));
      const parser = new Parser();
      parser.setLanguage(grammar);
      this.parsers.set(language, parser);
    }
    this.initialized = true;
  }

  /**
   * Parses source code. Tree-sitter always produces a tree; syntax errors
   * show up as ERROR/MISSING nodes and `hasErrors`.
   */
  parseCode(code: string, language: GrammarLanguage): ParseResult {
    const parser = this.getParser(language);
    const startTime = performance.now();
    const tree = parser.parse(code);
    const parseTimeMs = performance.now() - startTime;

    if (!tree) {
      throw new MigrationError(`Failed to parse code for language: ${language}`, ErrorCode.PARSE_SYNTAX_ERROR);
    }

    return {
      tree,
      sourceCode: code,
      language,
      parseTimeMs,
      hasErrors: tree.rootNode.hasError,
    };
  }

  getParser(language: GrammarLanguage): Parser {
    if (!this.initialized) {
      throw new MigrationError("ParserManager not initialized. Call initialize() first.", ErrorCode.PARSE_UNSUPPORTED_LANGUAGE);
    }
    const parser = this.parsers.get(language);
    if (!parser) {
      throw new MigrationError(`Parser not loaded for language: ${language}`, ErrorCode.PARSE_UNSUPPORTED_LANGUAGE);
    }
    return parser;
  }

  getSupportedLanguages(): GrammarLanguage[] {
    return [...this.parsers.keys()];
  }

  get isReady(): boolean {
    return this.initialized;
  }

  async close(): Promise<void> {
    for (const parser of this.parsers.values()) {
      parser.delete();
    }
    this.parsers.clear();
    this.initialization = null;
    this.initialized = false;
  }

  /**
   * Grammar wasm files ship inside the grammar packages; from both
   * src/core/parser and dist/core/parser node_modules is three levels up.
   */
  private resolveWasmPath(language: GrammarLanguage): string {
    const here = path.dirname(fileURLToPath(import.meta.url));
    const grammar = LANGUAGE_GRAMMARS[language];
    return path.join(path.resolve(here, "../../../node_modules"), grammar.module, grammar.wasm);
  }
}
