/**
 * Tree-sitter Syntax Parser
 *
 * ISyntaxParser over the ParserManager grammars. Languages without a
 * grammar are reported as unsupported so the extraction engine can hand the
 * whole file to inference.
 *
 * @module
 */

import type { ISyntaxParser } from "../interfaces/ISyntaxParser.js";
import type { Skeleton } from "../../types/skeleton.js";
import { ok, err, type Result } from "../../types/result.js";
import { MalformedInputError, MigrationError, ErrorCode } from "../errors.js";
import { ParserManager, isGrammarLanguage } from "./parser-manager.js";
import { PythonSkeletonExtractor, firstSyntaxError } from "./python-extractor.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("syntax-parser");

export class TreeSitterParser implements ISyntaxParser {
  private readonly manager: ParserManager;
  private readonly python = new PythonSkeletonExtractor();

  constructor(manager: ParserManager = new ParserManager()) {
    this.manager = manager;
  }

  async initialize(): Promise<void> {
    await this.manager.initialize();
    logger.debug({ languages: this.manager.getSupportedLanguages() }, "grammars loaded");
  }

  supports(language: string): boolean {
    return isGrammarLanguage(language);
  }

  parse(content: string, language: string, filePath: string): Result<Skeleton, MalformedInputError> {
    if (!isGrammarLanguage(language)) {
      throw new MigrationError(`No grammar for language: ${language}`, ErrorCode.PARSE_UNSUPPORTED_LANGUAGE, {
        filePath,
        language,
      });
    }

    const { tree, hasErrors, parseTimeMs } = this.manager.parseCode(content, language);
    try {
      if (hasErrors) {
        const location = firstSyntaxError(tree);
        return err(
          new MalformedInputError(`Syntax error in ${filePath}${location ? ` near "${location.text}"` : ""}`, ErrorCode.PARSE_SYNTAX_ERROR, {
            filePath,
            line: location?.line,
            column: location?.column,
          })
        );
      }
      const skeleton = this.python.extract(tree);
      logger.trace({ filePath, parseTimeMs }, "parsed");
      return ok(skeleton);
    } finally {
      tree.delete();
    }
  }

  async close(): Promise<void> {
    await this.manager.close();
  }

  get isReady(): boolean {
    return this.manager.isReady;
  }
}
