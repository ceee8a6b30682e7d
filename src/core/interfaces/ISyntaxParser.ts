/**
 * ISyntaxParser - Structural parsing capability
 *
 * Turns one file's contents into a Skeleton. Implementations must be
 * deterministic and side-effect free: the same input always yields the
 * same skeleton.
 *
 * @module
 */

import type { Result } from "../../types/result.js";
import type { Skeleton } from "../../types/skeleton.js";
import type { MalformedInputError } from "../errors.js";

export interface ISyntaxParser {
  /**
   * Loads grammars. Idempotent.
   */
  initialize(): Promise<void>;

  /**
   * Whether `language` (a file language tag) has a grammar.
   */
  supports(language: string): boolean;

  /**
   * Parses file contents. Syntax errors anywhere in the file produce an
   * Err carrying MalformedInputError with the first error location.
   *
   * @throws MigrationError if `language` is not supported
   */
  parse(content: string, language: string, filePath: string): Result<Skeleton, MalformedInputError>;

  close(): Promise<void>;

  readonly isReady: boolean;
}
