/**
 * Structural skeleton of one source file
 *
 * What the syntax parser can state with certainty about a file. A `null`
 * in a field means the parser could not decide it; the extraction engine
 * asks the inference capability for those and records which source won.
 *
 * @module
 */

export interface SkeletonArgument {
  name: string;
  /** Annotation text, or null when unannotated */
  type: string | null;
}

export interface SkeletonFunction {
  name: string;
  returnType: string | null;
  arguments: SkeletonArgument[];
  /** Decorator text including the leading "@" */
  decorators: string[];
  isStatic: boolean;
  isAsync: boolean;
  docstring: string | null;
  lineStart: number;
  lineEnd: number;
}

export interface SkeletonAttribute {
  name: string;
  type: string | null;
  visibility: "public" | "protected" | "private";
}

export interface SkeletonClass {
  name: string;
  superclasses: string[];
  /** Keyword arguments of the class header, e.g. metaclass */
  keywords: Record<string, string>;
  decorators: string[];
  methods: SkeletonFunction[];
  attributes: SkeletonAttribute[];
  docstring: string | null;
  /** Kind decided from syntax alone, or null when there is no evidence */
  kind: string | null;
  /** The constructs that decided `kind` */
  kindEvidence: string[];
  isFinal: boolean;
  lineStart: number;
  lineEnd: number;
}

export interface SkeletonEnum {
  name: string;
  values: string[];
  docstring: string | null;
  lineStart: number;
}

/**
 * Behavior attached to an existing type from outside its declaration
 */
export interface SkeletonExtension {
  baseType: string;
  methods: string[];
  lineStart: number;
}

export interface SkeletonImport {
  /** Dotted module path as written, without leading dots */
  module: string;
  /** Names bound by `from x import a, b`; empty for `import x` */
  names: string[];
  /** Number of leading dots of a relative import */
  level: number;
  /** Local names the import binds */
  bindings: string[];
  /** Whether any binding is used outside import statements */
  referenced: boolean;
  line: number;
}

export interface Skeleton {
  language: string;
  functions: SkeletonFunction[];
  classes: SkeletonClass[];
  enums: SkeletonEnum[];
  extensions: SkeletonExtension[];
  imports: SkeletonImport[];
}

export function emptySkeleton(language: string): Skeleton {
  return {
    language,
    functions: [],
    classes: [],
    enums: [],
    extensions: [],
    imports: [],
  };
}
