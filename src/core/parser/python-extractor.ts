/**
 * Python Skeleton Extractor
 *
 * Walks a tree-sitter-python tree and produces the file's Skeleton:
 * top-level functions, classes (with methods and attributes), enums,
 * monkey-patched extensions and imports. Only module-level declarations are
 * collected; nested functions and classes belong to their enclosing body.
 *
 * @module
 */

import type { Tree, Node } from "web-tree-sitter";
import type {
  Skeleton,
  SkeletonArgument,
  SkeletonAttribute,
  SkeletonClass,
  SkeletonEnum,
  SkeletonExtension,
  SkeletonFunction,
  SkeletonImport,
} from "../../types/skeleton.js";

// =============================================================================
// Types & Constants
// =============================================================================

type SyntaxNode = Node;

const ENUM_BASES = new Set(["Enum", "IntEnum", "StrEnum", "Flag", "IntFlag"]);
const ABSTRACT_BASES = new Set(["ABC", "ABCMeta"]);
const INTERFACE_BASES = new Set(["Protocol"]);

/** Class attributes that hold a singleton's shared instance */
const SINGLETON_ATTRIBUTES = new Set(["_instance"]);

/** Accessors that return a singleton's shared instance */
const SINGLETON_ACCESSORS = new Set(["get_instance", "instance"]);

const DOCSTRING = /^[rRbBuUfF]*("""|'''|"|')([\s\S]*)\1$/;

function named(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child): child is SyntaxNode => child !== null);
}

function children(node: SyntaxNode): SyntaxNode[] {
  return node.children.filter((child): child is SyntaxNode => child !== null);
}

/** Last segment of a dotted name: `abc.ABC` -> `ABC` */
function lastSegment(name: string): string {
  const parts = name.split(".");
  return parts[parts.length - 1] ?? name;
}

function visibilityOf(name: string): SkeletonAttribute["visibility"] {
  if (name.startsWith("__") && !name.endsWith("__")) return "private";
  if (name.startsWith("_")) return "protected";
  return "public";
}

function uniq(values: string[]): string[] {
  return [...new Set(values)];
}

// =============================================================================
// Extractor
// =============================================================================

/**
 * Extracts a Skeleton from a Python parse tree.
 *
 * @example
 * ```typescript
 * const { tree } = manager.parseCode(source, "python");
 * const skeleton = new PythonSkeletonExtractor().extract(tree);
 * console.log(skeleton.functions.map((f) => f.name));
 * ```
 */
export class PythonSkeletonExtractor {
  extract(tree: Tree): Skeleton {
    const root = tree.rootNode;
    const imports: SkeletonImport[] = [];
    const functions: SkeletonFunction[] = [];
    const classes: SkeletonClass[] = [];
    const enums: SkeletonEnum[] = [];
    const assignments: SyntaxNode[] = [];

    for (const statement of named(root)) {
      const definition = this.unwrapDecorated(statement);
      const decorators = this.decoratorsOf(statement);

      switch (definition.type) {
        case "import_statement":
          imports.push(...this.parseImport(definition));
          break;
        case "import_from_statement":
          imports.push(...this.parseFromImport(definition));
          break;
        case "function_definition":
          functions.push(this.parseFunction(definition, decorators, false));
          break;
        case "class_definition": {
          const parsed = this.parseClass(definition, decorators);
          if (parsed.superclasses.some((base) => ENUM_BASES.has(lastSegment(base)))) {
            enums.push(this.toEnum(definition, parsed));
          } else {
            classes.push(parsed);
          }
          break;
        }
        case "expression_statement":
          assignments.push(definition);
          break;
      }
    }

    this.markReferencedImports(root, imports);

    return {
      language: "python",
      functions,
      classes,
      enums,
      extensions: this.parseExtensions(assignments, classes, imports),
      imports,
    };
  }

  // ===========================================================================
  // Imports
  // ===========================================================================

  private parseImport(node: SyntaxNode): SkeletonImport[] {
    const line = node.startPosition.row + 1;
    return named(node).flatMap((child): SkeletonImport[] => {
      if (child.type === "dotted_name") {
        const first = child.text.split(".")[0] ?? child.text;
        return [{ module: child.text, names: [], level: 0, bindings: [first], referenced: false, line }];
      }
      if (child.type === "aliased_import") {
        const moduleName = child.childForFieldName("name")?.text ?? "";
        const alias = child.childForFieldName("alias")?.text ?? moduleName;
        return [{ module: moduleName, names: [], level: 0, bindings: [alias], referenced: false, line }];
      }
      return [];
    });
  }

  private parseFromImport(node: SyntaxNode): SkeletonImport[] {
    const moduleNode = node.childForFieldName("module_name");
    if (!moduleNode) return [];

    let level = 0;
    let moduleName = moduleNode.text;
    if (moduleNode.type === "relative_import") {
      const dots = /^\.+/.exec(moduleNode.text)?.[0] ?? "";
      level = dots.length;
      moduleName = moduleNode.text.slice(dots.length);
    }

    const names: string[] = [];
    const bindings: string[] = [];
    for (const child of named(node)) {
      if (child.id === moduleNode.id) continue;
      if (child.type === "dotted_name") {
        names.push(child.text);
        bindings.push(child.text);
      } else if (child.type === "aliased_import") {
        const imported = child.childForFieldName("name")?.text ?? "";
        names.push(imported);
        bindings.push(child.childForFieldName("alias")?.text ?? imported);
      } else if (child.type === "wildcard_import") {
        names.push("*");
      }
    }

    return [{ module: moduleName, names, level, bindings, referenced: false, line: node.startPosition.row + 1 }];
  }

  /**
   * An import is referenced when one of its bindings appears as an
   * identifier outside import statements.
   */
  private markReferencedImports(root: SyntaxNode, imports: SkeletonImport[]): void {
    const byBinding = new Map<string, SkeletonImport[]>();
    for (const entry of imports) {
      for (const binding of entry.bindings) {
        byBinding.set(binding, [...(byBinding.get(binding) ?? []), entry]);
      }
    }
    if (byBinding.size === 0) return;

    const walk = (node: SyntaxNode): void => {
      if (node.type === "import_statement" || node.type === "import_from_statement") return;
      if (node.type === "identifier") {
        for (const entry of byBinding.get(node.text) ?? []) {
          entry.referenced = true;
        }
        return;
      }
      for (const child of named(node)) {
        walk(child);
      }
    };
    walk(root);
  }

  // ===========================================================================
  // Functions
  // ===========================================================================

  private unwrapDecorated(node: SyntaxNode): SyntaxNode {
    if (node.type !== "decorated_definition") return node;
    return node.childForFieldName("definition") ?? node;
  }

  /**
   * Decorators as written, without call arguments: `@app.route("/")` -> `@app.route`
   */
  private decoratorsOf(node: SyntaxNode): string[] {
    if (node.type !== "decorated_definition") return [];
    return named(node)
      .filter((child) => child.type === "decorator")
      .map((decorator) => {
        const expression = named(decorator)[0];
        if (!expression) return decorator.text;
        const target = expression.type === "call" ? expression.childForFieldName("function") ?? expression : expression;
        return `@${target.text}`;
      });
  }

  private parseFunction(node: SyntaxNode, decorators: string[], isMethod: boolean): SkeletonFunction {
    const parameters = node.childForFieldName("parameters");
    let args = parameters ? this.parseParameters(parameters) : [];
    if (isMethod && !decorators.includes("@staticmethod")) {
      const first = args[0];
      if (first && (first.name === "self" || first.name === "cls")) {
        args = args.slice(1);
      }
    }

    return {
      name: node.childForFieldName("name")?.text ?? "<anonymous>",
      returnType: node.childForFieldName("return_type")?.text ?? null,
      arguments: args,
      decorators,
      isStatic: decorators.includes("@staticmethod"),
      isAsync: children(node).some((child) => child.type === "async"),
      docstring: this.docstringOf(node.childForFieldName("body")),
      lineStart: node.startPosition.row + 1,
      lineEnd: node.endPosition.row + 1,
    };
  }

  private parseParameters(node: SyntaxNode): SkeletonArgument[] {
    const args: SkeletonArgument[] = [];
    for (const child of named(node)) {
      switch (child.type) {
        case "identifier":
        case "list_splat_pattern":
        case "dictionary_splat_pattern":
          args.push({ name: child.text, type: null });
          break;
        case "typed_parameter": {
          const nameNode = named(child).find((part) => part.type !== "type");
          args.push({ name: nameNode?.text ?? child.text, type: child.childForFieldName("type")?.text ?? null });
          break;
        }
        case "default_parameter":
          args.push({ name: child.childForFieldName("name")?.text ?? child.text, type: null });
          break;
        case "typed_default_parameter":
          args.push({
            name: child.childForFieldName("name")?.text ?? child.text,
            type: child.childForFieldName("type")?.text ?? null,
          });
          break;
      }
    }
    return args;
  }

  private docstringOf(body: SyntaxNode | null): string | null {
    const first = body ? named(body)[0] : undefined;
    if (!first || first.type !== "expression_statement") return null;
    const literal = named(first)[0];
    if (!literal || literal.type !== "string") return null;
    const match = DOCSTRING.exec(literal.text);
    return match?.[2]?.trim() ?? null;
  }

  // ===========================================================================
  // Classes
  // ===========================================================================

  private parseClass(node: SyntaxNode, decorators: string[]): SkeletonClass {
    const superclasses: string[] = [];
    const keywords: Record<string, string> = {};
    const argumentList = node.childForFieldName("superclasses");
    for (const argument of argumentList ? named(argumentList) : []) {
      if (argument.type === "keyword_argument") {
        const key = argument.childForFieldName("name")?.text;
        const value = argument.childForFieldName("value")?.text;
        if (key && value) keywords[key] = value;
      } else {
        superclasses.push(argument.text);
      }
    }

    const methods: SkeletonFunction[] = [];
    const attributes: SkeletonAttribute[] = [];
    const assignedNames: string[] = [];
    const body = node.childForFieldName("body");

    for (const statement of body ? named(body) : []) {
      const definition = this.unwrapDecorated(statement);
      if (definition.type === "function_definition") {
        const method = this.parseFunction(definition, this.decoratorsOf(statement), true);
        methods.push(method);
        if (method.name === "__init__") {
          attributes.push(...this.instanceAttributes(definition));
        }
      } else if (definition.type === "expression_statement") {
        const assignment = named(definition)[0];
        if (assignment?.type !== "assignment") continue;
        const left = assignment.childForFieldName("left");
        if (left?.type !== "identifier") continue;
        assignedNames.push(left.text);
        const type = assignment.childForFieldName("type");
        if (type) {
          attributes.push({ name: left.text, type: type.text, visibility: visibilityOf(left.text) });
        }
      }
    }

    const { kind, evidence } = this.classKind(superclasses, keywords, methods, assignedNames);

    return {
      name: node.childForFieldName("name")?.text ?? "<anonymous>",
      superclasses,
      keywords,
      decorators,
      methods,
      attributes: this.dedupeAttributes(attributes),
      docstring: this.docstringOf(body),
      kind,
      kindEvidence: evidence,
      isFinal: decorators.some((decorator) => lastSegment(decorator.slice(1)) === "final"),
      lineStart: node.startPosition.row + 1,
      lineEnd: node.endPosition.row + 1,
    };
  }

  /**
   * `self.name = ...` and `self.name: T = ...` inside __init__
   */
  private instanceAttributes(init: SyntaxNode): SkeletonAttribute[] {
    const attributes: SkeletonAttribute[] = [];
    const body = init.childForFieldName("body");
    for (const statement of body ? named(body) : []) {
      if (statement.type !== "expression_statement") continue;
      const assignment = named(statement)[0];
      if (assignment?.type !== "assignment") continue;
      const left = assignment.childForFieldName("left");
      if (left?.type !== "attribute" || left.childForFieldName("object")?.text !== "self") continue;
      const name = left.childForFieldName("attribute")?.text;
      if (!name) continue;
      attributes.push({
        name,
        type: assignment.childForFieldName("type")?.text ?? null,
        visibility: visibilityOf(name),
      });
    }
    return attributes;
  }

  private dedupeAttributes(attributes: SkeletonAttribute[]): SkeletonAttribute[] {
    const byName = new Map<string, SkeletonAttribute>();
    for (const attribute of attributes) {
      const existing = byName.get(attribute.name);
      if (!existing || (existing.type === null && attribute.type !== null)) {
        byName.set(attribute.name, attribute);
      }
    }
    return [...byName.values()];
  }

  /**
   * Kind from syntactic evidence only; null when nothing points anywhere.
   */
  private classKind(
    superclasses: string[],
    keywords: Record<string, string>,
    methods: SkeletonFunction[],
    assignedNames: string[]
  ): { kind: string | null; evidence: string[] } {
    const singleton: string[] = [];
    const metaclass = keywords.metaclass;
    if (methods.some((method) => method.name === "__new__")) singleton.push("__new__");
    for (const name of assignedNames) {
      if (SINGLETON_ATTRIBUTES.has(name)) singleton.push(`attribute:${name}`);
    }
    for (const method of methods) {
      const isAccessor = method.decorators.includes("@classmethod") || method.decorators.includes("@staticmethod");
      if (isAccessor && SINGLETON_ACCESSORS.has(method.name)) singleton.push(`accessor:${method.name}`);
    }
    if (singleton.length > 0) return { kind: "singleton", evidence: singleton };

    if (superclasses.some((base) => INTERFACE_BASES.has(lastSegment(base)))) {
      return { kind: "interface", evidence: ["base:Protocol"] };
    }

    const abstract: string[] = [];
    if (superclasses.some((base) => ABSTRACT_BASES.has(lastSegment(base)))) abstract.push("base:ABC");
    if (metaclass && ABSTRACT_BASES.has(lastSegment(metaclass))) abstract.push(`metaclass=${metaclass}`);
    for (const method of methods) {
      if (method.decorators.some((decorator) => lastSegment(decorator.slice(1)) === "abstractmethod")) {
        abstract.push(`abstractmethod:${method.name}`);
      }
    }
    if (abstract.length > 0) return { kind: "abstract", evidence: abstract };

    return { kind: null, evidence: [] };
  }

  private toEnum(node: SyntaxNode, parsed: SkeletonClass): SkeletonEnum {
    const values: string[] = [];
    const body = node.childForFieldName("body");
    for (const statement of body ? named(body) : []) {
      if (statement.type !== "expression_statement") continue;
      const assignment = named(statement)[0];
      const left = assignment?.type === "assignment" ? assignment.childForFieldName("left") : null;
      if (left?.type === "identifier" && !left.text.startsWith("_")) {
        values.push(left.text);
      }
    }
    return { name: parsed.name, values, docstring: parsed.docstring, lineStart: parsed.lineStart };
  }

  // ===========================================================================
  // Extensions
  // ===========================================================================

  /**
   * Module-level `Base.name = value` where Base is a class declared here or
   * a capitalized name imported from elsewhere.
   */
  private parseExtensions(
    assignments: SyntaxNode[],
    classes: SkeletonClass[],
    imports: SkeletonImport[]
  ): SkeletonExtension[] {
    const knownTypes = new Set(classes.map((cls) => cls.name));
    for (const entry of imports) {
      for (const binding of entry.bindings) {
        if (/^[A-Z]/.test(binding)) knownTypes.add(binding);
      }
    }

    const byBase = new Map<string, SkeletonExtension>();
    for (const statement of assignments) {
      const assignment = named(statement)[0];
      if (assignment?.type !== "assignment") continue;
      const left = assignment.childForFieldName("left");
      if (left?.type !== "attribute") continue;
      const base = left.childForFieldName("object");
      const member = left.childForFieldName("attribute");
      if (base?.type !== "identifier" || !member || !knownTypes.has(base.text)) continue;

      const extension = byBase.get(base.text) ?? {
        baseType: base.text,
        methods: [],
        lineStart: statement.startPosition.row + 1,
      };
      extension.methods = uniq([...extension.methods, member.text]);
      byBase.set(base.text, extension);
    }
    return [...byBase.values()];
  }
}

// =============================================================================
// Error Location
// =============================================================================

/**
 * First ERROR or MISSING node in document order, 1-based.
 */
export function firstSyntaxError(tree: Tree): { line: number; column: number; text: string } | null {
  const visit = (node: SyntaxNode): SyntaxNode | null => {
    if (node.type === "ERROR" || node.isMissing) return node;
    if (!node.hasError) return null;
    for (const child of children(node)) {
      const found = visit(child);
      if (found) return found;
    }
    return null;
  };
  const found = visit(tree.rootNode);
  if (!found) return null;
  return {
    line: found.startPosition.row + 1,
    column: found.startPosition.column + 1,
    text: found.text.slice(0, 80),
  };
}
