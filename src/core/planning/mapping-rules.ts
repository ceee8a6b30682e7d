/**
 * Mapping Rules
 *
 * Target components per component type, replacements for legacy
 * constructs, and data-type tables per (source, target) language pair.
 * Type templates use `$1`, `$2` for positional type arguments, `$*` for all
 * arguments joined by commas and `$|` for all arguments joined as a union.
 *
 * @module
 */

import type { ComponentType } from "../../types/entities.js";
import { parseTypeExpression, type TypeExpression } from "./type-expression.js";

// =============================================================================
// Target Components
// =============================================================================

export interface TargetRule {
  name: string;
  type: string;
}

const COMPONENT_TARGETS: Record<string, Record<ComponentType, string>> = {
  typescript: {
    ui: "React component",
    logic: "TypeScript module",
    data: "TypeScript data model",
    config: "JSON configuration",
    unknown: "Manual review",
  },
  java: {
    ui: "JavaFX view",
    logic: "Java class",
    data: "JPA entity",
    config: "Spring properties",
    unknown: "Manual review",
  },
};

/**
 * Target for a whole component. An explicit target framework names the
 * target; otherwise the language table does, with a generic name for
 * languages it lacks.
 */
export function componentTarget(type: ComponentType, targetLanguage: string, targetFramework: string | null): TargetRule {
  if (type === "unknown") return { name: "Manual review", type: "manual" };
  const table = COMPONENT_TARGETS[targetLanguage.toLowerCase()];
  const base = table ? table[type] : `${targetLanguage} ${type} module`;
  return { name: targetFramework ? `${targetFramework} ${base}` : base, type };
}

export const MANUAL_TARGET: TargetRule = { name: "Manual review", type: "manual" };

// =============================================================================
// Legacy Constructs
// =============================================================================

/** Class kinds that need a deliberate replacement in the target */
export const LEGACY_CLASS_KINDS: ReadonlySet<string> = new Set(["singleton", "abstract", "interface"]);

const CONSTRUCT_TARGETS: Record<string, Record<string, string>> = {
  typescript: {
    singleton: "module-scoped instance",
    abstract: "abstract class",
    interface: "interface",
    extension: "module augmentation",
  },
  java: {
    singleton: "enum singleton",
    abstract: "abstract class",
    interface: "interface",
    extension: "static utility class",
  },
};

/**
 * @returns the replacement, or null when the target has none for the
 * construct
 */
export function constructTarget(construct: string, targetLanguage: string): TargetRule | null {
  const name = CONSTRUCT_TARGETS[targetLanguage.toLowerCase()]?.[construct];
  return name ? { name, type: construct } : null;
}

// =============================================================================
// Data Types
// =============================================================================

interface TypeTable {
  /** Used for a missing type argument */
  missing: string;
  types: Record<string, string>;
}

const TYPE_TABLES: Record<string, TypeTable> = {
  "python->typescript": {
    missing: "unknown",
    types: {
      int: "number",
      float: "number",
      complex: "number",
      str: "string",
      bool: "boolean",
      bytes: "Uint8Array",
      bytearray: "Uint8Array",
      None: "null",
      Any: "unknown",
      object: "unknown",
      list: "Array<$1>",
      List: "Array<$1>",
      Sequence: "ReadonlyArray<$1>",
      Iterable: "Iterable<$1>",
      dict: "Record<$1, $2>",
      Dict: "Record<$1, $2>",
      Mapping: "Readonly<Record<$1, $2>>",
      set: "Set<$1>",
      Set: "Set<$1>",
      frozenset: "ReadonlySet<$1>",
      tuple: "[$*]",
      Tuple: "[$*]",
      Optional: "$1 | null",
      Union: "$|",
      Callable: "(...args: unknown[]) => $2",
      datetime: "Date",
      date: "Date",
      Decimal: "string",
    },
  },
  "python->java": {
    missing: "Object",
    types: {
      int: "Integer",
      float: "Double",
      complex: "Object",
      str: "String",
      bool: "Boolean",
      bytes: "byte[]",
      bytearray: "byte[]",
      None: "Void",
      Any: "Object",
      object: "Object",
      list: "List<$1>",
      List: "List<$1>",
      Sequence: "List<$1>",
      Iterable: "Iterable<$1>",
      dict: "Map<$1, $2>",
      Dict: "Map<$1, $2>",
      Mapping: "Map<$1, $2>",
      set: "Set<$1>",
      Set: "Set<$1>",
      frozenset: "Set<$1>",
      tuple: "List<Object>",
      Tuple: "List<Object>",
      Optional: "Optional<$1>",
      Union: "Object",
      Callable: "Function<Object, $2>",
      datetime: "LocalDateTime",
      date: "LocalDate",
      Decimal: "BigDecimal",
    },
  },
};

export function hasTypeTable(sourceLanguage: string, targetLanguage: string): boolean {
  return Object.hasOwn(TYPE_TABLES, `${sourceLanguage}->${targetLanguage.toLowerCase()}`);
}

export interface TypeMappingResult {
  /** null when some part of the type has no mapping */
  target: string | null;
  /** Names that neither the table nor the known types cover */
  unmapped: string[];
}

/**
 * Maps an annotation through the table for (source, target). Names in
 * `knownTypes` (classes and enums the project declares) keep their name.
 */
export function mapDataType(
  typeText: string,
  sourceLanguage: string,
  targetLanguage: string,
  knownTypes: ReadonlySet<string> = new Set()
): TypeMappingResult {
  const table = TYPE_TABLES[`${sourceLanguage}->${targetLanguage.toLowerCase()}`];
  const expression = parseTypeExpression(typeText);
  if (!table || !expression) {
    return { target: null, unmapped: [typeText] };
  }

  const unmapped: string[] = [];
  const render = (node: TypeExpression): string => {
    const args = node.args.map(render);
    if (node.name === "[]") return args.join(", ");
    const template = table.types[node.name];
    if (template === undefined) {
      if (knownTypes.has(node.name)) return node.name;
      unmapped.push(node.name);
      return node.name;
    }
    return template
      .replace(/\$\*/g, args.join(", "))
      .replace(/\$\|/g, args.join(" | "))
      .replace(/\$(\d)/g, (_, position: string) => args[Number(position) - 1] ?? table.missing);
  };

  const target = render(expression);
  return unmapped.length > 0 ? { target: null, unmapped: [...new Set(unmapped)] } : { target, unmapped: [] };
}
