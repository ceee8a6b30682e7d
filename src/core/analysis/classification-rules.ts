/**
 * Rule-based component classification
 *
 * Rules run in tiers and the first tier with a single winning category
 * decides: file type, then path segments, then structure. A tier that
 * matches several categories is a tie; a tie or no match at all leaves the
 * file ambiguous for inference to settle.
 *
 * @module
 */

import type { ComponentType } from "../../types/entities.js";

// =============================================================================
// Types
// =============================================================================

type DecidedType = Exclude<ComponentType, "unknown">;

export interface ClassificationInput {
  path: string;
  language: string;
  /** Imported module names as written */
  imports: string[];
  functionCount: number;
  classes: Array<{ type: string; decorators: string[]; superclasses: string[] }>;
  enumCount: number;
}

export interface RuleDecision {
  /** null when the rules tie or find nothing */
  type: DecidedType | null;
  /** Every rule that fired, e.g. `language:html` or `path:/model` */
  signals: string[];
}

// =============================================================================
// Rule Tables
// =============================================================================

const LANGUAGE_TYPES: Record<string, DecidedType> = {
  html: "ui",
  css: "ui",
  scss: "ui",
  sass: "ui",
  less: "ui",
  react: "ui",
  vue: "ui",
  json: "config",
  yaml: "config",
  toml: "config",
  ini: "config",
  xml: "config",
  properties: "config",
  sql: "data",
  csv: "data",
};

const PATH_PATTERNS: ReadonlyArray<[DecidedType, string[]]> = [
  ["ui", ["/ui/", "/view", "/template", "/component"]],
  ["data", ["/data/", "/model", "/entity", "/schema"]],
  ["config", ["/config/", "/setting"]],
];

/** Top-level packages of UI toolkits */
const UI_LIBRARIES = new Set([
  "tkinter",
  "Tkinter",
  "wx",
  "PyQt5",
  "PyQt6",
  "PySide2",
  "PySide6",
  "kivy",
  "pygame",
  "streamlit",
  "dash",
  "gradio",
]);

/** Top-level packages of database and storage libraries */
const DATA_LIBRARIES = new Set([
  "sqlite3",
  "sqlalchemy",
  "psycopg2",
  "psycopg",
  "pymysql",
  "MySQLdb",
  "pymongo",
  "redis",
  "peewee",
  "pony",
  "tortoise",
  "mongoengine",
  "cassandra",
]);

/** Bases and decorators of plain record types */
const RECORD_MARKERS = new Set(["@dataclass", "@dataclasses.dataclass", "BaseModel", "NamedTuple", "TypedDict"]);

/** Languages whose files hold program logic */
export const CODE_LANGUAGES: ReadonlySet<string> = new Set([
  "python",
  "javascript",
  "typescript",
  "java",
  "kotlin",
  "csharp",
  "go",
  "ruby",
  "php",
  "c",
  "cpp",
  "cobol",
  "shell",
]);

// =============================================================================
// Rules
// =============================================================================

function decide(matches: Map<DecidedType, string[]>): RuleDecision | null {
  if (matches.size === 0) return null;
  const signals = [...matches.values()].flat();
  const [only] = [...matches.keys()];
  return { type: matches.size === 1 && only ? only : null, signals };
}

function byLanguage(input: ClassificationInput): RuleDecision | null {
  const type = LANGUAGE_TYPES[input.language];
  return type ? { type, signals: [`language:${input.language}`] } : null;
}

function byPath(input: ClassificationInput): RuleDecision | null {
  const normalized = `/${input.path.toLowerCase()}`;
  const matches = new Map<DecidedType, string[]>();
  for (const [type, patterns] of PATH_PATTERNS) {
    for (const pattern of patterns) {
      if (normalized.includes(pattern)) {
        matches.set(type, [...(matches.get(type) ?? []), `path:${pattern}`]);
      }
    }
  }
  return decide(matches);
}

function isRecordClass(cls: ClassificationInput["classes"][number]): boolean {
  return (
    cls.type === "dataclass" ||
    cls.decorators.some((decorator) => RECORD_MARKERS.has(decorator)) ||
    cls.superclasses.some((base) => RECORD_MARKERS.has(base.split(".").pop() ?? base))
  );
}

function byStructure(input: ClassificationInput): RuleDecision | null {
  const matches = new Map<DecidedType, string[]>();
  const add = (type: DecidedType, signal: string): void => {
    matches.set(type, [...(matches.get(type) ?? []), signal]);
  };

  for (const module of input.imports) {
    // relative imports name project modules, never libraries
    if (module.startsWith(".")) continue;
    const root = module.split(".")[0] ?? module;
    if (UI_LIBRARIES.has(root)) add("ui", `import:${root}`);
    if (DATA_LIBRARIES.has(root)) add("data", `import:${root}`);
  }

  const declares = input.enumCount + input.classes.length;
  if (declares > 0 && input.functionCount === 0 && input.classes.every(isRecordClass)) {
    add("data", "declares:records");
  }

  return decide(matches);
}

/**
 * Applies the rule tiers in order. A tier that ties stops the walk: later
 * tiers are weaker evidence and must not break it.
 */
export function classifyByRules(input: ClassificationInput): RuleDecision {
  for (const rule of [byLanguage, byPath, byStructure]) {
    const decision = rule(input);
    if (decision) return decision;
  }
  return { type: null, signals: [] };
}

export function fallbackType(language: string): ComponentType {
  return CODE_LANGUAGES.has(language) ? "logic" : "unknown";
}
