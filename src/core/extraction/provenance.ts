/**
 * Per-field provenance
 *
 * Merges the parser's answer, the inference answer and a fallback for one
 * field. A syntactic value always wins; when inference disagrees the
 * disagreement is kept as a FieldConflict.
 *
 * @module
 */

import type { FieldConflict, PropertyValue, Provenance } from "../../types/entities.js";

export interface MergedField<T extends PropertyValue> {
  value: T;
  provenance: Provenance;
  conflict: FieldConflict | null;
}

export function mergeField<T extends PropertyValue>(
  field: string,
  syntax: T | null,
  inference: T | null | undefined,
  fallback: T
): MergedField<T> {
  if (syntax !== null) {
    const disagrees = inference !== null && inference !== undefined && inference !== syntax;
    return {
      value: syntax,
      provenance: "syntax",
      conflict: disagrees ? { field, syntax, inference, winner: "syntax" } : null,
    };
  }
  if (inference !== null && inference !== undefined) {
    return { value: inference, provenance: "inference", conflict: null };
  }
  return { value: fallback, provenance: "default", conflict: null };
}

/**
 * Collects provenance and conflicts while an entity's fields are merged.
 *
 * @example
 * ```typescript
 * const tracker = new ProvenanceTracker("syntax");
 * const kind = tracker.merge("type", "singleton", "plain", "plain");
 * kind;                  // "singleton"
 * tracker.conflicts;     // [{ field: "type", syntax: "singleton", inference: "plain", winner: "syntax" }]
 * ```
 */
export class ProvenanceTracker {
  readonly provenance: Record<string, Provenance> = {};
  readonly conflicts: FieldConflict[] = [];

  /** @param origin - who produced the fields recorded with `set` */
  constructor(private readonly origin: Provenance) {}

  set<T extends PropertyValue>(field: string, value: T): T {
    this.provenance[field] = this.origin;
    return value;
  }

  /**
   * `primary` is the skeleton's value; for a skeleton that inference
   * produced it counts as an inference answer.
   */
  merge<T extends PropertyValue>(field: string, primary: T | null, inference: T | null | undefined, fallback: T): T {
    const merged =
      this.origin === "syntax"
        ? mergeField(field, primary, inference, fallback)
        : mergeField(field, null, primary ?? inference, fallback);
    this.provenance[field] = merged.provenance;
    if (merged.conflict) this.conflicts.push(merged.conflict);
    return merged.value;
  }
}
