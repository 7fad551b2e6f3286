/**
 * Symbol / field validation for define statements.
 *
 * Builds the define table for one compile invocation and checks every
 * define against the structural invariants. All defines are checked; each
 * violation is reported at the field (or statement) it concerns.
 */
import type { DiagnosticReporter } from "./diagnostics.js";
import { LIST_TYPE, PRIMITIVE_TYPES, type Define, type DefineField, type SourcePos, type Tags } from "./types.js";

/** Define name → first define declared under that name */
export type DefineTable = ReadonlyMap<string, Define>;

export function hasTag(define: Define, tag: string): boolean {
  return define.tags.items.some((t) => t.value === tag);
}

/** Fields typed `ExprList` hold a variable number of child expressions */
export function isListField(field: DefineField): boolean {
  return field.type.value === LIST_TYPE;
}

/**
 * A private field carries operator-specific payload. Its type is a define
 * tagged [Private], or an externally supplied type named `...Private`.
 */
export function isPrivateField(field: DefineField, table: DefineTable): boolean {
  const type = field.type.value;
  const define = table.get(type);
  if (define) return hasTag(define, "Private");
  return type.endsWith("Private");
}

/** Shape a define's tags give it */
export function defineShape(define: Define): "ref" | "value" | "slice" {
  if (hasTag(define, "Value")) return "value";
  if (hasTag(define, "Slice")) return "slice";
  return "ref";
}

/**
 * `unparsed` names defines whose statements failed to parse; fields typed
 * with one of them are not reported again as unknown types.
 */
export function validateDefines(
  defines: readonly Define[],
  reporter: DiagnosticReporter,
  unparsed: ReadonlySet<string> = new Set<string>(),
): DefineTable {
  const table = new Map<string, Define>();
  for (const define of defines) {
    if (!table.has(define.name.value)) table.set(define.name.value, define);
  }

  for (const define of defines) {
    const name = define.name.value;
    if (table.get(name) !== define) {
      reporter.error("semantic", define.src, `duplicate '${name}' define statement`);
      continue;
    }
    checkTags(define, reporter);
    checkFields(define, table, unparsed, reporter);
    checkFieldOrder(define, table, reporter);
  }
  return table;
}

/** Tags are a set: every repeat is reported at the repeated tag */
export function checkDuplicateTags(tags: Tags, at: SourcePos, reporter: DiagnosticReporter): void {
  const seen = new Set<string>();
  for (const tag of tags.items) {
    if (seen.has(tag.value)) {
      reporter.error("semantic", tag.src ?? at, `duplicate tag '${tag.value}'`);
    }
    seen.add(tag.value);
  }
}

function checkTags(define: Define, reporter: DiagnosticReporter): void {
  checkDuplicateTags(define.tags, define.src, reporter);

  const name = define.name.value;
  const count = define.fields.items.length;
  if (hasTag(define, "Value") && hasTag(define, "Slice")) {
    reporter.error("semantic", define.src, `define '${name}' cannot be both Value and Slice`);
  } else if (hasTag(define, "Value") && count !== 1) {
    reporter.error("semantic", define.src, `value define '${name}' must declare exactly one field`);
  } else if (hasTag(define, "Slice") && count !== 1) {
    reporter.error("semantic", define.src, `slice define '${name}' must declare exactly one field`);
  }
}

function checkFields(
  define: Define,
  table: DefineTable,
  unparsed: ReadonlySet<string>,
  reporter: DiagnosticReporter,
): void {
  const name = define.name.value;
  const seen = new Set<string>();
  for (const field of define.fields.items) {
    const fieldName = field.name.value;
    if (seen.has(fieldName)) {
      reporter.error("semantic", field.src, `duplicate field '${fieldName}' in '${name}'`);
    }
    seen.add(fieldName);

    const type = field.type.value;
    if (!PRIMITIVE_TYPES.has(type) && !table.has(type) && !unparsed.has(type) && !type.endsWith("Private")) {
      reporter.error("semantic", field.src, `unknown type '${type}' for field '${fieldName}' in '${name}'`);
    }
  }
}

/**
 * Private field last; list field last among the non-private ones.
 * At most one diagnostic of each kind per define.
 */
function checkFieldOrder(define: Define, table: DefineTable, reporter: DiagnosticReporter): void {
  const name = define.name.value;
  const fields = define.fields.items;

  const misplacedPrivate = fields.find((f, i) => isPrivateField(f, table) && i !== fields.length - 1);
  if (misplacedPrivate) {
    reporter.error(
      "semantic",
      misplacedPrivate.src,
      `private field '${misplacedPrivate.name.value}' is not the last field in '${name}'`,
    );
  }

  const nonPrivate = fields.filter((f) => !isPrivateField(f, table));
  const misplacedList = nonPrivate.find((f, i) => isListField(f) && i !== nonPrivate.length - 1);
  if (misplacedList) {
    reporter.error(
      "semantic",
      misplacedList.src,
      `list field '${misplacedList.name.value}' is not the last non-private field in '${name}'`,
    );
  }
}
