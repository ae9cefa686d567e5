import { parse } from "@marcbachmann/cel-js";
import type { ConditionDefinition, ConditionParameterType } from "../schema/types.ts";
import {
  ConditionEvaluationError,
  ConditionNotFoundError,
  ConditionParamError,
  SchemaError,
} from "./errors.ts";
import type { Tuple } from "./types.ts";

export type ConditionPredicate = (
  params: Readonly<Record<string, unknown>>,
) => boolean;

/** A condition registered in code instead of declared in the schema */
export interface NativeCondition {
  parameters: Record<string, ConditionParameterType>;
  predicate: ConditionPredicate;
}

export interface RegisteredCondition extends NativeCondition {
  name: string;
}

const CEL_BUILTIN_IDENTIFIERS = new Set([
  "true",
  "false",
  "null",
  "in",
  "as",
  "break",
  "const",
  "continue",
  "else",
  "for",
  "function",
  "if",
  "import",
  "let",
  "loop",
  "package",
  "namespace",
  "return",
  "var",
  "void",
  "while",
  "int",
  "uint",
  "double",
  "bool",
  "string",
  "bytes",
  "list",
  "map",
  "type",
  "dyn",
  "null_type",
]);

const STRING_LITERAL =
  /[rRbB]{0,2}("""[\s\S]*?"""|'''[\s\S]*?'''|"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*')/g;
const MACRO_VARIABLE = /\.\s*(?:all|exists|exists_one|map|filter)\s*\(\s*([A-Za-z_]\w*)\s*,/g;
const IDENTIFIER = /\b[A-Za-z_]\w*/g;

/**
 * Free variables of a CEL expression: identifiers that are not member
 * selections, function names, keywords or macro-bound variables.
 */
export function referencedIdentifiers(expression: string): string[] {
  const source = expression.replace(STRING_LITERAL, '""');
  const bound = new Set(
    [...source.matchAll(MACRO_VARIABLE)].map((match) => match[1] ?? ""),
  );
  const found = new Set<string>();
  for (const match of source.matchAll(IDENTIFIER)) {
    const name = match[0];
    const index = match.index ?? 0;
    const before = source.slice(0, index).trimEnd();
    const after = source.slice(index + name.length).trimStart();
    if (before.endsWith(".") || after.startsWith("(")) continue;
    if (CEL_BUILTIN_IDENTIFIERS.has(name) || bound.has(name)) continue;
    found.add(name);
  }
  return [...found];
}

/**
 * Compile a schema-declared CEL condition once. Syntax errors and references
 * to undeclared parameters surface as SchemaError.
 */
export function compileCelCondition(
  definition: ConditionDefinition,
): RegisteredCondition {
  let program: ReturnType<typeof parse>;
  try {
    program = parse(definition.expression);
  } catch (err) {
    throw new SchemaError(
      `Condition '${definition.name}' has an invalid expression: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  for (const identifier of referencedIdentifiers(definition.expression)) {
    if (!Object.hasOwn(definition.parameters, identifier)) {
      throw new SchemaError(
        `Condition '${definition.name}' references undeclared parameter '${identifier}'`,
      );
    }
  }
  return {
    name: definition.name,
    parameters: definition.parameters,
    predicate: (params) => {
      const result: unknown = program({ ...params });
      if (typeof result !== "boolean") {
        throw new TypeError(`expected a bool result, got ${typeof result}`);
      }
      return result;
    },
  };
}

export class ConditionEvaluator {
  private readonly conditions: ReadonlyMap<string, RegisteredCondition>;

  constructor(conditions: Iterable<RegisteredCondition> = []) {
    const map = new Map<string, RegisteredCondition>();
    for (const condition of conditions) {
      map.set(condition.name, condition);
    }
    this.conditions = map;
  }

  has(name: string): boolean {
    return this.conditions.has(name);
  }

  get(name: string): RegisteredCondition {
    const condition = this.conditions.get(name);
    if (!condition) throw new ConditionNotFoundError(name);
    return condition;
  }

  names(): string[] {
    return [...this.conditions.keys()];
  }

  /**
   * Evaluate a condition against the tuple's stored parameters merged with the
   * request context. Stored parameters win over request values of the same name.
   */
  evaluate(
    name: string,
    storedParams: Readonly<Record<string, unknown>> | null,
    requestContext: Readonly<Record<string, unknown>> | undefined,
  ): boolean {
    const condition = this.get(name);
    const stored = storedParams ?? {};
    assertDeclaredParameters(condition, stored);

    const params: Record<string, unknown> = {};
    for (const [param, type] of Object.entries(condition.parameters)) {
      let value: unknown;
      if (Object.hasOwn(stored, param)) {
        value = stored[param];
      } else if (requestContext && Object.hasOwn(requestContext, param)) {
        value = requestContext[param];
      }
      if (value === undefined) {
        throw new ConditionParamError(name, param, "missing value");
      }
      if (!matchesParameterType(value, type)) {
        throw new ConditionParamError(name, param, `expected ${type}`);
      }
      params[param] = value;
    }

    try {
      return condition.predicate(params);
    } catch (err) {
      throw new ConditionEvaluationError(name, err);
    }
  }
}

/** Stored parameter names must be a subset of the declared ones */
export function assertDeclaredParameters(
  condition: RegisteredCondition,
  stored: Readonly<Record<string, unknown>>,
): void {
  for (const param of Object.keys(stored)) {
    if (!Object.hasOwn(condition.parameters, param)) {
      throw new ConditionParamError(condition.name, param, "not declared");
    }
  }
}

export function matchesParameterType(
  value: unknown,
  type: ConditionParameterType,
): boolean {
  switch (type) {
    case "string":
    case "duration":
      return typeof value === "string";
    case "int":
      return typeof value === "bigint" || Number.isInteger(value);
    case "uint":
      return (
        (typeof value === "bigint" && value >= 0n) ||
        (typeof value === "number" && Number.isInteger(value) && value >= 0)
      );
    case "double":
      return typeof value === "number";
    case "bool":
      return typeof value === "boolean";
    case "timestamp":
      return typeof value === "string" || value instanceof Date;
    case "list":
      return Array.isArray(value);
    case "map":
      return typeof value === "object" && value !== null && !Array.isArray(value);
    case "any":
      return true;
  }
}

/** True when the tuple carries no condition or its condition holds */
export function evaluateTupleCondition(
  evaluator: ConditionEvaluator,
  tuple: Pick<Tuple, "conditionName" | "conditionContext">,
  context: Readonly<Record<string, unknown>> | undefined,
): boolean {
  if (!tuple.conditionName) return true;
  return evaluator.evaluate(tuple.conditionName, tuple.conditionContext, context);
}
