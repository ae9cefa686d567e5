/** Supported CEL parameter types */
export type ConditionParameterType =
  | "string"
  | "int"
  | "uint"
  | "bool"
  | "double"
  | "duration"
  | "timestamp"
  | "list"
  | "map"
  | "any";

/** An allowed subject on a direct relation: `user`, `team#member`, `user with cond` */
export interface SubjectSpec {
  type: string;
  relation: string | null;
  condition: string | null;
}

export type RelationExpression =
  | { kind: "direct"; subjects: SubjectSpec[] }
  | { kind: "union"; children: RelationExpression[] }
  | { kind: "tupleToUserset"; tupleset: string; relation: string }
  | { kind: "computed"; relation: string };

export interface RelationDefinition {
  name: string;
  expression: RelationExpression;
}

export interface TypeDefinition {
  name: string;
  relations: RelationDefinition[];
}

/** A named CEL condition definition */
export interface ConditionDefinition {
  name: string;
  expression: string;
  parameters: Record<string, ConditionParameterType>;
}

/** Uncompiled schema, as parsed from the DSL or loaded from JSON */
export interface SchemaDefinition {
  types: TypeDefinition[];
  conditions: ConditionDefinition[];
}

export const CONDITION_PARAMETER_TYPES: readonly ConditionParameterType[] = [
  "string",
  "int",
  "uint",
  "bool",
  "double",
  "duration",
  "timestamp",
  "list",
  "map",
  "any",
];

export function formatSubjectSpec(spec: SubjectSpec): string {
  const base = spec.relation ? `${spec.type}#${spec.relation}` : spec.type;
  return spec.condition ? `${base} with ${spec.condition}` : base;
}
