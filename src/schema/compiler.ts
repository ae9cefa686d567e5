import {
  ConditionEvaluator,
  compileCelCondition,
  type NativeCondition,
  type RegisteredCondition,
} from "../core/conditions.ts";
import { SchemaError, UnknownRelationError } from "../core/errors.ts";
import {
  formatSubjectSpec,
  type RelationExpression,
  type SchemaDefinition,
  type SubjectSpec,
} from "./types.ts";

export interface CompileOptions {
  /** Predicates implemented in code, usable in `with` clauses like declared conditions */
  conditions?: Record<string, NativeCondition>;
}

/** A relation used as a hierarchy edge by some tuple-to-userset on its type */
export interface HierarchyRelation {
  relation: string;
  targetTypes: string[];
}

type RelationTable = ReadonlyMap<string, ReadonlyMap<string, RelationExpression>>;

/** Immutable, validated schema: object types, their relations and the condition registry */
export class CompiledSchema {
  readonly conditions: ConditionEvaluator;
  private readonly types: RelationTable;

  constructor(types: RelationTable, conditions: ConditionEvaluator) {
    this.types = types;
    this.conditions = conditions;
    Object.freeze(this);
  }

  hasType(type: string): boolean {
    return this.types.has(type);
  }

  typeNames(): string[] {
    return [...this.types.keys()];
  }

  relationsOf(type: string): string[] {
    return [...(this.types.get(type)?.keys() ?? [])];
  }

  findRelation(type: string, relation: string): RelationExpression | undefined {
    return this.types.get(type)?.get(relation);
  }

  getRelation(type: string, relation: string): RelationExpression {
    const expression = this.findRelation(type, relation);
    if (!expression) throw new UnknownRelationError(type, relation);
    return expression;
  }

  hierarchyRelations(type: string): HierarchyRelation[] {
    const tuplesets = new Set<string>();
    for (const expression of this.types.get(type)?.values() ?? []) {
      walk(expression, (node) => {
        if (node.kind === "tupleToUserset") tuplesets.add(node.tupleset);
      });
    }
    return [...tuplesets].map((relation) => ({
      relation,
      targetTypes: [
        ...new Set(this.directSpecs(type, relation).map((spec) => spec.type)),
      ],
    }));
  }

  /** Direct subject specs of a relation, across its own union branches */
  directSpecs(type: string, relation: string): SubjectSpec[] {
    const specs: SubjectSpec[] = [];
    walk(this.getRelation(type, relation), (node) => {
      if (node.kind === "direct") specs.push(...node.subjects);
    });
    return specs;
  }
}

function walk(
  expression: RelationExpression,
  visit: (node: RelationExpression) => void,
): void {
  visit(expression);
  if (expression.kind === "union") {
    for (const child of expression.children) walk(child, visit);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const inner of Object.values(value)) deepFreeze(inner);
  }
  return value;
}

export function compileSchema(
  definition: SchemaDefinition,
  options: CompileOptions = {},
): CompiledSchema {
  const registered: RegisteredCondition[] = [];
  const conditionNames = new Set<string>();
  for (const condition of definition.conditions) {
    if (conditionNames.has(condition.name)) {
      throw new SchemaError(`Duplicate condition '${condition.name}'`);
    }
    conditionNames.add(condition.name);
    registered.push(compileCelCondition(condition));
  }
  for (const [name, native] of Object.entries(options.conditions ?? {})) {
    if (conditionNames.has(name)) {
      throw new SchemaError(`Duplicate condition '${name}'`);
    }
    conditionNames.add(name);
    registered.push({ name, parameters: { ...native.parameters }, predicate: native.predicate });
  }

  const types = new Map<string, Map<string, RelationExpression>>();
  for (const type of definition.types) {
    if (types.has(type.name)) {
      throw new SchemaError(`Duplicate type '${type.name}'`);
    }
    const relations = new Map<string, RelationExpression>();
    for (const relation of type.relations) {
      if (relations.has(relation.name)) {
        throw new SchemaError(`Duplicate relation '${type.name}.${relation.name}'`);
      }
      relations.set(relation.name, deepFreeze(structuredClone(relation.expression)));
    }
    types.set(type.name, relations);
  }

  for (const [typeName, relations] of types) {
    for (const [relationName, expression] of relations) {
      walk(expression, (node) =>
        validateNode(types, conditionNames, typeName, relationName, node),
      );
    }
  }

  assertTerminating(types);

  return new CompiledSchema(types, new ConditionEvaluator(registered));
}

function validateNode(
  types: RelationTable,
  conditionNames: ReadonlySet<string>,
  typeName: string,
  relationName: string,
  node: RelationExpression,
): void {
  const where = `${typeName}.${relationName}`;
  switch (node.kind) {
    case "direct":
      if (node.subjects.length === 0) {
        throw new SchemaError(`${where}: direct subject list is empty`);
      }
      for (const spec of node.subjects) {
        const subjectRelations = types.get(spec.type);
        if (!subjectRelations) {
          throw new SchemaError(`${where}: unknown subject type '${spec.type}'`);
        }
        if (spec.relation && !subjectRelations.has(spec.relation)) {
          throw new SchemaError(
            `${where}: '${formatSubjectSpec(spec)}' refers to undefined relation ${spec.type}.${spec.relation}`,
          );
        }
        if (spec.condition && !conditionNames.has(spec.condition)) {
          throw new SchemaError(`${where}: unknown condition '${spec.condition}'`);
        }
      }
      return;
    case "union":
      if (node.children.length === 0) {
        throw new SchemaError(`${where}: union has no branches`);
      }
      return;
    case "computed":
      if (!types.get(typeName)?.has(node.relation)) {
        throw new SchemaError(`${where}: refers to undefined relation ${typeName}.${node.relation}`);
      }
      return;
    case "tupleToUserset": {
      const tupleset = types.get(typeName)?.get(node.tupleset);
      if (!tupleset) {
        throw new SchemaError(
          `${where}: hierarchy relation ${typeName}.${node.tupleset} is not defined`,
        );
      }
      if (tupleset.kind !== "direct" || tupleset.subjects.some((spec) => spec.relation)) {
        throw new SchemaError(
          `${where}: hierarchy relation ${typeName}.${node.tupleset} must be a plain direct relation`,
        );
      }
      for (const spec of tupleset.subjects) {
        if (!types.get(spec.type)?.has(node.relation)) {
          throw new SchemaError(
            `${where}: '${node.relation} from ${node.tupleset}' requires ${spec.type}.${node.relation}`,
          );
        }
      }
      return;
    }
  }
}

/**
 * Every relation must have some evaluation path that reaches a direct
 * assignment. Relations that only ever lead back to themselves (`view from
 * parent` alone, or `a: b` with `b: a`) are rejected.
 */
function assertTerminating(types: RelationTable): void {
  const grounded = new Set<string>();
  const key = (type: string, relation: string) => `${type}#${relation}`;

  const canGround = (typeName: string, node: RelationExpression): boolean => {
    switch (node.kind) {
      case "direct":
        return node.subjects.some(
          (spec) => !spec.relation || grounded.has(key(spec.type, spec.relation)),
        );
      case "union":
        return node.children.some((child) => canGround(typeName, child));
      case "computed":
        return grounded.has(key(typeName, node.relation));
      case "tupleToUserset": {
        const tupleset = types.get(typeName)?.get(node.tupleset);
        if (tupleset?.kind !== "direct") return false;
        return tupleset.subjects.some((spec) =>
          grounded.has(key(spec.type, node.relation)),
        );
      }
    }
  };

  let changed = true;
  while (changed) {
    changed = false;
    for (const [typeName, relations] of types) {
      for (const [relationName, expression] of relations) {
        const k = key(typeName, relationName);
        if (!grounded.has(k) && canGround(typeName, expression)) {
          grounded.add(k);
          changed = true;
        }
      }
    }
  }

  for (const [typeName, relations] of types) {
    for (const relationName of relations.keys()) {
      if (!grounded.has(key(typeName, relationName))) {
        throw new SchemaError(
          `Relation ${typeName}.${relationName} cannot terminate: every branch cycles back without reaching a direct assignment`,
        );
      }
    }
  }
}
