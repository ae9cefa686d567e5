import type { RelationExpression, SubjectSpec } from "../schema/types.ts";
import { type EngineDeps, EvaluationScope, memoKey } from "./scope.ts";
import type { CheckOptions, ExpandRequest, Subject } from "./types.ts";

/** Subjects keyed by `type:id`, in first-seen order */
type SubjectSet = Map<string, Subject>;

interface Expansion {
  subjects: SubjectSet;
  /** Some branch was cut by a cycle or the depth limit, so the set may be partial */
  cyclic: boolean;
}

interface ObjectRef {
  objectType: string;
  objectId: string;
  relation: string;
}

class ExpandScope extends EvaluationScope<Expansion> {
  key(ref: ObjectRef): string {
    return memoKey(ref.objectType, ref.objectId, ref.relation, this.contextSignature);
  }
}

/**
 * Every concrete subject holding the relation on the object, deduplicated.
 * Usersets are followed to their members; conditional tuples contribute only
 * when their condition holds under `request.context`.
 */
export async function expand(
  deps: EngineDeps,
  request: ExpandRequest,
  options: CheckOptions = {},
): Promise<Subject[]> {
  deps.schema.getRelation(request.objectType, request.relation);
  const scope = new ExpandScope(deps, request.context, options);
  const expansion = await resolve(
    scope,
    {
      objectType: request.objectType,
      objectId: request.objectId,
      relation: request.relation,
    },
    new Set(),
    0,
  );
  return [...expansion.subjects.values()];
}

async function resolve(
  scope: ExpandScope,
  ref: ObjectRef,
  path: ReadonlySet<string>,
  depth: number,
): Promise<Expansion> {
  scope.throwIfCancelled();

  const key = scope.key(ref);
  const memoized = scope.recall(key);
  if (memoized) return memoized;

  if (path.has(key)) {
    scope.logger.debug("Cycle cut during expand", { ...ref });
    return { subjects: new Map(), cyclic: true };
  }
  if (depth > scope.maxDepth) {
    scope.logger.warn("Expand exceeded maximum depth", {
      ...ref,
      maxDepth: scope.maxDepth,
    });
    return { subjects: new Map(), cyclic: true };
  }

  const expression = scope.schema.findRelation(ref.objectType, ref.relation);
  if (!expression) return { subjects: new Map(), cyclic: false };

  const result: Expansion = { subjects: new Map(), cyclic: false };
  await collect(scope, ref, expression, new Set(path).add(key), depth, result);
  if (!result.cyclic) scope.remember(key, result);
  return result;
}

function merge(into: Expansion, from: Expansion): void {
  for (const [key, subject] of from.subjects) {
    if (!into.subjects.has(key)) into.subjects.set(key, subject);
  }
  into.cyclic ||= from.cyclic;
}

function add(into: Expansion, subjectType: string, subjectId: string): void {
  const key = `${subjectType}:${subjectId}`;
  if (!into.subjects.has(key)) into.subjects.set(key, { subjectType, subjectId });
}

async function collect(
  scope: ExpandScope,
  ref: ObjectRef,
  expression: RelationExpression,
  path: ReadonlySet<string>,
  depth: number,
  into: Expansion,
): Promise<void> {
  switch (expression.kind) {
    case "direct":
      await collectDirect(scope, ref, expression.subjects, path, depth, into);
      return;

    case "union":
      for (const child of expression.children) {
        await collect(scope, ref, child, path, depth, into);
      }
      return;

    case "computed":
      merge(
        into,
        await resolve(scope, { ...ref, relation: expression.relation }, path, depth + 1),
      );
      return;

    case "tupleToUserset": {
      const targets = await scope.store.listTuples(
        ref.objectType,
        ref.objectId,
        expression.tupleset,
        { subjectRelation: null },
      );
      const edgeSpecs = scope.schema.directSpecs(ref.objectType, expression.tupleset);
      for (const target of targets) {
        const specs = edgeSpecs.filter(
          (spec) => spec.type === target.subjectType && !spec.relation,
        );
        if (!scope.tupleGrants(specs, target)) continue;
        merge(
          into,
          await resolve(
            scope,
            {
              objectType: target.subjectType,
              objectId: target.subjectId,
              relation: expression.relation,
            },
            path,
            depth + 1,
          ),
        );
      }
      return;
    }
  }
}

async function collectDirect(
  scope: ExpandScope,
  ref: ObjectRef,
  subjects: readonly SubjectSpec[],
  path: ReadonlySet<string>,
  depth: number,
  into: Expansion,
): Promise<void> {
  const tuples = await scope.store.listTuples(ref.objectType, ref.objectId, ref.relation);
  for (const tuple of tuples) {
    const specs = subjects.filter(
      (spec) =>
        spec.type === tuple.subjectType && spec.relation === tuple.subjectRelation,
    );
    if (!scope.tupleGrants(specs, tuple)) continue;

    if (tuple.subjectRelation === null) {
      add(into, tuple.subjectType, tuple.subjectId);
      continue;
    }
    merge(
      into,
      await resolve(
        scope,
        {
          objectType: tuple.subjectType,
          objectId: tuple.subjectId,
          relation: tuple.subjectRelation,
        },
        path,
        depth + 1,
      ),
    );
  }
}
