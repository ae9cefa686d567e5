import type { RelationExpression, SubjectSpec } from "../schema/types.ts";
import { type EngineDeps, EvaluationScope, memoKey } from "./scope.ts";
import type { CheckOptions, CheckRequest } from "./types.ts";

/**
 * Result of one sub-evaluation. `cyclic` marks a false that came from cutting
 * a cycle or hitting the depth limit; such results hold only for the path
 * that produced them and are never memoized.
 */
interface Outcome {
  allowed: boolean;
  cyclic: boolean;
}

const ALLOWED: Outcome = { allowed: true, cyclic: false };
const DENIED: Outcome = { allowed: false, cyclic: false };
const CUT: Outcome = { allowed: false, cyclic: true };

interface ObjectRef {
  objectType: string;
  objectId: string;
  relation: string;
}

class CheckScope extends EvaluationScope<Outcome> {
  readonly subjectType: string;
  readonly subjectId: string;

  constructor(deps: EngineDeps, request: CheckRequest, options: CheckOptions) {
    super(deps, request.context, options);
    this.subjectType = request.subjectType;
    this.subjectId = request.subjectId;
  }

  key(ref: ObjectRef): string {
    return memoKey(
      ref.objectType,
      ref.objectId,
      ref.relation,
      this.subjectType,
      this.subjectId,
      this.contextSignature,
    );
  }
}

/**
 * Decide whether the subject holds the relation on the object.
 *
 * Throws UnknownRelationError when the relation is not defined on the type,
 * and CheckCancelledError when the signal aborts mid-evaluation.
 */
export async function check(
  deps: EngineDeps,
  request: CheckRequest,
  options: CheckOptions = {},
): Promise<boolean> {
  deps.schema.getRelation(request.objectType, request.relation);
  const scope = new CheckScope(deps, request, options);
  const outcome = await resolve(
    scope,
    {
      objectType: request.objectType,
      objectId: request.objectId,
      relation: request.relation,
    },
    new Set(),
    0,
  );
  return outcome.allowed;
}

async function resolve(
  scope: CheckScope,
  ref: ObjectRef,
  path: ReadonlySet<string>,
  depth: number,
): Promise<Outcome> {
  scope.throwIfCancelled();

  const key = scope.key(ref);
  const memoized = scope.recall(key);
  if (memoized) return memoized;

  if (path.has(key)) {
    scope.logger.debug("Cycle cut during check", { ...ref });
    return CUT;
  }
  if (depth > scope.maxDepth) {
    scope.logger.warn("Check exceeded maximum depth", {
      ...ref,
      maxDepth: scope.maxDepth,
    });
    return CUT;
  }

  const expression = scope.schema.findRelation(ref.objectType, ref.relation);
  if (!expression) return DENIED;

  const branchPath = new Set(path).add(key);
  const outcome = await evaluate(scope, ref, expression, branchPath, depth);
  if (outcome.allowed || !outcome.cyclic) scope.remember(key, outcome);
  return outcome;
}

async function evaluate(
  scope: CheckScope,
  ref: ObjectRef,
  expression: RelationExpression,
  path: ReadonlySet<string>,
  depth: number,
): Promise<Outcome> {
  switch (expression.kind) {
    case "direct":
      return evaluateDirect(scope, ref, expression.subjects, path, depth);

    case "union": {
      let cyclic = false;
      for (const child of expression.children) {
        const outcome = await evaluate(scope, ref, child, path, depth);
        if (outcome.allowed) return ALLOWED;
        cyclic ||= outcome.cyclic;
      }
      return cyclic ? CUT : DENIED;
    }

    case "computed":
      return resolve(
        scope,
        { ...ref, relation: expression.relation },
        path,
        depth + 1,
      );

    case "tupleToUserset": {
      const targets = await scope.store.listTuples(
        ref.objectType,
        ref.objectId,
        expression.tupleset,
        { subjectRelation: null },
      );
      const edgeSpecs = scope.schema.directSpecs(ref.objectType, expression.tupleset);
      let cyclic = false;
      for (const target of targets) {
        const specs = edgeSpecs.filter(
          (spec) => spec.type === target.subjectType && !spec.relation,
        );
        if (!scope.tupleGrants(specs, target)) continue;
        const outcome = await resolve(
          scope,
          {
            objectType: target.subjectType,
            objectId: target.subjectId,
            relation: expression.relation,
          },
          path,
          depth + 1,
        );
        if (outcome.allowed) return ALLOWED;
        cyclic ||= outcome.cyclic;
      }
      return cyclic ? CUT : DENIED;
    }
  }
}

async function evaluateDirect(
  scope: CheckScope,
  ref: ObjectRef,
  subjects: readonly SubjectSpec[],
  path: ReadonlySet<string>,
  depth: number,
): Promise<Outcome> {
  const concrete = subjects.filter(
    (spec) => !spec.relation && spec.type === scope.subjectType,
  );
  if (concrete.length > 0) {
    const tuples = await scope.store.listTuples(
      ref.objectType,
      ref.objectId,
      ref.relation,
      { subjectType: scope.subjectType, subjectRelation: null },
    );
    for (const tuple of tuples) {
      if (tuple.subjectId === scope.subjectId && scope.tupleGrants(concrete, tuple)) {
        return ALLOWED;
      }
    }
  }

  let cyclic = false;
  for (const userset of groupUsersetSpecs(subjects)) {
    const tuples = await scope.store.listTuples(
      ref.objectType,
      ref.objectId,
      ref.relation,
      { subjectType: userset.type, subjectRelation: userset.relation },
    );
    for (const tuple of tuples) {
      if (!scope.tupleGrants(userset.specs, tuple)) continue;
      const outcome = await resolve(
        scope,
        {
          objectType: userset.type,
          objectId: tuple.subjectId,
          relation: userset.relation,
        },
        path,
        depth + 1,
      );
      if (outcome.allowed) return ALLOWED;
      cyclic ||= outcome.cyclic;
    }
  }
  return cyclic ? CUT : DENIED;
}

export interface UsersetGroup {
  type: string;
  relation: string;
  specs: SubjectSpec[];
}

/** Userset specs grouped by `type#relation`; the same userset may appear with several conditions */
export function groupUsersetSpecs(subjects: readonly SubjectSpec[]): UsersetGroup[] {
  const groups = new Map<string, UsersetGroup>();
  for (const spec of subjects) {
    if (!spec.relation) continue;
    const name = `${spec.type}#${spec.relation}`;
    const group = groups.get(name);
    if (group) group.specs.push(spec);
    else groups.set(name, { type: spec.type, relation: spec.relation, specs: [spec] });
  }
  return [...groups.values()];
}
