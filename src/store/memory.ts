import type {
  AddTupleRequest,
  RemoveTupleRequest,
  Tuple,
} from "../core/types.ts";
import { matchesFilter, type TupleFilter, type TupleStore } from "./interface.ts";

const objectKey = (objectType: string, objectId: string) => `${objectType}:${objectId}`;

function naturalKey(tuple: RemoveTupleRequest): string {
  return [
    tuple.relation,
    tuple.subjectType,
    tuple.subjectId,
    tuple.subjectRelation ?? "",
  ].join("\u0000");
}

/** Tuple store held in process memory, indexed by object */
export class MemoryTupleStore implements TupleStore {
  private readonly objects = new Map<string, Map<string, Tuple>>();

  constructor(tuples: Iterable<AddTupleRequest> = []) {
    for (const tuple of tuples) this.put(tuple);
  }

  async listTuples(
    objectType: string,
    objectId: string,
    relation: string,
    filter?: TupleFilter,
  ): Promise<Tuple[]> {
    const results: Tuple[] = [];
    for (const tuple of this.objects.get(objectKey(objectType, objectId))?.values() ?? []) {
      if (tuple.relation === relation && matchesFilter(tuple, filter)) {
        results.push(copy(tuple));
      }
    }
    return results;
  }

  async listObjectTuples(objectType: string, objectId: string): Promise<Tuple[]> {
    return [...(this.objects.get(objectKey(objectType, objectId))?.values() ?? [])].map(copy);
  }

  async listCandidateObjectIds(objectType: string): Promise<string[]> {
    const ids = new Set<string>();
    for (const tuples of this.objects.values()) {
      for (const tuple of tuples.values()) {
        if (tuple.objectType === objectType) ids.add(tuple.objectId);
      }
    }
    return [...ids];
  }

  async insertTuple(tuple: AddTupleRequest): Promise<void> {
    this.put(tuple);
  }

  async deleteTuple(tuple: RemoveTupleRequest): Promise<boolean> {
    const key = objectKey(tuple.objectType, tuple.objectId);
    const tuples = this.objects.get(key);
    if (!tuples?.delete(naturalKey(tuple))) return false;
    if (tuples.size === 0) this.objects.delete(key);
    return true;
  }

  /** Number of stored tuples */
  get size(): number {
    let count = 0;
    for (const tuples of this.objects.values()) count += tuples.size;
    return count;
  }

  private put(request: AddTupleRequest): void {
    const key = objectKey(request.objectType, request.objectId);
    let tuples = this.objects.get(key);
    if (!tuples) {
      tuples = new Map();
      this.objects.set(key, tuples);
    }
    tuples.set(naturalKey(request), {
      objectType: request.objectType,
      objectId: request.objectId,
      relation: request.relation,
      subjectType: request.subjectType,
      subjectId: request.subjectId,
      subjectRelation: request.subjectRelation ?? null,
      conditionName: request.conditionName ?? null,
      conditionContext: request.conditionContext ? { ...request.conditionContext } : null,
    });
  }
}

function copy(tuple: Tuple): Tuple {
  return {
    ...tuple,
    conditionContext: tuple.conditionContext ? { ...tuple.conditionContext } : null,
  };
}
