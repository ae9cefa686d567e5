import type {
  AddTupleRequest,
  RemoveTupleRequest,
  Tuple,
} from "../core/types.ts";

export interface TupleFilter {
  subjectType?: string;
  /** A relation name matches usersets of that relation; null matches plain subjects only */
  subjectRelation?: string | null;
}

export interface TupleStore {
  // === Read ===

  /** Tuples on one object for one relation, optionally narrowed by subject */
  listTuples(
    objectType: string,
    objectId: string,
    relation: string,
    filter?: TupleFilter,
  ): Promise<Tuple[]>;

  /** Tuples on one object across all relations */
  listObjectTuples(objectType: string, objectId: string): Promise<Tuple[]>;

  /** List candidate object IDs for list_objects (pre-filter, check still required) */
  listCandidateObjectIds(objectType: string): Promise<string[]>;

  // === Write ===

  /** Insert or update a tuple (upsert on natural key) */
  insertTuple(tuple: AddTupleRequest): Promise<void>;

  /** Delete a tuple by natural key */
  deleteTuple(tuple: RemoveTupleRequest): Promise<boolean>;
}

export function matchesFilter(tuple: Tuple, filter: TupleFilter | undefined): boolean {
  if (!filter) return true;
  if (filter.subjectType !== undefined && tuple.subjectType !== filter.subjectType) {
    return false;
  }
  if (filter.subjectRelation !== undefined && tuple.subjectRelation !== filter.subjectRelation) {
    return false;
  }
  return true;
}
