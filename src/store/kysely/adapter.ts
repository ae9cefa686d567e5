import type { Kysely, Selectable } from "kysely";
import type {
  AddTupleRequest,
  RemoveTupleRequest,
  Tuple,
} from "../../core/types.ts";
import type { TupleFilter, TupleStore } from "../interface.ts";
import type { DB, TuplesTable } from "./schema.ts";

const NATURAL_KEY = [
  "object_type",
  "object_id",
  "relation",
  "subject_type",
  "subject_id",
  "subject_relation",
] as const;

export class KyselyTupleStore implements TupleStore {
  private readonly db: Kysely<DB>;

  constructor(db: Kysely<DB>) {
    this.db = db;
  }

  async listTuples(
    objectType: string,
    objectId: string,
    relation: string,
    filter?: TupleFilter,
  ): Promise<Tuple[]> {
    let query = this.db
      .selectFrom("tuples")
      .selectAll()
      .where("object_type", "=", objectType)
      .where("object_id", "=", objectId)
      .where("relation", "=", relation);
    if (filter?.subjectType !== undefined) {
      query = query.where("subject_type", "=", filter.subjectType);
    }
    if (filter?.subjectRelation !== undefined) {
      query = query.where("subject_relation", "=", filter.subjectRelation ?? "");
    }
    const rows = await query.execute();
    return rows.map(toTuple);
  }

  async listObjectTuples(objectType: string, objectId: string): Promise<Tuple[]> {
    const rows = await this.db
      .selectFrom("tuples")
      .selectAll()
      .where("object_type", "=", objectType)
      .where("object_id", "=", objectId)
      .execute();
    return rows.map(toTuple);
  }

  async listCandidateObjectIds(objectType: string): Promise<string[]> {
    const rows = await this.db
      .selectFrom("tuples")
      .select("object_id")
      .distinct()
      .where("object_type", "=", objectType)
      .execute();
    return rows.map((row) => row.object_id);
  }

  async insertTuple(tuple: AddTupleRequest): Promise<void> {
    await this.db
      .insertInto("tuples")
      .values({
        object_type: tuple.objectType,
        object_id: tuple.objectId,
        relation: tuple.relation,
        subject_type: tuple.subjectType,
        subject_id: tuple.subjectId,
        subject_relation: tuple.subjectRelation ?? "",
        condition_name: tuple.conditionName ?? null,
        condition_context: tuple.conditionContext
          ? JSON.stringify(tuple.conditionContext)
          : null,
      })
      .onConflict((oc) =>
        oc.columns([...NATURAL_KEY]).doUpdateSet({
          condition_name: (eb) => eb.ref("excluded.condition_name"),
          condition_context: (eb) => eb.ref("excluded.condition_context"),
        }),
      )
      .execute();
  }

  async deleteTuple(tuple: RemoveTupleRequest): Promise<boolean> {
    const result = await this.db
      .deleteFrom("tuples")
      .where("object_type", "=", tuple.objectType)
      .where("object_id", "=", tuple.objectId)
      .where("relation", "=", tuple.relation)
      .where("subject_type", "=", tuple.subjectType)
      .where("subject_id", "=", tuple.subjectId)
      .where("subject_relation", "=", tuple.subjectRelation ?? "")
      .executeTakeFirst();
    return result.numDeletedRows > 0n;
  }
}

function toTuple(row: Selectable<TuplesTable>): Tuple {
  return {
    objectType: row.object_type,
    objectId: row.object_id,
    relation: row.relation,
    subjectType: row.subject_type,
    subjectId: row.subject_id,
    subjectRelation: row.subject_relation === "" ? null : row.subject_relation,
    conditionName: row.condition_name,
    conditionContext: row.condition_context,
  };
}
