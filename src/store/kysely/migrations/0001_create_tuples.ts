import { type Kysely, sql } from "kysely";

// Migrations operate on an untyped database handle; the schema they produce
// is described by `DB` in ../schema.ts.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("tuples")
    .ifNotExists()
    .addColumn("object_type", "text", (col) => col.notNull())
    .addColumn("object_id", "text", (col) => col.notNull())
    .addColumn("relation", "text", (col) => col.notNull())
    .addColumn("subject_type", "text", (col) => col.notNull())
    .addColumn("subject_id", "text", (col) => col.notNull())
    .addColumn("subject_relation", "text", (col) => col.notNull().defaultTo(""))
    .addColumn("condition_name", "text")
    .addColumn("condition_context", "jsonb")
    .addColumn("created_at", "timestamptz", (col) =>
      col.notNull().defaultTo(sql`now()`),
    )
    .addPrimaryKeyConstraint("tuples_pkey", [
      "object_type",
      "object_id",
      "relation",
      "subject_type",
      "subject_id",
      "subject_relation",
    ])
    .execute();

  await db.schema
    .createIndex("tuples_subject_idx")
    .ifNotExists()
    .on("tuples")
    .columns(["subject_type", "subject_id", "relation"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("tuples").ifExists().execute();
}
