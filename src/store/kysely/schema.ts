import type { ColumnType, Generated } from "kysely";

type ConditionContextColumn = ColumnType<
  Record<string, unknown> | null,
  string | null | undefined,
  string | null
>;

export interface TuplesTable {
  object_type: string;
  object_id: string;
  relation: string;
  subject_type: string;
  subject_id: string;
  /** Empty string when the subject is not a userset */
  subject_relation: ColumnType<string, string | undefined, string>;
  condition_name: ColumnType<string | null, string | null | undefined, string | null>;
  condition_context: ConditionContextColumn;
  created_at: Generated<Date>;
}

export interface DB {
  tuples: TuplesTable;
}
