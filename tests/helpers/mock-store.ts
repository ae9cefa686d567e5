import type { Tuple } from "src/core/types.ts";
import type { TupleFilter } from "src/store/interface.ts";
import { MemoryTupleStore } from "src/store/memory.ts";

/** In-memory store that records every listTuples read */
export class MockTupleStore extends MemoryTupleStore {
  readonly reads: Array<{ objectType: string; objectId: string; relation: string }> = [];

  override listTuples(
    objectType: string,
    objectId: string,
    relation: string,
    filter?: TupleFilter,
  ): Promise<Tuple[]> {
    this.reads.push({ objectType, objectId, relation });
    return super.listTuples(objectType, objectId, relation, filter);
  }
}
