import { silentLogger, type Logger } from "../logger.ts";
import type { CompiledSchema } from "../schema/compiler.ts";
import type { SubjectSpec } from "../schema/types.ts";
import type { TupleStore } from "../store/interface.ts";
import { evaluateTupleCondition } from "./conditions.ts";
import { CheckCancelledError, RelcheckError } from "./errors.ts";
import { type CheckOptions, DEFAULT_MAX_DEPTH, type Tuple } from "./types.ts";

/** What the check and expand algorithms read from */
export interface EngineDeps {
  schema: CompiledSchema;
  store: TupleStore;
  logger?: Logger;
}

/**
 * Per-request evaluation state: memo table, cancellation and the request
 * context. Created for one top-level call and dropped with it.
 */
export class EvaluationScope<T> {
  readonly schema: CompiledSchema;
  readonly store: TupleStore;
  readonly logger: Logger;
  readonly context: Readonly<Record<string, unknown>> | undefined;
  readonly contextSignature: string;
  readonly maxDepth: number;
  private readonly signal: AbortSignal | undefined;
  private readonly memo = new Map<string, T>();

  constructor(
    deps: EngineDeps,
    context: Readonly<Record<string, unknown>> | undefined,
    options: CheckOptions,
  ) {
    this.schema = deps.schema;
    this.store = deps.store;
    this.logger = deps.logger ?? silentLogger;
    this.context = context;
    this.contextSignature = canonicalJson(context ?? {});
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.signal =
      options.signal ??
      (options.timeoutMs === undefined ? undefined : AbortSignal.timeout(options.timeoutMs));
  }

  throwIfCancelled(): void {
    if (this.signal?.aborted) {
      throw new CheckCancelledError(this.signal.reason);
    }
  }

  recall(key: string): T | undefined {
    return this.memo.get(key);
  }

  remember(key: string, value: T): void {
    this.memo.set(key, value);
  }

  /**
   * A tuple grants through a set of specs when one of them admits its
   * condition (or lack of one) and that condition holds. Condition failures
   * deny this tuple only.
   */
  tupleGrants(specs: readonly SubjectSpec[], tuple: Tuple): boolean {
    if (!specs.some((spec) => spec.condition === tuple.conditionName)) {
      return false;
    }
    try {
      return evaluateTupleCondition(this.schema.conditions, tuple, this.context);
    } catch (err) {
      if (!(err instanceof RelcheckError)) throw err;
      this.logger.debug("Condition did not hold", {
        condition: tuple.conditionName,
        objectType: tuple.objectType,
        objectId: tuple.objectId,
        relation: tuple.relation,
        reason: err.message,
      });
      return false;
    }
  }
}

export function memoKey(...parts: string[]): string {
  return parts.join("\u0000");
}

/** JSON with object keys sorted, so equal contexts produce equal signatures */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, inner: unknown) => {
    if (typeof inner === "bigint") return `${inner}n`;
    if (inner === null || typeof inner !== "object" || Array.isArray(inner)) {
      return inner;
    }
    return Object.fromEntries(
      Object.entries(inner).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
  });
}
