import type { RelcheckConfig } from "./config.ts";
import { check } from "./core/check.ts";
import { assertDeclaredParameters } from "./core/conditions.ts";
import {
  ConditionNotPermittedError,
  ConfigError,
  InvalidSubjectTypeError,
  UsersetNotAllowedError,
} from "./core/errors.ts";
import { expand } from "./core/expand.ts";
import type { EngineDeps } from "./core/scope.ts";
import type {
  AddTupleRequest,
  CheckOptions,
  CheckRequest,
  ExpandRequest,
  RemoveTupleRequest,
  Subject,
} from "./core/types.ts";
import { createLogger, silentLogger, type Logger, type LoggerOptions } from "./logger.ts";
import type { CompiledSchema, CompileOptions } from "./schema/compiler.ts";
import { loadCompiledSchema } from "./schema/load.ts";
import type { TupleStore } from "./store/interface.ts";

export interface RelcheckClient {
  readonly schema: CompiledSchema;
  check(request: CheckRequest, options?: CheckOptions): Promise<boolean>;
  /**
   * Run independent checks concurrently, answering in request order.
   * Rejects as a whole with the first error any request raises.
   */
  batchCheck(requests: CheckRequest[], options?: CheckOptions): Promise<boolean[]>;
  expand(request: ExpandRequest, options?: CheckOptions): Promise<Subject[]>;
  listObjects(
    objectType: string,
    relation: string,
    subjectType: string,
    subjectId: string,
    context?: Record<string, unknown>,
  ): Promise<string[]>;
  addTuple(request: AddTupleRequest): Promise<void>;
  removeTuple(request: RemoveTupleRequest): Promise<boolean>;
}

export interface RelcheckOptions extends Omit<CheckOptions, "signal"> {
  logger?: Logger;
}

export function createRelcheck(
  store: TupleStore,
  schema: CompiledSchema,
  options: RelcheckOptions = {},
): RelcheckClient {
  const { logger = silentLogger, ...defaults } = options;
  const deps: EngineDeps = { schema, store, logger };
  const withDefaults = (overrides?: CheckOptions): CheckOptions => ({
    ...defaults,
    ...overrides,
  });

  return {
    schema,

    check(request: CheckRequest, overrides?: CheckOptions): Promise<boolean> {
      return check(deps, request, withDefaults(overrides));
    },

    batchCheck(
      requests: CheckRequest[],
      overrides?: CheckOptions,
    ): Promise<boolean[]> {
      return Promise.all(
        requests.map((request) => check(deps, request, withDefaults(overrides))),
      );
    },

    expand(request: ExpandRequest, overrides?: CheckOptions): Promise<Subject[]> {
      return expand(deps, request, withDefaults(overrides));
    },

    async listObjects(
      objectType: string,
      relation: string,
      subjectType: string,
      subjectId: string,
      context?: Record<string, unknown>,
    ): Promise<string[]> {
      schema.getRelation(objectType, relation);
      const candidateIds = await store.listCandidateObjectIds(objectType);
      const results: string[] = [];
      for (const objectId of candidateIds) {
        const allowed = await check(
          deps,
          { objectType, objectId, relation, subjectType, subjectId, context },
          withDefaults(),
        );
        if (allowed) {
          results.push(objectId);
        }
      }
      return results;
    },

    async addTuple(request: AddTupleRequest): Promise<void> {
      const specs = schema
        .directSpecs(request.objectType, request.relation)
        .filter((spec) => spec.type === request.subjectType);
      if (specs.length === 0) {
        throw new InvalidSubjectTypeError(
          request.subjectType,
          request.objectType,
          request.relation,
          [
            ...new Set(
              schema
                .directSpecs(request.objectType, request.relation)
                .map((spec) => spec.type),
            ),
          ],
        );
      }

      const subjectRelation = request.subjectRelation ?? null;
      const matching = specs.filter((spec) => spec.relation === subjectRelation);
      if (matching.length === 0) {
        throw new UsersetNotAllowedError(
          request.objectType,
          request.relation,
          subjectRelation
            ? `${request.subjectType}#${subjectRelation}`
            : request.subjectType,
        );
      }

      const conditionName = request.conditionName ?? null;
      if (!matching.some((spec) => spec.condition === conditionName)) {
        throw new ConditionNotPermittedError(
          conditionName,
          request.objectType,
          request.relation,
        );
      }
      if (conditionName) {
        assertDeclaredParameters(
          schema.conditions.get(conditionName),
          request.conditionContext ?? {},
        );
      }

      await store.insertTuple(request);
      logger.info("Tuple written", {
        objectType: request.objectType,
        objectId: request.objectId,
        relation: request.relation,
        subjectType: request.subjectType,
        subjectId: request.subjectId,
        subjectRelation,
        conditionName,
      });
    },

    async removeTuple(request: RemoveTupleRequest): Promise<boolean> {
      const removed = await store.deleteTuple(request);
      logger.info("Tuple removed", {
        objectType: request.objectType,
        objectId: request.objectId,
        relation: request.relation,
        subjectType: request.subjectType,
        subjectId: request.subjectId,
        removed,
      });
      return removed;
    },
  };
}

export interface RelcheckFromConfigOptions extends CompileOptions {
  /** Receives each log line; defaults to the console */
  logSink?: LoggerOptions["sink"];
}

/**
 * Build a client from loaded configuration: the schema is read from
 * `schemaPath`, logging honours `logLevel`, and `maxDepth` and
 * `checkTimeoutMs` become the default check options.
 */
export async function createRelcheckFromConfig(
  store: TupleStore,
  config: RelcheckConfig,
  options: RelcheckFromConfigOptions = {},
): Promise<RelcheckClient> {
  if (config.schemaPath === null) {
    throw new ConfigError(["RELCHECK_SCHEMA_PATH: Required"]);
  }
  const { logSink, ...compileOptions } = options;
  const schema = await loadCompiledSchema(config.schemaPath, compileOptions);
  return createRelcheck(store, schema, {
    logger: createLogger({ level: config.logLevel, sink: logSink }),
    maxDepth: config.maxDepth,
    timeoutMs: config.checkTimeoutMs ?? undefined,
  });
}

// Re-exports
export {
  authorize,
  type AuthorizeResult,
  type GrantEntry,
  grantEntryToTuple,
  listPermissions,
  parseGrantRequest,
  type PermissionEntry,
} from "./acl/permissions.ts";
export { loadConfig, type PostgresConfig, type RelcheckConfig } from "./config.ts";
export { check } from "./core/check.ts";
export {
  ConditionEvaluator,
  evaluateTupleCondition,
  type ConditionPredicate,
  type NativeCondition,
} from "./core/conditions.ts";
export {
  CheckCancelledError,
  ConditionEvaluationError,
  ConditionNotFoundError,
  ConditionNotPermittedError,
  ConditionParamError,
  ConfigError,
  InvalidGrantEntryError,
  InvalidSubjectTypeError,
  RelcheckError,
  SchemaError,
  UnknownRelationError,
  UsersetNotAllowedError,
} from "./core/errors.ts";
export { expand } from "./core/expand.ts";
export type { EngineDeps } from "./core/scope.ts";
export type {
  AddTupleRequest,
  CheckOptions,
  CheckRequest,
  ExpandRequest,
  RemoveTupleRequest,
  Subject,
  Tuple,
} from "./core/types.ts";
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./logger.ts";
export {
  CompiledSchema,
  type CompileOptions,
  compileSchema,
  type HierarchyRelation,
} from "./schema/compiler.ts";
export { parseSchemaJson } from "./schema/definition.ts";
export { loadCompiledSchema, loadSchemaFile } from "./schema/load.ts";
export { parseSchema } from "./schema/parser.ts";
export type {
  ConditionDefinition,
  ConditionParameterType,
  RelationExpression,
  SchemaDefinition,
  SubjectSpec,
} from "./schema/types.ts";
export type { TupleFilter, TupleStore } from "./store/interface.ts";
export { KyselyTupleStore } from "./store/kysely/adapter.ts";
export { createPostgresDb } from "./store/kysely/connect.ts";
export type { DB } from "./store/kysely/schema.ts";
export { MemoryTupleStore } from "./store/memory.ts";
