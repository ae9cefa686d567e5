import { z } from "zod";
import {
  InvalidGrantEntryError,
  UnknownRelationError,
} from "../core/errors.ts";
import type { AddTupleRequest, CheckRequest, Subject } from "../core/types.ts";
import type { RelcheckClient } from "../index.ts";
import { silentLogger, type Logger } from "../logger.ts";

// Helpers for services that expose resource permissions (e.g. a dashboard
// permissions API) on top of the engine.

export interface ResourceRef {
  objectType: string;
  objectId: string;
}

/** One row of a permission update: exactly one of user, team or role */
export interface GrantEntry {
  userId?: string;
  teamId?: string;
  role?: string;
  permission: string;
}

export interface PermissionEntry extends Subject {
  permission: string;
}

const idSchema = z.union([z.string().min(1), z.number().int().nonnegative()]).transform(String);

const grantRequestSchema = z.object({
  items: z.array(
    z.object({
      userId: idSchema.optional(),
      teamId: idSchema.optional(),
      role: z.string().min(1).optional(),
      permission: z.string().min(1),
    }),
  ),
});

/** Validate a permission update body: `{ items: GrantEntry[] }` */
export function parseGrantRequest(body: unknown): GrantEntry[] {
  const result = grantRequestSchema.safeParse(body);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new InvalidGrantEntryError(
      `Invalid permission update: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "malformed body"}`,
    );
  }
  for (const entry of result.data.items) assertSingleSubject(entry);
  return result.data.items;
}

function assertSingleSubject(entry: GrantEntry): void {
  const count = [entry.userId, entry.teamId, entry.role].filter(
    (value) => value !== undefined,
  ).length;
  if (count === 0) {
    throw new InvalidGrantEntryError("A grant entry must name a user, a team or a role");
  }
  if (count > 1) {
    throw new InvalidGrantEntryError(
      "A grant entry may name only one of user, team or role",
    );
  }
}

/** Turn a grant entry into the tuple that records it */
export function grantEntryToTuple(
  resource: ResourceRef,
  entry: GrantEntry,
): AddTupleRequest {
  assertSingleSubject(entry);
  const base = {
    objectType: resource.objectType,
    objectId: resource.objectId,
    relation: entry.permission,
  };
  if (entry.userId !== undefined) {
    return { ...base, subjectType: "user", subjectId: entry.userId };
  }
  if (entry.teamId !== undefined) {
    return { ...base, subjectType: "team", subjectId: entry.teamId, subjectRelation: "member" };
  }
  if (entry.role !== undefined) {
    return { ...base, subjectType: "role", subjectId: entry.role, subjectRelation: "assignee" };
  }
  throw new InvalidGrantEntryError("A grant entry must name a user, a team or a role");
}

export interface ListPermissionsOptions {
  /** Subjects left out of the listing, such as service accounts hidden from users */
  hidden?: Iterable<Subject>;
  context?: Record<string, unknown>;
}

/**
 * Who holds which permission on a resource. `relations` runs from weakest to
 * strongest; each subject is listed once with the strongest relation it holds.
 */
export async function listPermissions(
  client: RelcheckClient,
  resource: ResourceRef,
  relations: readonly string[],
  options: ListPermissionsOptions = {},
): Promise<PermissionEntry[]> {
  const hidden = new Set<string>();
  for (const subject of options.hidden ?? []) {
    hidden.add(`${subject.subjectType}:${subject.subjectId}`);
  }

  const entries = new Map<string, PermissionEntry>();
  for (const relation of [...relations].reverse()) {
    const subjects = await client.expand({
      ...resource,
      relation,
      context: options.context,
    });
    for (const subject of subjects) {
      const key = `${subject.subjectType}:${subject.subjectId}`;
      if (hidden.has(key) || entries.has(key)) continue;
      entries.set(key, { ...subject, permission: relation });
    }
  }
  return [...entries.values()];
}

export type AuthorizeResult =
  | { status: 200 }
  | { status: 400 | 403 | 500; error: Error };

/**
 * Map a check to the status a caller should surface: 400 for a query the
 * schema cannot answer, 403 for a denial, 500 for anything else.
 */
export async function authorize(
  client: RelcheckClient,
  request: CheckRequest,
  logger: Logger = silentLogger,
): Promise<AuthorizeResult> {
  try {
    if (await client.check(request)) return { status: 200 };
    return {
      status: 403,
      error: new Error(
        `${request.subjectType}:${request.subjectId} lacks ${request.relation} on ${request.objectType}:${request.objectId}`,
      ),
    };
  } catch (err) {
    if (err instanceof UnknownRelationError) {
      return { status: 400, error: err };
    }
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error("Authorization check failed", { ...request }, error);
    return { status: 500, error };
  }
}
