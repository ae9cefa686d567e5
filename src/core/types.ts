/** A relationship tuple with optional condition */
export interface Tuple {
  objectType: string;
  objectId: string;
  relation: string;
  subjectType: string;
  subjectId: string;
  subjectRelation: string | null;
  conditionName: string | null;
  conditionContext: Record<string, unknown> | null;
}

/** A concrete subject, as returned by expansion */
export interface Subject {
  subjectType: string;
  subjectId: string;
}

/** Parameters for a check request */
export interface CheckRequest {
  objectType: string;
  objectId: string;
  relation: string;
  subjectType: string;
  subjectId: string;
  context?: Record<string, unknown>;
}

/** Parameters for an expand request */
export interface ExpandRequest {
  objectType: string;
  objectId: string;
  relation: string;
  context?: Record<string, unknown>;
}

/** Options for the check and expand algorithms */
export interface CheckOptions {
  /** Maximum recursion depth (default: 25) */
  maxDepth?: number;
  /** Aborts the evaluation at the next recursion boundary */
  signal?: AbortSignal;
  /** Builds an abort signal when the request carries none */
  timeoutMs?: number;
}

/** Parameters for adding a tuple */
export interface AddTupleRequest {
  objectType: string;
  objectId: string;
  relation: string;
  subjectType: string;
  subjectId: string;
  subjectRelation?: string | null;
  conditionName?: string | null;
  conditionContext?: Record<string, unknown> | null;
}

/** Parameters for removing a tuple */
export interface RemoveTupleRequest {
  objectType: string;
  objectId: string;
  relation: string;
  subjectType: string;
  subjectId: string;
  subjectRelation?: string | null;
}

export const DEFAULT_MAX_DEPTH = 25;
