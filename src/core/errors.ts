export class RelcheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RelcheckError";
  }
}

export class SchemaError extends RelcheckError {
  readonly line: number | null;
  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `line ${line}: ${message}`);
    this.name = "SchemaError";
    this.line = line;
  }
}

/** A query against a type or relation the compiled schema does not define */
export class UnknownRelationError extends SchemaError {
  readonly objectType: string;
  readonly relation: string;
  constructor(objectType: string, relation: string) {
    super(`No relation defined for ${objectType}.${relation}`);
    this.name = "UnknownRelationError";
    this.objectType = objectType;
    this.relation = relation;
  }
}

export class InvalidSubjectTypeError extends RelcheckError {
  constructor(
    subjectType: string,
    objectType: string,
    relation: string,
    allowed: string[],
  ) {
    super(
      `Subject type '${subjectType}' is not allowed for ${objectType}.${relation}. Allowed: ${allowed.join(", ")}`,
    );
    this.name = "InvalidSubjectTypeError";
  }
}

export class UsersetNotAllowedError extends RelcheckError {
  constructor(objectType: string, relation: string, subject: string) {
    super(`Subject form '${subject}' is not allowed for ${objectType}.${relation}`);
    this.name = "UsersetNotAllowedError";
  }
}

export class ConditionNotPermittedError extends RelcheckError {
  constructor(conditionName: string | null, objectType: string, relation: string) {
    super(
      conditionName === null
        ? `A condition is required on ${objectType}.${relation} for this subject`
        : `Condition '${conditionName}' is not permitted on ${objectType}.${relation} for this subject`,
    );
    this.name = "ConditionNotPermittedError";
  }
}

export class ConditionNotFoundError extends RelcheckError {
  constructor(conditionName: string) {
    super(`Condition definition not found: ${conditionName}`);
    this.name = "ConditionNotFoundError";
  }
}

export class ConditionParamError extends RelcheckError {
  readonly conditionName: string;
  readonly parameter: string;
  constructor(conditionName: string, parameter: string, reason: string) {
    super(`Condition '${conditionName}' parameter '${parameter}': ${reason}`);
    this.name = "ConditionParamError";
    this.conditionName = conditionName;
    this.parameter = parameter;
  }
}

export class ConditionEvaluationError extends RelcheckError {
  override cause: unknown;
  constructor(conditionName: string, cause: unknown) {
    super(`Failed to evaluate condition '${conditionName}': ${cause}`);
    this.name = "ConditionEvaluationError";
    this.cause = cause;
  }
}

export class CheckCancelledError extends RelcheckError {
  override cause: unknown;
  constructor(cause: unknown) {
    super(`Evaluation cancelled: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "CheckCancelledError";
    this.cause = cause;
  }
}

export class InvalidGrantEntryError extends RelcheckError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidGrantEntryError";
  }
}

export class ConfigError extends RelcheckError {
  readonly issues: string[];
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
