import { z } from "zod";
import { SchemaError } from "../core/errors.ts";
import {
  CONDITION_PARAMETER_TYPES,
  type ConditionParameterType,
  type RelationExpression,
  type SchemaDefinition,
} from "./types.ts";

const parameterTypeSchema = z.custom<ConditionParameterType>(
  (value) =>
    typeof value === "string" &&
    CONDITION_PARAMETER_TYPES.some((type) => type === value),
  { message: `Expected one of ${CONDITION_PARAMETER_TYPES.join(", ")}` },
);

const subjectSpecSchema = z.object({
  type: z.string().min(1),
  relation: z.string().min(1).nullable().default(null),
  condition: z.string().min(1).nullable().default(null),
});

const expressionSchema: z.ZodType<RelationExpression, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("direct"),
      subjects: z.array(subjectSpecSchema).min(1),
    }),
    z.object({
      kind: z.literal("union"),
      children: z.array(expressionSchema).min(1),
    }),
    z.object({
      kind: z.literal("tupleToUserset"),
      tupleset: z.string().min(1),
      relation: z.string().min(1),
    }),
    z.object({
      kind: z.literal("computed"),
      relation: z.string().min(1),
    }),
  ]),
);

const schemaDefinitionSchema = z.object({
  types: z.array(
    z.object({
      name: z.string().min(1),
      relations: z
        .array(z.object({ name: z.string().min(1), expression: expressionSchema }))
        .default([]),
    }),
  ),
  conditions: z
    .array(
      z.object({
        name: z.string().min(1),
        expression: z.string().min(1),
        parameters: z.record(parameterTypeSchema).default({}),
      }),
    )
    .default([]),
});

/** Validate an untyped value (e.g. parsed JSON) as a structured schema definition */
export function parseSchemaJson(value: unknown): SchemaDefinition {
  const result = schemaDefinitionSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new SchemaError(`Invalid schema definition: ${issues.join("; ")}`);
  }
  return result.data;
}
