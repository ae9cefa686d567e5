import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { SchemaError } from "../core/errors.ts";
import { type CompiledSchema, type CompileOptions, compileSchema } from "./compiler.ts";
import { parseSchemaJson } from "./definition.ts";
import { parseSchema } from "./parser.ts";
import type { SchemaDefinition } from "./types.ts";

/** Read a schema from disk: `.json` files hold the structured form, anything else the DSL */
export async function loadSchemaFile(path: string): Promise<SchemaDefinition> {
  const source = await readFile(path, "utf8");
  if (extname(path) !== ".json") return parseSchema(source);

  let value: unknown;
  try {
    value = JSON.parse(source);
  } catch (err) {
    throw new SchemaError(
      `${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseSchemaJson(value);
}

export async function loadCompiledSchema(
  path: string,
  options?: CompileOptions,
): Promise<CompiledSchema> {
  return compileSchema(await loadSchemaFile(path), options);
}
