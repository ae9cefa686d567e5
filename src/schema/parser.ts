import { SchemaError } from "../core/errors.ts";
import {
  CONDITION_PARAMETER_TYPES,
  type ConditionDefinition,
  type ConditionParameterType,
  type RelationExpression,
  type SchemaDefinition,
  type SubjectSpec,
  type TypeDefinition,
} from "./types.ts";

// Parser for the schema DSL:
//
//   type folder
//     relations
//       define parent: [folder]
//       define view: [user, team#member] or edit or view from parent
//
//   condition group_filter(requested_group: string, resource_group: string) {
//     requested_group == resource_group
//   }

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;
const TYPE_LINE = /^type\s+(\S+)$/;
const DEFINE_LINE = /^define\s+([^\s:]+)\s*:\s*(.*)$/;
const CONDITION_LINE = /^condition\s+([^\s(]+)\s*\(([^)]*)\)\s*\{(.*)$/;

interface SourceLine {
  number: number;
  text: string;
}

export function parseSchema(source: string): SchemaDefinition {
  const lines = source.split(/\r?\n/).map((text, index) => ({
    number: index + 1,
    text,
  }));
  const types: TypeDefinition[] = [];
  const conditions: ConditionDefinition[] = [];
  let currentType: TypeDefinition | null = null;
  let inRelations = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!line) continue;
    const text = stripComment(line.text).trim();
    if (text === "") continue;

    const keyword = text.split(/\s+/, 1)[0];
    switch (keyword) {
      case "model":
      case "schema":
        if (types.length > 0 || conditions.length > 0) {
          throw new SchemaError(`'${keyword}' must precede type definitions`, line.number);
        }
        if (keyword === "schema" && text !== "schema 1.1") {
          throw new SchemaError(`Unsupported schema version '${text}'`, line.number);
        }
        break;

      case "type": {
        const match = TYPE_LINE.exec(text);
        const name = match?.[1];
        if (!name) {
          throw new SchemaError(`Malformed type declaration '${text}'`, line.number);
        }
        assertIdentifier(name, line.number);
        currentType = { name, relations: [] };
        inRelations = false;
        types.push(currentType);
        break;
      }

      case "relations":
        if (!currentType || text !== "relations") {
          throw new SchemaError("'relations' must follow a type declaration", line.number);
        }
        inRelations = true;
        break;

      case "define": {
        if (!currentType || !inRelations) {
          throw new SchemaError("'define' must appear inside a relations block", line.number);
        }
        const match = DEFINE_LINE.exec(text);
        const name = match?.[1];
        const body = match?.[2];
        if (!name || !body) {
          throw new SchemaError(`Malformed relation definition '${text}'`, line.number);
        }
        assertIdentifier(name, line.number);
        currentType.relations.push({
          name,
          expression: parseExpression(body, line.number),
        });
        break;
      }

      case "condition": {
        const collected = collectCondition(lines, i);
        conditions.push(collected.condition);
        i = collected.lastIndex;
        currentType = null;
        inRelations = false;
        break;
      }

      default:
        throw new SchemaError(`Unexpected '${keyword}'`, line.number);
    }
  }

  return { types, conditions };
}

/** A `#` starts a comment at the beginning of a line or after whitespace */
function stripComment(text: string): string {
  const match = /(^|\s)#/.exec(text);
  return match ? text.slice(0, match.index) : text;
}

function assertIdentifier(name: string, line: number): void {
  if (!IDENTIFIER.test(name)) {
    throw new SchemaError(`Invalid identifier '${name}'`, line);
  }
}

// === Conditions ===

function collectCondition(
  lines: SourceLine[],
  start: number,
): { condition: ConditionDefinition; lastIndex: number } {
  const first = lines[start];
  if (!first) throw new SchemaError("Unexpected end of input");
  const header = CONDITION_LINE.exec(first.text.trim());
  const name = header?.[1];
  if (!header || !name) {
    throw new SchemaError(`Malformed condition declaration '${first.text.trim()}'`, first.number);
  }
  assertIdentifier(name, first.number);
  const parameters = parseParameters(header[2] ?? "", first.number);

  let body = "";
  let depth = 1;
  let quote: string | null = null;
  let chunk = header[3] ?? "";
  let index = start;

  for (;;) {
    for (let c = 0; c < chunk.length; c++) {
      const ch = chunk[c];
      if (quote) {
        if (ch === "\\") {
          body += ch + (chunk[c + 1] ?? "");
          c++;
          continue;
        }
        if (ch === quote) quote = null;
      } else if (ch === '"' || ch === "'") {
        quote = ch;
      } else if (ch === "{") {
        depth++;
      } else if (ch === "}") {
        depth--;
        if (depth === 0) {
          const rest = chunk.slice(c + 1).trim();
          if (rest !== "") {
            throw new SchemaError(`Unexpected '${rest}' after condition body`, lines[index]?.number ?? first.number);
          }
          const expression = body.trim();
          if (expression === "") {
            throw new SchemaError(`Condition '${name}' has an empty body`, first.number);
          }
          return { condition: { name, expression, parameters }, lastIndex: index };
        }
      }
      body += ch;
    }
    body += "\n";
    index++;
    const next = lines[index];
    if (!next) {
      throw new SchemaError(`Unterminated body for condition '${name}'`, first.number);
    }
    chunk = next.text;
  }
}

function parseParameters(
  source: string,
  line: number,
): Record<string, ConditionParameterType> {
  const parameters: Record<string, ConditionParameterType> = {};
  if (source.trim() === "") return parameters;

  // commas inside map<string, int> do not separate parameters
  for (const part of source.split(/,(?![^<]*>)/)) {
    const [rawName, rawType] = part.split(":").map((s) => s.trim());
    if (!rawName || !rawType) {
      throw new SchemaError(`Malformed condition parameter '${part.trim()}'`, line);
    }
    assertIdentifier(rawName, line);
    if (rawName in parameters) {
      throw new SchemaError(`Duplicate condition parameter '${rawName}'`, line);
    }
    parameters[rawName] = parseParameterType(rawType, line);
  }
  return parameters;
}

function parseParameterType(raw: string, line: number): ConditionParameterType {
  // list<string> and map<int> keep only the container kind
  const base = raw.replace(/<.*>$/, "").trim();
  const found = CONDITION_PARAMETER_TYPES.find((t) => t === base);
  if (!found) {
    throw new SchemaError(`Unknown condition parameter type '${raw}'`, line);
  }
  if (base !== raw && found !== "list" && found !== "map") {
    throw new SchemaError(`Type '${base}' takes no type arguments`, line);
  }
  return found;
}

// === Relation expressions ===

type Token = { kind: "punct"; value: string } | { kind: "word"; value: string };

function tokenize(source: string, line: number): Token[] {
  const tokens: Token[] = [];
  const pattern = /\s*(?:([[\],()#])|([A-Za-z_][A-Za-z0-9_-]*))/y;
  let position = 0;
  while (position < source.length) {
    if (source.slice(position).trim() === "") break;
    pattern.lastIndex = position;
    const match = pattern.exec(source);
    if (!match) {
      throw new SchemaError(
        `Unexpected character '${source.slice(position).trim()[0]}' in relation expression`,
        line,
      );
    }
    const [, punct, word] = match;
    if (punct) tokens.push({ kind: "punct", value: punct });
    else if (word) tokens.push({ kind: "word", value: word });
    position = pattern.lastIndex;
  }
  return tokens;
}

export function parseExpression(source: string, line = 0): RelationExpression {
  const tokens = tokenize(source, line);
  let position = 0;

  const peek = (): Token | undefined => tokens[position];

  const fail = (message: string): never => {
    throw new SchemaError(message, line || null);
  };

  const expectPunct = (value: string): void => {
    const token = tokens[position++];
    if (token?.kind !== "punct" || token.value !== value) {
      fail(`Expected '${value}' but found '${token?.value ?? "end of expression"}'`);
    }
  };

  const expectWord = (what: string): string => {
    const token = tokens[position++];
    if (token?.kind !== "word" || isReserved(token.value)) {
      return fail(`Expected ${what} but found '${token?.value ?? "end of expression"}'`);
    }
    return token.value;
  };

  const isKeyword = (token: Token | undefined, value: string): boolean =>
    token?.kind === "word" && token.value === value;

  const parseSpec = (): SubjectSpec => {
    const type = expectWord("a subject type");
    let relation: string | null = null;
    let condition: string | null = null;
    const next = peek();
    if (next?.kind === "punct" && next.value === "#") {
      position++;
      relation = expectWord("a userset relation");
    }
    if (isKeyword(peek(), "with")) {
      position++;
      condition = expectWord("a condition name");
    }
    return { type, relation, condition };
  };

  const parseTerm = (): RelationExpression => {
    const token = peek();
    if (token?.kind === "punct" && token.value === "[") {
      position++;
      const subjects: SubjectSpec[] = [parseSpec()];
      while (peek()?.value === ",") {
        position++;
        subjects.push(parseSpec());
      }
      expectPunct("]");
      return { kind: "direct", subjects };
    }
    if (token?.kind === "punct" && token.value === "(") {
      position++;
      const inner = parseUnion();
      expectPunct(")");
      return inner;
    }
    if (isKeyword(token, "and") || isKeyword(token, "but")) {
      return fail(`Operator '${token?.value}' is not supported`);
    }
    const relation = expectWord("a relation name");
    if (isKeyword(peek(), "from")) {
      position++;
      const tupleset = expectWord("a hierarchy relation");
      return { kind: "tupleToUserset", tupleset, relation };
    }
    return { kind: "computed", relation };
  };

  const parseUnion = (): RelationExpression => {
    const children: RelationExpression[] = [];
    const push = (expression: RelationExpression): void => {
      if (expression.kind === "union") children.push(...expression.children);
      else children.push(expression);
    };
    push(parseTerm());
    for (;;) {
      const token = peek();
      if (isKeyword(token, "or")) {
        position++;
        push(parseTerm());
        continue;
      }
      if (isKeyword(token, "and") || isKeyword(token, "but")) {
        fail(`Operator '${token?.value}' is not supported`);
      }
      break;
    }
    const [only] = children;
    return children.length === 1 && only ? only : { kind: "union", children };
  };

  if (tokens.length === 0) fail("Empty relation expression");
  const expression = parseUnion();
  if (position < tokens.length) {
    fail(`Unexpected '${tokens[position]?.value}' in relation expression`);
  }
  return expression;
}

function isReserved(word: string): boolean {
  return word === "or" || word === "from" || word === "with" || word === "and" || word === "but";
}
