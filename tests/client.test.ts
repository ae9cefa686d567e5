import { beforeEach, describe, expect, test } from "vitest";
import { loadConfig } from "src/config.ts";
import {
  ConditionNotPermittedError,
  ConditionParamError,
  ConfigError,
  InvalidSubjectTypeError,
  UnknownRelationError,
  UsersetNotAllowedError,
} from "src/core/errors.ts";
import {
  createRelcheck,
  createRelcheckFromConfig,
  type RelcheckClient,
} from "src/index.ts";
import { createLogger } from "src/logger.ts";
import { MemoryTupleStore } from "src/store/memory.ts";
import { schemaFrom, ZANZANA_SCHEMA_PATH } from "tests/helpers/schema.ts";

const schema = schemaFrom(`
  type user
  type bot
  type team
    relations
      define member: [user]
  type doc
    relations
      define owner: [user]
      define viewer: [user, team#member, user with in_region] or owner

  condition in_region(region: string) {
    region == "us"
  }
`);

describe("createRelcheck", () => {
  let store: MemoryTupleStore;
  let client: RelcheckClient;
  let logged: Array<Record<string, unknown>>;

  beforeEach(() => {
    store = new MemoryTupleStore();
    logged = [];
    client = createRelcheck(store, schema, {
      logger: createLogger({
        sink: (_level, line) => {
          logged.push(JSON.parse(line));
        },
      }),
    });
  });

  describe("addTuple", () => {
    test("writes a valid tuple and logs it", async () => {
      await client.addTuple({
        objectType: "doc",
        objectId: "1",
        relation: "viewer",
        subjectType: "user",
        subjectId: "alice",
      });

      expect(store.size).toBe(1);
      expect(logged).toEqual([
        expect.objectContaining({
          level: "info",
          message: "Tuple written",
          objectType: "doc",
          objectId: "1",
          relation: "viewer",
          subjectType: "user",
          subjectId: "alice",
          subjectRelation: null,
          conditionName: null,
        }),
      ]);
    });

    test("rejects a subject type the relation does not allow", async () => {
      await expect(
        client.addTuple({
          objectType: "doc",
          objectId: "1",
          relation: "viewer",
          subjectType: "bot",
          subjectId: "b1",
        }),
      ).rejects.toThrow(
        new InvalidSubjectTypeError("bot", "doc", "viewer", ["user", "team"]),
      );
    });

    test("rejects a plain subject where only a userset is allowed", async () => {
      await expect(
        client.addTuple({
          objectType: "doc",
          objectId: "1",
          relation: "viewer",
          subjectType: "team",
          subjectId: "eng",
        }),
      ).rejects.toThrow("Subject form 'team' is not allowed for doc.viewer");
    });

    test("rejects a userset the relation does not allow", async () => {
      await expect(
        client.addTuple({
          objectType: "doc",
          objectId: "1",
          relation: "viewer",
          subjectType: "user",
          subjectId: "alice",
          subjectRelation: "member",
        }),
      ).rejects.toBeInstanceOf(UsersetNotAllowedError);
    });

    test("rejects a condition the relation does not allow", async () => {
      await expect(
        client.addTuple({
          objectType: "doc",
          objectId: "1",
          relation: "owner",
          subjectType: "user",
          subjectId: "alice",
          conditionName: "in_region",
        }),
      ).rejects.toThrow(
        new ConditionNotPermittedError("in_region", "doc", "owner"),
      );
    });

    test("rejects undeclared condition parameters", async () => {
      await expect(
        client.addTuple({
          objectType: "doc",
          objectId: "1",
          relation: "viewer",
          subjectType: "user",
          subjectId: "alice",
          conditionName: "in_region",
          conditionContext: { tier: "gold" },
        }),
      ).rejects.toBeInstanceOf(ConditionParamError);
      expect(store.size).toBe(0);
    });

    test("rejects an undefined relation", async () => {
      await expect(
        client.addTuple({
          objectType: "doc",
          objectId: "1",
          relation: "commenter",
          subjectType: "user",
          subjectId: "alice",
        }),
      ).rejects.toBeInstanceOf(UnknownRelationError);
    });
  });

  describe("reads", () => {
    beforeEach(async () => {
      await client.addTuple({
        objectType: "doc",
        objectId: "1",
        relation: "viewer",
        subjectType: "user",
        subjectId: "alice",
      });
      await client.addTuple({
        objectType: "doc",
        objectId: "2",
        relation: "owner",
        subjectType: "user",
        subjectId: "alice",
      });
      await client.addTuple({
        objectType: "doc",
        objectId: "3",
        relation: "viewer",
        subjectType: "user",
        subjectId: "bob",
        conditionName: "in_region",
      });
    });

    test("batchCheck keeps request order", async () => {
      const viewer = (objectId: string, subjectId: string) => ({
        objectType: "doc",
        objectId,
        relation: "viewer",
        subjectType: "user",
        subjectId,
      });

      expect(
        await client.batchCheck([viewer("1", "alice"), viewer("1", "bob"), viewer("2", "alice")]),
      ).toEqual([true, false, true]);
    });

    test("batchCheck rejects as a whole when one request fails", async () => {
      await expect(
        client.batchCheck([
          {
            objectType: "doc",
            objectId: "1",
            relation: "viewer",
            subjectType: "user",
            subjectId: "alice",
          },
          {
            objectType: "doc",
            objectId: "1",
            relation: "commenter",
            subjectType: "user",
            subjectId: "alice",
          },
        ]),
      ).rejects.toBeInstanceOf(UnknownRelationError);
    });

    test("listObjects returns the objects the subject can reach", async () => {
      expect(await client.listObjects("doc", "viewer", "user", "alice")).toEqual(["1", "2"]);
    });

    test("listObjects evaluates conditions with the given context", async () => {
      expect(await client.listObjects("doc", "viewer", "user", "bob")).toEqual([]);
      expect(
        await client.listObjects("doc", "viewer", "user", "bob", { region: "us" }),
      ).toEqual(["3"]);
    });

    test("listObjects rejects an undefined relation", async () => {
      await expect(
        client.listObjects("doc", "commenter", "user", "alice"),
      ).rejects.toBeInstanceOf(UnknownRelationError);
    });

    test("expand lists subjects", async () => {
      expect(
        await client.expand({ objectType: "doc", objectId: "2", relation: "viewer" }),
      ).toEqual([{ subjectType: "user", subjectId: "alice" }]);
    });

    test("removeTuple revokes access", async () => {
      const tuple = {
        objectType: "doc",
        objectId: "1",
        relation: "viewer",
        subjectType: "user",
        subjectId: "alice",
      };

      expect(await client.removeTuple(tuple)).toBe(true);
      expect(await client.check(tuple)).toBe(false);
      expect(await client.removeTuple(tuple)).toBe(false);
      expect(logged.at(-1)).toMatchObject({ message: "Tuple removed", removed: false });
    });
  });

  test("applies default options to every check", async () => {
    const chain = schemaFrom(`
      type user
      type doc
        relations
          define r2: [user]
          define r1: [user] or r2
          define r0: [user] or r1
    `);
    const chainStore = new MemoryTupleStore([
      {
        objectType: "doc",
        objectId: "1",
        relation: "r2",
        subjectType: "user",
        subjectId: "alice",
      },
    ]);
    const shallow = createRelcheck(chainStore, chain, { maxDepth: 1 });
    const request = {
      objectType: "doc",
      objectId: "1",
      relation: "r0",
      subjectType: "user",
      subjectId: "alice",
    };

    expect(await shallow.check(request)).toBe(false);
    expect(await shallow.check(request, { maxDepth: 2 })).toBe(true);
  });
});

describe("createRelcheckFromConfig", () => {
  const n1 = { objectType: "namespace", objectId: "n1" };
  const admin = { ...n1, relation: "admin", subjectType: "user", subjectId: "u" };

  test("loads the schema and applies the configured depth limit", async () => {
    const client = await createRelcheckFromConfig(
      new MemoryTupleStore(),
      loadConfig({ RELCHECK_SCHEMA_PATH: ZANZANA_SCHEMA_PATH, RELCHECK_MAX_DEPTH: "1" }),
      { logSink: () => {} },
    );
    await client.addTuple(admin);

    expect(client.schema.hasType("namespace")).toBe(true);
    expect(await client.check({ ...admin, relation: "edit" })).toBe(true);
    expect(await client.check({ ...admin, relation: "view" })).toBe(false);
    expect(await client.check({ ...admin, relation: "view" }, { maxDepth: 2 })).toBe(true);
  });

  test("logs at the configured level", async () => {
    const messages: string[] = [];
    const client = await createRelcheckFromConfig(
      new MemoryTupleStore(),
      loadConfig({
        RELCHECK_SCHEMA_PATH: ZANZANA_SCHEMA_PATH,
        RELCHECK_MAX_DEPTH: "1",
        RELCHECK_LOG_LEVEL: "warn",
      }),
      {
        logSink: (_level, line) => {
          messages.push(JSON.parse(line).message);
        },
      },
    );
    await client.addTuple(admin);
    await client.check({ ...admin, relation: "view" });

    expect(messages).not.toContain("Tuple written");
    expect(messages).toContain("Check exceeded maximum depth");
  });

  test("requires a schema path", async () => {
    await expect(
      createRelcheckFromConfig(new MemoryTupleStore(), loadConfig({})),
    ).rejects.toThrow(new ConfigError(["RELCHECK_SCHEMA_PATH: Required"]));
  });
});
