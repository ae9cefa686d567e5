import { beforeAll, describe, expect, test } from "vitest";
import { UnknownRelationError } from "src/core/errors.ts";
import { createRelcheck, type RelcheckClient } from "src/index.ts";
import { MemoryTupleStore } from "src/store/memory.ts";
import { expectCheck } from "tests/helpers/conformance.ts";
import { loadZanzanaSchema } from "tests/helpers/schema.ts";

// Grafana-style authorization model (tests/fixtures/zanzana.fga).
// Covers folder parent cascades, deep implied hierarchies, userset
// subjects (team#member, nested role#assignee), CEL conditions with
// string equality and list membership, and hyphenated type names.

const DASHBOARD_GROUP = "dashboard.grafana.app";

describe("Zanzana model", () => {
  let client: RelcheckClient;

  beforeAll(async () => {
    const schema = await loadZanzanaSchema();
    client = createRelcheck(new MemoryTupleStore(), schema);

    // === Principals ===
    await client.addTuple({
      objectType: "team",
      objectId: "platform",
      relation: "admin",
      subjectType: "user",
      subjectId: "alice",
    });
    await client.addTuple({
      objectType: "team",
      objectId: "platform",
      relation: "member",
      subjectType: "user",
      subjectId: "bob",
    });
    await client.addTuple({
      objectType: "team",
      objectId: "platform",
      relation: "member",
      subjectType: "user",
      subjectId: "charlie",
    });
    await client.addTuple({
      objectType: "role",
      objectId: "viewer",
      relation: "assignee",
      subjectType: "user",
      subjectId: "diana",
    });
    // role:auditor includes everyone assigned role:viewer
    await client.addTuple({
      objectType: "role",
      objectId: "auditor",
      relation: "assignee",
      subjectType: "role",
      subjectId: "viewer",
      subjectRelation: "assignee",
    });

    // === Folder tree: root <- dashboards <- alerts ===
    await client.addTuple({
      objectType: "folder",
      objectId: "dashboards",
      relation: "parent",
      subjectType: "folder",
      subjectId: "root",
    });
    await client.addTuple({
      objectType: "folder",
      objectId: "alerts",
      relation: "parent",
      subjectType: "folder",
      subjectId: "dashboards",
    });
    await client.addTuple({
      objectType: "folder",
      objectId: "root",
      relation: "admin",
      subjectType: "user",
      subjectId: "alice",
    });
    await client.addTuple({
      objectType: "folder",
      objectId: "dashboards",
      relation: "edit",
      subjectType: "team",
      subjectId: "platform",
      subjectRelation: "member",
    });
    await client.addTuple({
      objectType: "folder",
      objectId: "root",
      relation: "view",
      subjectType: "role",
      subjectId: "auditor",
      subjectRelation: "assignee",
    });
    await client.addTuple({
      objectType: "folder",
      objectId: "alerts",
      relation: "read",
      subjectType: "service-account",
      subjectId: "bot",
    });
    await client.addTuple({
      objectType: "folder",
      objectId: "root",
      relation: "resource_create",
      subjectType: "user",
      subjectId: "eve",
      conditionName: "subresource_filter",
      conditionContext: { subresources: ["dashboards", "alerts"] },
    });

    // === Resources ===
    await client.addTuple({
      objectType: "resource",
      objectId: "dashboards",
      relation: "admin",
      subjectType: "user",
      subjectId: "alice",
      conditionName: "group_filter",
      conditionContext: { resource_group: DASHBOARD_GROUP },
    });
    await client.addTuple({
      objectType: "resource",
      objectId: "dashboards",
      relation: "view",
      subjectType: "team",
      subjectId: "platform",
      subjectRelation: "member",
      conditionName: "group_filter",
      conditionContext: { resource_group: DASHBOARD_GROUP },
    });

    // === Namespace ===
    await client.addTuple({
      objectType: "namespace",
      objectId: "default",
      relation: "edit",
      subjectType: "team",
      subjectId: "platform",
      subjectRelation: "member",
    });
  });

  describe("Teams and roles", () => {
    test("team admin is a team member", async () => {
      await expectCheck(
        client,
        {
          objectType: "team",
          objectId: "platform",
          relation: "member",
          subjectType: "user",
          subjectId: "alice",
        },
        true,
      );
    });

    test("nested role assignment resolves", async () => {
      await expectCheck(
        client,
        {
          objectType: "role",
          objectId: "auditor",
          relation: "assignee",
          subjectType: "user",
          subjectId: "diana",
        },
        true,
      );
    });
  });

  describe("Folder parent cascade", () => {
    test("root admin is admin of nested folders", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "admin",
          subjectType: "user",
          subjectId: "alice",
        },
        true,
      );
    });

    test("admin implies edit", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "edit",
          subjectType: "user",
          subjectId: "alice",
        },
        true,
      );
    });

    test("team member edits the folder and its children", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "dashboards",
          relation: "edit",
          subjectType: "user",
          subjectId: "bob",
        },
        true,
      );
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "edit",
          subjectType: "user",
          subjectId: "bob",
        },
        true,
      );
    });

    test("permissions do not flow up to the parent", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "root",
          relation: "edit",
          subjectType: "user",
          subjectId: "bob",
        },
        false,
      );
    });

    test("role assignee views and reads through the cascade", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "view",
          subjectType: "user",
          subjectId: "diana",
        },
        true,
      );
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "read",
          subjectType: "user",
          subjectId: "diana",
        },
        true,
      );
    });

    test("view does not imply edit", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "edit",
          subjectType: "user",
          subjectId: "diana",
        },
        false,
      );
    });

    test("service account read is scoped to its folder", async () => {
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "read",
          subjectType: "service-account",
          subjectId: "bot",
        },
        true,
      );
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "alerts",
          relation: "view",
          subjectType: "service-account",
          subjectId: "bot",
        },
        false,
      );
      await expectCheck(
        client,
        {
          objectType: "folder",
          objectId: "dashboards",
          relation: "read",
          subjectType: "service-account",
          subjectId: "bot",
        },
        false,
      );
    });
  });

  describe("Conditions", () => {
    const resourceCreate = (subresource?: string) => ({
      objectType: "folder",
      objectId: "alerts",
      relation: "resource_create",
      subjectType: "user",
      subjectId: "eve",
      context: subresource === undefined ? undefined : { subresource },
    });

    test("subresource_filter allows listed subresources", async () => {
      await expectCheck(client, resourceCreate("alerts"), true);
    });

    test("subresource_filter denies other subresources", async () => {
      await expectCheck(client, resourceCreate("users"), false);
    });

    test("a missing condition parameter denies", async () => {
      await expectCheck(client, resourceCreate(), false);
    });

    test("group_filter matches the requested group", async () => {
      const viewDashboards = (subjectId: string, requestedGroup: string) => ({
        objectType: "resource",
        objectId: "dashboards",
        relation: "view",
        subjectType: "user",
        subjectId,
        context: { requested_group: requestedGroup },
      });

      await expectCheck(client, viewDashboards("alice", DASHBOARD_GROUP), true);
      await expectCheck(client, viewDashboards("alice", "alerting.grafana.app"), false);
      await expectCheck(client, viewDashboards("charlie", DASHBOARD_GROUP), true);
      await expectCheck(client, viewDashboards("diana", DASHBOARD_GROUP), false);
    });
  });

  describe("Namespace", () => {
    test("edit implies delete", async () => {
      await expectCheck(
        client,
        {
          objectType: "namespace",
          objectId: "default",
          relation: "delete",
          subjectType: "user",
          subjectId: "charlie",
        },
        true,
      );
    });

    test("edit does not imply permissions_write", async () => {
      await expectCheck(
        client,
        {
          objectType: "namespace",
          objectId: "default",
          relation: "permissions_write",
          subjectType: "user",
          subjectId: "charlie",
        },
        false,
      );
    });

    test("an undefined relation is rejected", async () => {
      await expect(
        client.check({
          objectType: "namespace",
          objectId: "default",
          relation: "get",
          subjectType: "user",
          subjectId: "charlie",
        }),
      ).rejects.toBeInstanceOf(UnknownRelationError);
    });
  });

  describe("Expand agrees with check", () => {
    const alertsView = { objectType: "folder", objectId: "alerts", relation: "view" };

    test("lists every viewer of a nested folder", async () => {
      expect(await client.expand(alertsView)).toEqual([
        { subjectType: "user", subjectId: "alice" },
        { subjectType: "user", subjectId: "bob" },
        { subjectType: "user", subjectId: "charlie" },
        { subjectType: "user", subjectId: "diana" },
      ]);
    });

    test("every expanded subject passes check", async () => {
      const subjects = await client.expand(alertsView);
      const results = await client.batchCheck(
        subjects.map((subject) => ({ ...alertsView, ...subject })),
      );
      expect(results.every(Boolean)).toBe(true);
    });

    test("subjects missing from the expansion fail check", async () => {
      await expectCheck(
        client,
        { ...alertsView, subjectType: "user", subjectId: "eve" },
        false,
      );
      await expectCheck(
        client,
        { ...alertsView, subjectType: "service-account", subjectId: "bot" },
        false,
      );
    });
  });
});
