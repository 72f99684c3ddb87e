import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import type { Logger, SchemaMapping } from "@vizpilot/shared";
import { MappingStore } from "./mapping-store.js";
import { SchemaResolver, type ColumnMapper } from "./schema-resolver.js";

const silentLogger: Logger = { info: () => undefined, warn: () => undefined, error: () => undefined };

function withTempCwd(fn: (cwd: string) => void | Promise<void>): Promise<void> {
  const cwd = mkdtempSync(join(tmpdir(), "vizpilot-schema-resolver-test-"));
  return Promise.resolve(fn(cwd)).finally(() => {
    rmSync(cwd, { recursive: true, force: true });
  });
}

class RecordingMapper implements ColumnMapper {
  readonly requests: string[][] = [];

  constructor(private readonly reply: SchemaMapping) {}

  async mapColumns(columns: string[]): Promise<SchemaMapping> {
    this.requests.push(columns);
    return this.reply;
  }
}

test("resolveSchema asks only about unresolved columns and learns the answers", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, silentLogger);
    await store.merge("region", "Sales Region");
    const mapper = new RecordingMapper({ cust_id: "Customer ID", region: "Ignored", stray: "Not Asked" });
    const resolver = new SchemaResolver(store, mapper, silentLogger);

    const mapping = await resolver.resolveSchema(["cust_id", "region", "order_amt"]);

    assert.deepEqual(mapper.requests, [["cust_id", "order_amt"]]);
    assert.deepEqual(mapping, { cust_id: "Customer ID", region: "Sales Region", order_amt: "Order Amt" });
    assert.deepEqual(store.technicalNames(), ["cust_id", "region"]);
    assert.deepEqual(store.candidates("cust_id"), [{ businessLabel: "Customer ID", confidence: 0.8, observationCount: 1 }]);
  });
});

test("resolveSchema skips the interpreter when every column is known", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, silentLogger);
    await store.merge("cust_id", "Customer ID");
    const mapper = new RecordingMapper({});
    const resolver = new SchemaResolver(store, mapper, silentLogger);

    assert.deepEqual(await resolver.resolveSchema(["cust_id"]), { cust_id: "Customer ID" });
    assert.deepEqual(mapper.requests, []);
  });
});

test("resolveSchema asks again about a column whose best label is still the humanized name", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, silentLogger);
    await store.feedback("cust_id", "Cust Id", true);
    const mapper = new RecordingMapper({ cust_id: "Customer" });
    const resolver = new SchemaResolver(store, mapper, silentLogger);

    assert.deepEqual(await resolver.resolveSchema(["cust_id"]), { cust_id: "Customer" });
    assert.deepEqual(mapper.requests, [["cust_id"]]);
    assert.deepEqual(store.candidates("cust_id"), [
      { businessLabel: "Cust Id", confidence: 0.6, observationCount: 1 },
      { businessLabel: "Customer", confidence: 0.8, observationCount: 1 },
    ]);
  });
});

test("resolveSchema keeps a column named __proto__ as an ordinary key", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, silentLogger);
    const reply: SchemaMapping = JSON.parse("{\"__proto__\":\"Prototype\"}");
    const resolver = new SchemaResolver(store, new RecordingMapper(reply), silentLogger);

    const mapping = await resolver.resolveSchema(["__proto__", "amt"]);

    assert.deepEqual(Object.keys(mapping), ["__proto__", "amt"]);
    assert.equal(Object.getOwnPropertyDescriptor(mapping, "__proto__")?.value, "Prototype");
    assert.deepEqual(store.technicalNames(), ["__proto__"]);
  });
});

test("resolveSchema keeps fallbacks and stores nothing when the interpreter returns no labels", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, silentLogger);
    const resolver = new SchemaResolver(store, new RecordingMapper({ order_amt: "  " }), silentLogger);

    assert.deepEqual(await resolver.resolveSchema(["order_amt"]), { order_amt: "Order Amt" });
    assert.deepEqual(store.technicalNames(), []);
  });
});

test("sampleRows returns the first rows column by column", async () => {
  await withTempCwd((cwd) => {
    const resolver = new SchemaResolver(MappingStore.forProject(cwd, silentLogger), new RecordingMapper({}), silentLogger);
    const table = {
      columns: ["id", "name"],
      rows: [
        { id: 1, name: "a" },
        { id: 2, name: null },
        { id: 3, name: "c" },
      ],
    };

    assert.deepEqual(resolver.sampleRows(table, 2), { id: [1, 2], name: ["a", null] });
    assert.deepEqual(resolver.sampleRows(table), { id: [1, 2, 3], name: ["a", null, "c"] });
  });
});

test("recordFeedback and listMappings go through the store", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, silentLogger);
    const resolver = new SchemaResolver(store, new RecordingMapper({}), silentLogger);

    await resolver.recordFeedback("amt", "Amount", true);
    assert.deepEqual(resolver.listMappings("amt"), [{ businessLabel: "Amount", confidence: 0.6, observationCount: 1 }]);
  });
});
