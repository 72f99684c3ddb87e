import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import test from "node:test";
import { getProjectPaths, type Logger } from "@vizpilot/shared";
import { MappingStore, humanizeColumnName } from "./mapping-store.js";

function withTempCwd(fn: (cwd: string) => void | Promise<void>): Promise<void> {
  const cwd = mkdtempSync(join(tmpdir(), "vizpilot-mapping-store-test-"));
  return Promise.resolve(fn(cwd)).finally(() => {
    rmSync(cwd, { recursive: true, force: true });
  });
}

function createLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: (message) => warnings.push(message),
  };
}

test("humanizeColumnName title-cases each separated word", () => {
  assert.equal(humanizeColumnName("cust_id"), "Cust Id");
  assert.equal(humanizeColumnName("ORDER-total.amt"), "Order Total Amt");
  assert.equal(humanizeColumnName("  region  "), "Region");
});

test("lookup falls back to the humanized name without creating a record", async () => {
  await withTempCwd((cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    assert.equal(store.lookup("order_amt"), "Order Amt");
    assert.deepEqual(store.candidates("order_amt"), [
      { businessLabel: "Order Amt", confidence: 0.5, observationCount: 0 },
    ]);
    assert.deepEqual(store.technicalNames(), []);
  });
});

test("merge reinforces a case-insensitive match and appends new labels", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.merge("cust_id", "Customer ID");
    await store.merge("cust_id", "customer id");
    await store.merge("cust_id", "Client Number", 0.9);

    assert.deepEqual(store.candidates("cust_id"), [
      { businessLabel: "Customer ID", confidence: 0.85, observationCount: 2 },
      { businessLabel: "Client Number", confidence: 0.9, observationCount: 1 },
    ]);
    assert.equal(store.lookup("cust_id"), "Client Number");
  });
});

test("lookup breaks confidence ties by observation count, then insertion order", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.merge("amt", "Amount");
    await store.merge("amt", "Total");
    assert.equal(store.lookup("amt"), "Amount");

    await store.feedback("amt", "Total", true);
    await store.feedback("amt", "Total", false);
    assert.deepEqual(store.candidates("amt")[1], { businessLabel: "Total", confidence: 0.8, observationCount: 3 });
    assert.equal(store.lookup("amt"), "Total");
  });
});

test("merge caps confidence at 1.0", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.merge("qty", "Quantity", 0.98);
    await store.merge("qty", "Quantity");
    assert.equal(store.candidates("qty")[0]?.confidence, 1);
  });
});

test("feedback seeds, adjusts and clamps confidence", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.feedback("sku", "Product Code", false);
    assert.deepEqual(store.candidates("sku"), [{ businessLabel: "Product Code", confidence: 0.4, observationCount: 1 }]);

    for (let index = 0; index < 5; index += 1) {
      await store.feedback("sku", "product code", false);
    }
    assert.deepEqual(store.candidates("sku"), [{ businessLabel: "Product Code", confidence: 0.1, observationCount: 6 }]);

    await store.feedback("sku", "Stock Unit", false);
    assert.equal(store.candidates("sku").length, 1);

    await store.feedback("sku", "Stock Unit", true);
    assert.deepEqual(store.candidates("sku")[1], { businessLabel: "Stock Unit", confidence: 0.6, observationCount: 1 });

    await store.feedback("new_col", "New Column", true);
    assert.deepEqual(store.candidates("new_col"), [{ businessLabel: "New Column", confidence: 0.6, observationCount: 1 }]);
  });
});

test("candidates returns copies", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.merge("region", "Sales Region");
    const [first] = store.candidates("region");
    assert.ok(first);
    first.confidence = 0;
    assert.equal(store.candidates("region")[0]?.confidence, 0.8);
  });
});

test("mappings survive a new store instance", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.merge("cust_id", "Customer ID");
    await store.merge("order_amt", "Order Amount", 0.7);

    const path = getProjectPaths(cwd).mappingStorePath;
    const persisted: unknown = JSON.parse(readFileSync(path, "utf-8"));
    assert.deepEqual(persisted, {
      schemaVersion: 1,
      mappings: {
        cust_id: [{ businessLabel: "Customer ID", confidence: 0.8, observationCount: 1 }],
        order_amt: [{ businessLabel: "Order Amount", confidence: 0.7, observationCount: 1 }],
      },
    });

    const reloaded = MappingStore.forProject(cwd, createLogger());
    assert.equal(reloaded.lookup("cust_id"), "Customer ID");
    assert.deepEqual(reloaded.technicalNames(), ["cust_id", "order_amt"]);
  });
});

test("concurrent merges on one name are all counted", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await Promise.all(Array.from({ length: 5 }, () => store.merge("region", "Region Name")));
    assert.deepEqual(store.candidates("region"), [{ businessLabel: "Region Name", confidence: 1, observationCount: 5 }]);

    const reloaded = MappingStore.forProject(cwd, createLogger());
    assert.equal(reloaded.candidates("region")[0]?.observationCount, 5);
  });
});

test("a corrupt mapping file loads as an empty store with a warning", async () => {
  await withTempCwd((cwd) => {
    const path = getProjectPaths(cwd).mappingStorePath;
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, "{not json", "utf-8");

    const logger = createLogger();
    const store = MappingStore.forProject(cwd, logger);
    assert.deepEqual(store.technicalNames(), []);
    assert.equal(logger.warnings.length, 1);
    assert.match(logger.warnings[0] ?? "", /is unreadable, starting empty/);
  });
});

test("loading drops malformed entries and collapses duplicate labels", async () => {
  await withTempCwd((cwd) => {
    const path = getProjectPaths(cwd).mappingStorePath;
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(
      path,
      JSON.stringify({
        schemaVersion: 1,
        mappings: {
          cust_id: [
            { businessLabel: "Customer ID", confidence: 0.7, observationCount: 2 },
            { businessLabel: "customer id", confidence: 0.9, observationCount: 1 },
            { businessLabel: "", confidence: 0.9, observationCount: 1 },
            { businessLabel: "Client", confidence: "high", observationCount: 1 },
            { businessLabel: "Buyer", confidence: 4, observationCount: 1 },
          ],
          broken: "nope",
        },
      }),
      "utf-8",
    );

    const store = MappingStore.forProject(cwd, createLogger());
    assert.deepEqual(store.technicalNames(), ["cust_id"]);
    assert.deepEqual(store.candidates("cust_id"), [
      { businessLabel: "Customer ID", confidence: 0.9, observationCount: 3 },
      { businessLabel: "Buyer", confidence: 1, observationCount: 1 },
    ]);
  });
});

test("a failed write is logged and the in-memory store still changes", async () => {
  await withTempCwd(async (cwd) => {
    const blocker = join(cwd, "blocker");
    writeFileSync(blocker, "not a directory", "utf-8");
    const logger = createLogger();
    const store = new MappingStore(join(blocker, "mappings.json"), logger);

    await store.merge("cust_id", "Customer ID");
    await store.feedback("cust_id", "Customer ID", true);

    assert.equal(store.lookup("cust_id"), "Customer ID");
    assert.deepEqual(store.candidates("cust_id"), [{ businessLabel: "Customer ID", confidence: 0.9, observationCount: 2 }]);
    assert.equal(logger.warnings.length, 2);
    for (const message of logger.warnings) {
      assert.match(message, /^Failed to persist mapping store at /);
    }
  });
});

test("a column named __proto__ is persisted as an ordinary key", async () => {
  await withTempCwd(async (cwd) => {
    const store = MappingStore.forProject(cwd, createLogger());
    await store.merge("__proto__", "Prototype");

    const raw = readFileSync(getProjectPaths(cwd).mappingStorePath, "utf-8");
    assert.match(raw, /"__proto__": \[/);

    const reloaded = MappingStore.forProject(cwd, createLogger());
    assert.equal(reloaded.lookup("__proto__"), "Prototype");
  });
});
