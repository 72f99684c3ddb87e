import assert from "node:assert/strict";
import test from "node:test";
import type { DataTable, Instructions, Logger } from "@vizpilot/shared";
import { aggregate, applyAggregation, applyFilter, applyInstructions } from "./instruction-applier.js";
import { defaultInstructions } from "./instruction-schema.js";

function createLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: () => undefined,
  };
}

const customers: DataTable = {
  columns: ["name", "age", "region", "revenue"],
  rows: [
    { name: "Ana", age: 25, region: "north", revenue: 100 },
    { name: "Ben", age: 35, region: "south", revenue: 40 },
    { name: "Caro", age: 42, region: "north", revenue: 200 },
    { name: "Dev", age: 31, region: null, revenue: 10 },
  ],
};

function withInstructions(overrides: Partial<Instructions>): Instructions {
  return { ...defaultInstructions(), ...overrides };
}

test("applyInstructions keeps rows that pass a numeric filter", () => {
  const logger = createLogger();
  const result = applyInstructions(
    customers,
    withInstructions({ filters: [{ column: "age", operator: "gt", value: 30 }] }),
    logger,
  );

  assert.deepEqual(
    result.table.rows.map((row) => row.name),
    ["Ben", "Caro", "Dev"],
  );
  assert.deepEqual(result.diagnostics, [{ status: "applied", step: "filter[0]", detail: "age gt 30 kept 3 of 4 rows" }]);
  assert.equal(result.summary.rowCount, 3);
  assert.deepEqual(logger.warnings, []);
});

test("applyInstructions skips an isIn filter without a list value", () => {
  const logger = createLogger();
  const result = applyInstructions(
    customers,
    withInstructions({ filters: [{ column: "region", operator: "isIn", value: "north" }] }),
    logger,
  );

  assert.deepEqual(result.table, customers);
  assert.deepEqual(result.diagnostics, [
    { status: "skipped", step: "filter[0]", reason: "operator 'isIn' needs a list value" },
  ]);
  assert.deepEqual(logger.warnings, ["Skipping filter[0] (region isIn \"north\"): operator 'isIn' needs a list value"]);
});

test("applyInstructions groups and sums into a method-prefixed column", () => {
  const result = applyInstructions(
    customers,
    withInstructions({ groupByColumns: ["region"], aggregation: { method: "sum", targetColumn: "revenue" } }),
    createLogger(),
  );

  assert.deepEqual(result.table, {
    columns: ["region", "sum_revenue"],
    rows: [
      { region: "north", sum_revenue: 300 },
      { region: "south", sum_revenue: 40 },
    ],
  });
  assert.deepEqual(result.diagnostics, [
    { status: "applied", step: "aggregation", detail: "sum of revenue by region produced 2 groups" },
  ]);
});

test("applyInstructions continues past a filter on a missing column", () => {
  const logger = createLogger();
  const result = applyInstructions(
    customers,
    withInstructions({
      filters: [
        { column: "country", operator: "eq", value: "PT" },
        { column: "region", operator: "eq", value: "north" },
      ],
    }),
    logger,
  );

  assert.deepEqual(
    result.table.rows.map((row) => row.name),
    ["Ana", "Caro"],
  );
  assert.deepEqual(result.diagnostics[0], { status: "skipped", step: "filter[0]", reason: "column 'country' does not exist" });
  assert.equal(result.diagnostics[1]?.status, "applied");
  assert.equal(logger.warnings.length, 1);
});

test("applyInstructions leaves the input table untouched", () => {
  const before = JSON.stringify(customers);
  applyInstructions(
    customers,
    withInstructions({ filters: [{ column: "age", operator: "lt", value: 30 }], groupByColumns: ["region"] }),
    createLogger(),
  );
  assert.equal(JSON.stringify(customers), before);
});

test("applyFilter rejects relational comparisons across types", () => {
  const application = applyFilter(customers, { column: "age", operator: "ge", value: "30" });
  assert.deepEqual(application, {
    ok: false,
    reason: "type mismatch: column 'age' holds number values, filter value is string",
  });
});

test("applyFilter handles eq, ne, contains and nulls", () => {
  const eq = applyFilter(customers, { column: "region", operator: "eq", value: null });
  assert.equal(eq.ok && eq.table.rows.length, 0);

  const ne = applyFilter(customers, { column: "region", operator: "ne", value: "north" });
  assert.deepEqual(ne.ok && ne.table.rows.map((row) => row.name), ["Ben", "Dev"]);

  const contains = applyFilter(customers, { column: "name", operator: "contains", value: "a" });
  assert.deepEqual(contains.ok && contains.table.rows.map((row) => row.name), ["Ana", "Caro"]);
});

test("applyAggregation counts rows per group", () => {
  const application = applyAggregation(customers, ["region"], { method: "count" });
  assert.deepEqual(application, {
    ok: true,
    table: {
      columns: ["region", "count"],
      rows: [
        { region: "north", count: 2 },
        { region: "south", count: 1 },
      ],
    },
    detail: "count of rows by region produced 2 groups",
  });
});

test("applyAggregation picks the first numeric column when no target is given", () => {
  const application = applyAggregation(customers, ["region"], { method: "max" });
  assert.deepEqual(application.ok && application.table.columns, ["region", "max_age"]);
});

test("applyAggregation skips when no numeric target exists", () => {
  const table: DataTable = {
    columns: ["city", "team"],
    rows: [{ city: "Lisbon", team: "red" }],
  };
  assert.deepEqual(applyAggregation(table, ["city"], { method: "sum" }), {
    ok: false,
    reason: "no numeric column is available to aggregate",
  });
  assert.deepEqual(applyAggregation(table, ["city"], { method: "mean", targetColumn: "team" }), {
    ok: false,
    reason: "cannot apply 'mean' to non-numeric column 'team'",
  });
});

test("applyInstructions leaves the table ungrouped when count has no numeric column", () => {
  const table: DataTable = {
    columns: ["region", "name"],
    rows: [
      { region: "north", name: "Ana" },
      { region: "north", name: "Ben" },
    ],
  };
  const logger = createLogger();

  const result = applyInstructions(
    table,
    withInstructions({ groupByColumns: ["region"], aggregation: { method: "count" } }),
    logger,
  );

  assert.deepEqual(result.table, table);
  assert.deepEqual(result.diagnostics, [
    { status: "skipped", step: "aggregation", reason: "no numeric column is available to aggregate" },
  ]);
  assert.deepEqual(logger.warnings, ["Skipping aggregation: no numeric column is available to aggregate"]);
});

test("aggregate computes the supported statistics", () => {
  const values = [4, 1, 3, 2];
  assert.equal(aggregate("sum", values), 10);
  assert.equal(aggregate("mean", values), 2.5);
  assert.equal(aggregate("median", values), 2.5);
  assert.equal(aggregate("median", [5, 1, 3]), 3);
  assert.equal(aggregate("min", values), 1);
  assert.equal(aggregate("max", values), 4);
  assert.equal(aggregate("std", [2, 4]), Math.SQRT2);
  assert.equal(aggregate("std", [7]), null);
  assert.equal(aggregate("mean", []), null);
  assert.equal(aggregate("sum", []), 0);
});
