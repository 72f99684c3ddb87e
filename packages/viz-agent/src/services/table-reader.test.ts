import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import * as XLSX from "xlsx";
import { VizPilotError, type Logger } from "@vizpilot/shared";
import { FileTableReader, coerceCell } from "./table-reader.js";

const silentLogger: Logger = { info: () => undefined, warn: () => undefined, error: () => undefined };

function withTempDir(fn: (dir: string) => void | Promise<void>): Promise<void> {
  const dir = mkdtempSync(join(tmpdir(), "vizpilot-table-reader-test-"));
  return Promise.resolve(fn(dir)).finally(() => {
    rmSync(dir, { recursive: true, force: true });
  });
}

test("coerceCell normalises blanks, numbers and booleans", () => {
  assert.equal(coerceCell(""), null);
  assert.equal(coerceCell("   "), null);
  assert.equal(coerceCell("42"), 42);
  assert.equal(coerceCell("-3.5"), -3.5);
  assert.equal(coerceCell("1e3"), 1000);
  assert.equal(coerceCell("TRUE"), true);
  assert.equal(coerceCell("false"), false);
  assert.equal(coerceCell("12 apples"), "12 apples");
  assert.equal(coerceCell("0x1f"), "0x1f");
});

test("read parses a CSV file into typed rows", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "orders.csv");
    writeFileSync(path, "cust_id,order_amt,vip\nc1,10,true\nc2,,false\nc3,7.5,\n", "utf-8");

    const table = await new FileTableReader(silentLogger).read(path);
    assert.deepEqual(table, {
      columns: ["cust_id", "order_amt", "vip"],
      rows: [
        { cust_id: "c1", order_amt: 10, vip: true },
        { cust_id: "c2", order_amt: null, vip: false },
        { cust_id: "c3", order_amt: 7.5, vip: null },
      ],
    });
  });
});

test("read parses tab-separated files and names blank or repeated headers", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "teams.tsv");
    writeFileSync(path, "team\t\tteam\nred\t1\tblue\n", "utf-8");

    const table = await new FileTableReader(silentLogger).read(path);
    assert.deepEqual(table.columns, ["team", "column_2", "team_1"]);
    assert.deepEqual(table.rows, [{ team: "red", column_2: 1, team_1: "blue" }]);
  });
});

test("read fills short rows with nulls", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "short.csv");
    writeFileSync(path, "a,b,c\n1,2\n", "utf-8");

    const table = await new FileTableReader(silentLogger).read(path);
    assert.deepEqual(table.rows, [{ a: 1, b: 2, c: null }]);
  });
});

test("read loads the first sheet of a workbook", async () => {
  await withTempDir(async (dir) => {
    const workbook = XLSX.utils.book_new();
    const sheet = XLSX.utils.aoa_to_sheet([
      ["region", "revenue"],
      ["north", 120],
      ["south", null],
    ]);
    XLSX.utils.book_append_sheet(workbook, sheet, "Sales");
    const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
    const path = join(dir, "sales.xlsx");
    writeFileSync(path, buffer);

    const table = await new FileTableReader(silentLogger).read(path);
    assert.deepEqual(table, {
      columns: ["region", "revenue"],
      rows: [
        { region: "north", revenue: 120 },
        { region: "south", revenue: null },
      ],
    });
  });
});

test("read rejects unsupported extensions", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "data.parquet");
    writeFileSync(path, "binary", "utf-8");

    await assert.rejects(
      () => new FileTableReader(silentLogger).read(path),
      (error: unknown) => error instanceof VizPilotError && error.code === "UNSUPPORTED_FILE_TYPE",
    );
  });
});

test("read rejects an empty file", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "empty.csv");
    writeFileSync(path, "", "utf-8");

    await assert.rejects(
      () => new FileTableReader(silentLogger).read(path),
      (error: unknown) => error instanceof VizPilotError && error.code === "EMPTY_TABLE",
    );
  });
});
