import {
  errorMessage,
  type AggregationMethod,
  type AggregationSpec,
  type CellValue,
  type DataRow,
  type DataSummary,
  type DataTable,
  type FilterSpec,
  type FilterValue,
  type Instructions,
  type Logger,
  type StepOutcome,
} from "@vizpilot/shared";
import { summarize } from "./summary.js";
import { cloneTable, columnValues, compareCells, inferColumnKind, numericColumns } from "./table-utils.js";

export interface ApplyResult {
  table: DataTable;
  summary: DataSummary;
  diagnostics: StepOutcome[];
}

type Application = { ok: true; table: DataTable; detail: string } | { ok: false; reason: string };

type RowPredicate = (cell: CellValue) => boolean;

export function applyInstructions(table: DataTable, instructions: Instructions, logger: Logger = console): ApplyResult {
  const diagnostics: StepOutcome[] = [];
  let working = cloneTable(table);

  instructions.filters.forEach((filter, index) => {
    const step = `filter[${index}]`;
    const application = applyFilter(working, filter);
    if (application.ok) {
      working = application.table;
      diagnostics.push({ status: "applied", step, detail: application.detail });
      return;
    }
    logger.warn(`Skipping ${step} (${describeFilter(filter)}): ${application.reason}`);
    diagnostics.push({ status: "skipped", step, reason: application.reason });
  });

  if (instructions.groupByColumns.length) {
    const application = applyAggregation(working, instructions.groupByColumns, instructions.aggregation);
    if (application.ok) {
      working = application.table;
      diagnostics.push({ status: "applied", step: "aggregation", detail: application.detail });
    } else {
      logger.warn(`Skipping aggregation: ${application.reason}`);
      diagnostics.push({ status: "skipped", step: "aggregation", reason: application.reason });
    }
  }

  return {
    table: working,
    summary: summarize(working, instructions),
    diagnostics,
  };
}

export function applyFilter(table: DataTable, filter: FilterSpec): Application {
  if (!table.columns.includes(filter.column)) {
    return { ok: false, reason: `column '${filter.column}' does not exist` };
  }

  try {
    const predicate = buildPredicate(filter, columnValues(table, filter.column));
    if (typeof predicate === "string") {
      return { ok: false, reason: predicate };
    }

    const rows = table.rows.filter((row) => predicate(row[filter.column] ?? null));
    return {
      ok: true,
      table: { columns: [...table.columns], rows },
      detail: `${describeFilter(filter)} kept ${rows.length} of ${table.rows.length} rows`,
    };
  } catch (error) {
    return { ok: false, reason: errorMessage(error) };
  }
}

function buildPredicate(filter: FilterSpec, values: CellValue[]): RowPredicate | string {
  const { operator, value } = filter;

  switch (operator) {
    case "eq":
      return (cell) => cell !== null && cell === value;
    case "ne":
      return (cell) => !(cell !== null && cell === value);
    case "gt":
    case "ge":
    case "lt":
    case "le": {
      if (typeof value !== "number" && typeof value !== "string") {
        return `operator '${operator}' needs a number or text value`;
      }
      const mismatch = values.find((cell) => cell !== null && typeof cell !== typeof value);
      if (mismatch !== undefined) {
        return `type mismatch: column '${filter.column}' holds ${typeof mismatch} values, filter value is ${typeof value}`;
      }
      return (cell) => {
        if (cell === null || typeof cell !== typeof value) return false;
        const order = compareCells(cell, value);
        if (operator === "gt") return order > 0;
        if (operator === "ge") return order >= 0;
        if (operator === "lt") return order < 0;
        return order <= 0;
      };
    }
    case "isIn": {
      if (!Array.isArray(value)) {
        return "operator 'isIn' needs a list value";
      }
      const members: FilterValue[] = value;
      return (cell) => cell !== null && members.some((member) => member === cell);
    }
    case "contains": {
      const needle = String(value);
      return (cell) => typeof cell === "string" && cell.includes(needle);
    }
  }
}

export function applyAggregation(table: DataTable, groupByColumns: string[], aggregation: AggregationSpec): Application {
  const missing = groupByColumns.filter((column) => !table.columns.includes(column));
  if (missing.length) {
    return { ok: false, reason: `group-by column(s) ${missing.map((column) => `'${column}'`).join(", ")} do not exist` };
  }

  const { method } = aggregation;
  const target = aggregation.targetColumn ?? numericColumns(table).find((column) => !groupByColumns.includes(column)) ?? "";
  if (!target) {
    return { ok: false, reason: "no numeric column is available to aggregate" };
  }
  if (method !== "count") {
    if (!table.columns.includes(target)) {
      return { ok: false, reason: `aggregation column '${target}' does not exist` };
    }
    if (inferColumnKind(columnValues(table, target)) !== "numeric") {
      return { ok: false, reason: `cannot apply '${method}' to non-numeric column '${target}'` };
    }
  }

  const resultColumn = method === "count" ? "count" : `${method}_${target}`;
  if (groupByColumns.includes(resultColumn)) {
    return { ok: false, reason: `aggregate column '${resultColumn}' collides with a group-by column` };
  }

  try {
    const groups = groupRows(table.rows, groupByColumns);
    const rows: DataRow[] = groups.map((group) => {
      const row: DataRow = {};
      groupByColumns.forEach((column, index) => {
        row[column] = group.key[index] ?? null;
      });
      row[resultColumn] =
        method === "count"
          ? group.rows.length
          : aggregate(
              method,
              group.rows
                .map((item) => item[target] ?? null)
                .filter((cell): cell is number => typeof cell === "number"),
            );
      return row;
    });

    const targetLabel = method === "count" ? "rows" : target;
    return {
      ok: true,
      table: { columns: [...groupByColumns, resultColumn], rows },
      detail: `${method} of ${targetLabel} by ${groupByColumns.join(", ")} produced ${rows.length} groups`,
    };
  } catch (error) {
    return { ok: false, reason: errorMessage(error) };
  }
}

interface RowGroup {
  key: Array<Exclude<CellValue, null>>;
  rows: DataRow[];
}

/** Rows with a missing key are dropped; groups come back in ascending key order. */
function groupRows(rows: DataRow[], groupByColumns: string[]): RowGroup[] {
  const groups = new Map<string, RowGroup>();

  for (const row of rows) {
    const key: Array<Exclude<CellValue, null>> = [];
    let complete = true;
    for (const column of groupByColumns) {
      const cell = row[column] ?? null;
      if (cell === null) {
        complete = false;
        break;
      }
      key.push(cell);
    }
    if (!complete) continue;

    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
}

function compareKeys(left: Array<Exclude<CellValue, null>>, right: Array<Exclude<CellValue, null>>): number {
  for (let index = 0; index < Math.min(left.length, right.length); index += 1) {
    const leftCell = left[index];
    const rightCell = right[index];
    if (leftCell === undefined || rightCell === undefined) break;
    const order = compareCells(leftCell, rightCell);
    if (order !== 0) return order;
  }
  return left.length - right.length;
}

export function aggregate(method: Exclude<AggregationMethod, "count">, values: number[]): number | null {
  if (method === "sum") return values.reduce((acc, value) => acc + value, 0);
  if (!values.length) return null;

  switch (method) {
    case "mean":
      return values.reduce((acc, value) => acc + value, 0) / values.length;
    case "median": {
      const sorted = [...values].sort((a, b) => a - b);
      const mid = Math.floor(sorted.length / 2);
      const upper = sorted[mid] ?? 0;
      return sorted.length % 2 === 0 ? ((sorted[mid - 1] ?? upper) + upper) / 2 : upper;
    }
    case "min":
      return values.reduce((acc, value) => (value < acc ? value : acc));
    case "max":
      return values.reduce((acc, value) => (value > acc ? value : acc));
    case "std": {
      if (values.length < 2) return null;
      const mean = values.reduce((acc, value) => acc + value, 0) / values.length;
      const squared = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
      return Math.sqrt(squared / (values.length - 1));
    }
  }
}

function describeFilter(filter: FilterSpec): string {
  return `${filter.column} ${filter.operator} ${JSON.stringify(filter.value)}`;
}
