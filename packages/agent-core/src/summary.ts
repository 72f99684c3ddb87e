import type { CategoricalStats, CellValue, DataSummary, DataTable, Instructions, NumericStats, ValueCount } from "@vizpilot/shared";
import { columnValues, inferColumnKind } from "./table-utils.js";

const MAX_TOP_VALUES = 5;

export function summarize(table: DataTable, instructions?: Pick<Instructions, "visualization">): DataSummary {
  const numericStats: Record<string, NumericStats> = {};
  const categoricalStats: Record<string, CategoricalStats> = {};

  for (const column of table.columns) {
    const values = columnValues(table, column);
    const kind = inferColumnKind(values);
    if (kind === "numeric") {
      numericStats[column] = describeNumbers(values.filter((value): value is number => typeof value === "number"));
    } else if (kind === "categorical") {
      categoricalStats[column] = describeCategories(values);
    }
  }

  const summary: DataSummary = {
    rowCount: table.rows.length,
    columnCount: table.columns.length,
    columnNames: [...table.columns],
    numericStats,
    categoricalStats,
  };
  if (instructions?.visualization) {
    summary.visualization = { ...instructions.visualization };
  }
  return summary;
}

function describeNumbers(values: number[]): NumericStats {
  if (!values.length) return { min: null, max: null, mean: null };

  let min = values[0] ?? 0;
  let max = min;
  let total = 0;
  for (const value of values) {
    if (value < min) min = value;
    if (value > max) max = value;
    total += value;
  }
  return { min, max, mean: total / values.length };
}

function describeCategories(values: CellValue[]): CategoricalStats {
  const counts = new Map<string, { label: string; count: number }>();
  for (const value of values) {
    if (value === null) continue;
    const key = JSON.stringify(value);
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { label: String(value), count: 1 });
    }
  }

  // Array.prototype.sort is stable, so equal counts keep first-appearance order.
  const topValues: ValueCount[] = [...counts.values()]
    .sort((a, b) => b.count - a.count)
    .slice(0, MAX_TOP_VALUES)
    .map((entry) => ({ value: entry.label, count: entry.count }));

  return { uniqueCount: counts.size, topValues };
}
