import type { CellValue, ColumnKind, DataTable } from "@vizpilot/shared";

export function columnValues(table: DataTable, column: string): CellValue[] {
  return table.rows.map((row) => row[column] ?? null);
}

/** An all-missing column counts as numeric, the way a spreadsheet reader types an empty numeric column. */
export function inferColumnKind(values: CellValue[]): ColumnKind {
  const present = values.filter((value) => value !== null);
  if (present.every((value) => typeof value === "number")) return "numeric";
  if (present.every((value) => typeof value === "boolean")) return "boolean";
  return "categorical";
}

export function numericColumns(table: DataTable): string[] {
  return table.columns.filter((column) => inferColumnKind(columnValues(table, column)) === "numeric");
}

const TYPE_ORDER: Record<"number" | "boolean" | "string", number> = {
  number: 0,
  boolean: 1,
  string: 2,
};

/** Total order over non-null cells: numbers, then booleans, then strings. */
export function compareCells(left: Exclude<CellValue, null>, right: Exclude<CellValue, null>): number {
  const leftType = typeof left === "number" ? "number" : typeof left === "boolean" ? "boolean" : "string";
  const rightType = typeof right === "number" ? "number" : typeof right === "boolean" ? "boolean" : "string";
  if (leftType !== rightType) return TYPE_ORDER[leftType] - TYPE_ORDER[rightType];
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

export function cloneTable(table: DataTable): DataTable {
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  };
}
