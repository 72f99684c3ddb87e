import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";
import Papa from "papaparse";
import * as XLSX from "xlsx";
import { VizPilotError, type CellValue, type DataRow, type DataTable, type Logger } from "@vizpilot/shared";
import { detectFileType } from "../utils/fs-utils.js";

export interface TableReader {
  read: (filePath: string) => Promise<DataTable>;
}

const NUMERIC_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[-+]?\d+)?$/i;

/** Normalises one text cell: blank -> null, numeric text -> number, true/false -> boolean. */
export function coerceCell(text: string): CellValue {
  const trimmed = text.trim();
  if (!trimmed) return null;
  if (NUMERIC_PATTERN.test(trimmed)) return Number(trimmed);
  const lowered = trimmed.toLowerCase();
  if (lowered === "true") return true;
  if (lowered === "false") return false;
  return text;
}

export class FileTableReader implements TableReader {
  constructor(private readonly logger: Logger = console) {}

  async read(filePath: string): Promise<DataTable> {
    const fileType = detectFileType(filePath);
    if (fileType === "delimited") {
      return this.parseDelimited(readFileSync(filePath, "utf-8"), extname(filePath).toLowerCase() === ".tsv" ? "\t" : "");
    }
    if (fileType === "spreadsheet") {
      return this.parseSpreadsheet(readFileSync(filePath));
    }
    throw new VizPilotError(
      `Unsupported file type for ${basename(filePath)}. Use .csv, .tsv, .txt, .xls or .xlsx.`,
      "UNSUPPORTED_FILE_TYPE",
    );
  }

  parseDelimited(text: string, delimiter: string = ""): DataTable {
    const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ""), {
      delimiter,
      skipEmptyLines: "greedy",
    });

    const rowErrors = parsed.errors.filter((error) => error.type !== "Delimiter");
    if (rowErrors.length) {
      this.logger.warn(`Parsed with ${rowErrors.length} malformed row(s); first: ${rowErrors[0]?.message ?? "unknown"}`);
    }

    const [header, ...body] = parsed.data;
    return buildTable(header ?? [], body.map((cells) => cells.map((cell) => coerceCell(cell))));
  }

  parseSpreadsheet(buffer: Buffer): DataTable {
    const workbook = XLSX.read(buffer, { type: "buffer" });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) {
      throw new VizPilotError("Workbook does not contain any sheets.", "EMPTY_WORKBOOK");
    }

    const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, blankrows: false, raw: true });
    const [header, ...body] = matrix;
    return buildTable(
      (header ?? []).map((cell) => (cell === null || cell === undefined ? "" : String(cell))),
      body.map((cells) => cells.map((cell) => spreadsheetCell(cell))),
    );
  }
}

function spreadsheetCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "boolean") return value;
  if (value instanceof Date) return value.toISOString();
  return coerceCell(String(value));
}

function buildTable(header: string[], body: CellValue[][]): DataTable {
  const columns = uniqueColumnNames(header);
  if (!columns.length) {
    throw new VizPilotError("File has no header row.", "EMPTY_TABLE");
  }

  const rows = body.map((cells) => {
    const row: DataRow = {};
    columns.forEach((column, index) => {
      row[column] = cells[index] ?? null;
    });
    return row;
  });
  return { columns, rows };
}

/** Blank headers become `column_<n>`; repeats get a numeric suffix. */
function uniqueColumnNames(header: string[]): string[] {
  const seen = new Map<string, number>();
  return header.map((raw, index) => {
    const base = raw.trim() || `column_${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count ? `${base}_${count}` : base;
  });
}
