import { appendFileSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname, extname } from "node:path";

export type TabularFileType = "delimited" | "spreadsheet" | "other";

export function detectFileType(path: string): TabularFileType {
  const ext = extname(path).toLowerCase();
  if ([".csv", ".tsv", ".txt"].includes(ext)) return "delimited";
  if ([".xls", ".xlsx"].includes(ext)) return "spreadsheet";
  return "other";
}

/** Writes next to the target and renames into place, so readers never see a partial file. */
export function atomicWriteJson(path: string, value: unknown): void {
  ensureDirectory(dirname(path));
  const tempPath = `${path}.tmp-${process.pid}-${Date.now()}`;
  const content = `${JSON.stringify(value, null, 2)}\n`;
  writeFileSync(tempPath, content, "utf-8");
  renameSync(tempPath, path);
}

/** `undefined` when the file does not exist; parse errors propagate. */
export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return undefined;
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parsed;
}

export function appendText(path: string, content: string): void {
  ensureDirectory(dirname(path));
  appendFileSync(path, content, "utf-8");
}

function ensureDirectory(path: string): void {
  mkdirSync(path, { recursive: true });
}
