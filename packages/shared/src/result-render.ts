import type { CellValue, DataTable, FilePreview, PipelineResult, PipelineResultView, QualityIssue, StepOutcome } from "./contracts.js";

export interface ResultRenderOptions {
  maxWidth?: number;
  maxColumnWidth?: number;
  maxDataRows?: number;
  useColor?: boolean;
  sectionStyle?: "classic" | "panel";
  useUnicodeBorders?: boolean;
}

interface ResolvedRenderOptions {
  width: number;
  maxColumnWidth: number;
  maxDataRows: number;
  useColor: boolean;
  sectionStyle: "classic" | "panel";
  useUnicodeBorders: boolean;
}

const MIN_SECTION_WIDTH = 60;
const DEFAULT_SECTION_WIDTH = 100;
const MAX_SECTION_WIDTH = 160;
const DEFAULT_MAX_COLUMN_WIDTH = 28;
const MIN_COLUMN_WIDTH = 8;
const DEFAULT_MAX_DATA_ROWS = 10;
const DEFAULT_SECTION_STYLE = "classic";

const ANSI = {
  reset: "\u001b[0m",
  bold: "\u001b[1m",
  dim: "\u001b[2m",
  cyan: "\u001b[36m",
};

export function renderPipelineResult(
  result: PipelineResultView | PipelineResult,
  options: ResultRenderOptions = {},
): string {
  const resolved = resolveOptions(options);
  const { width } = resolved;
  const sections: Array<{ title: string; lines: string[] }> = [];

  const overview = [
    ...renderKeyValue("Id", result.id, width),
    ...renderKeyValue("Quality score", `${result.qualityScore.toFixed(1)} / 10`, width),
    ...renderKeyValue("Issues", String(result.issues.length), width),
  ];
  if ("rawTransformedData" in result) {
    overview.push(
      ...renderKeyValue("Source file", result.sourceFile, width),
      ...renderKeyValue("Chart", `${result.visualization.chartType} - ${result.visualization.title}`, width),
      ...renderKeyValue("Rows", String(result.summary.rowCount), width),
    );
  }
  sections.push({ title: "RESULT", lines: overview });
  sections.push({ title: "EXPLANATION", lines: wrapText(result.explanationText, width) });
  sections.push({ title: "ISSUES", lines: renderIssues(result.issues, width) });

  if ("rawTransformedData" in result) {
    sections.push({ title: "DATA", lines: renderDataTable(result.rawTransformedData, resolved) });
    sections.push({ title: "DIAGNOSTICS", lines: renderDiagnostics(result.diagnostics, width) });
  }

  return sections.map((section) => renderSection(section.title, section.lines, resolved)).join("\n\n");
}

export function renderFilePreview(preview: FilePreview, options: ResultRenderOptions = {}): string {
  const resolved = resolveOptions(options);
  const columns = Object.keys(preview.schemaMapping);
  const mappingRows = columns.map((column) => [column, preview.schemaMapping[column] ?? ""]);
  const sampleColumns = Object.keys(preview.sampleData);
  const sampleLength = sampleColumns.reduce((acc, column) => Math.max(acc, preview.sampleData[column]?.length ?? 0), 0);
  const sampleRows: string[][] = [];
  for (let index = 0; index < sampleLength; index += 1) {
    sampleRows.push(sampleColumns.map((column) => formatValue(preview.sampleData[column]?.[index] ?? null)));
  }

  return [
    renderSection("FILE", renderKeyValue("Path", preview.filePath, resolved.width), resolved),
    renderSection("SCHEMA MAPPING", renderTable(["column", "business label"], mappingRows, resolved), resolved),
    renderSection("SAMPLE", renderTable(sampleColumns, sampleRows, resolved), resolved),
  ].join("\n\n");
}

function resolveOptions(options: ResultRenderOptions): ResolvedRenderOptions {
  return {
    width: clamp(options.maxWidth ?? DEFAULT_SECTION_WIDTH, MIN_SECTION_WIDTH, MAX_SECTION_WIDTH),
    maxColumnWidth: Math.max(MIN_COLUMN_WIDTH, options.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH),
    maxDataRows: Math.max(1, options.maxDataRows ?? DEFAULT_MAX_DATA_ROWS),
    useColor: options.useColor ?? shouldUseColor(),
    sectionStyle: options.sectionStyle ?? DEFAULT_SECTION_STYLE,
    useUnicodeBorders: options.useUnicodeBorders ?? shouldUseUnicodeBorders(),
  };
}

function renderIssues(issues: QualityIssue[], width: number): string[] {
  if (!issues.length) return ["(none)"];
  return issues.flatMap((issue) => wrapText(issue.message, width, `[${issue.severity}] `));
}

function renderDiagnostics(diagnostics: StepOutcome[], width: number): string[] {
  if (!diagnostics.length) return ["(none)"];
  return diagnostics.flatMap((outcome) =>
    outcome.status === "applied"
      ? wrapText(outcome.detail, width, `applied ${outcome.step}: `)
      : wrapText(outcome.reason, width, `skipped ${outcome.step}: `),
  );
}

function renderDataTable(table: DataTable, options: ResolvedRenderOptions): string[] {
  if (!table.columns.length) return ["(empty)"];
  const rows = table.rows
    .slice(0, options.maxDataRows)
    .map((row) => table.columns.map((column) => formatValue(row[column] ?? null)));
  const lines = renderTable(table.columns, rows, options);
  if (table.rows.length > options.maxDataRows) {
    lines.push(`... ${table.rows.length - options.maxDataRows} more rows`);
  }
  return lines;
}

function renderSection(title: string, lines: string[], options: ResolvedRenderOptions): string {
  if (options.sectionStyle === "panel") {
    return renderPanelSection(title, lines, options);
  }

  const border = colorize("=".repeat(options.width), "dim", options.useColor);
  const label = colorize(`[${title}]`, "cyan", options.useColor);
  const body = lines.length ? lines.join("\n") : "(none)";
  return [border, label, body].join("\n");
}

function renderPanelSection(title: string, lines: string[], options: ResolvedRenderOptions): string {
  const { width, useColor } = options;
  const borderChars = options.useUnicodeBorders
    ? { h: "─", v: "│", tl: "┌", tr: "┐", bl: "└", br: "┘" }
    : { h: "-", v: "|", tl: "+", tr: "+", bl: "+", br: "+" };

  const top = colorize(`${borderChars.tl}${borderChars.h.repeat(width + 2)}${borderChars.tr}`, "dim", useColor);
  const bottom = colorize(`${borderChars.bl}${borderChars.h.repeat(width + 2)}${borderChars.br}`, "dim", useColor);
  const heading = renderPanelRow(`[${title}]`, width, useColor, "cyan", borderChars.v);
  const bodyRows = (lines.length ? lines : ["(none)"]).map((line) => renderPanelRow(line, width, useColor, "dim", borderChars.v));

  return [top, heading, ...bodyRows, bottom].join("\n");
}

function renderPanelRow(
  line: string,
  width: number,
  useColor: boolean,
  tone: "cyan" | "dim",
  verticalBorder: string,
): string {
  const padded = truncate(line, width, "...").padEnd(width, " ");
  const border = colorize(verticalBorder, "dim", useColor);
  return `${border} ${colorize(padded, tone, useColor)} ${border}`;
}

function renderKeyValue(key: string, value: string, width: number): string[] {
  return wrapText(value || "(none)", width, `${key}: `);
}

function renderTable(headers: string[], rows: string[][], options: { width: number; maxColumnWidth: number }): string[] {
  if (!headers.length) return ["(empty)"];

  const formattedRows = rows.map((row) => row.map((cell) => oneLine(cell)));
  const alignRight = headers.map((_, colIndex) =>
    formattedRows.length > 0 && formattedRows.every((row) => isNumericValue(row[colIndex] ?? "")),
  );

  const widths = headers.map((header, colIndex) => {
    const maxDataWidth = formattedRows.reduce((acc, row) => Math.max(acc, (row[colIndex] ?? "").length), 0);
    return Math.min(Math.max(header.length, maxDataWidth, MIN_COLUMN_WIDTH), options.maxColumnWidth);
  });

  fitWidthsToTarget(widths, options.width);

  const renderRow = (cells: string[]): string =>
    `| ${cells.map((cell, colIndex) => formatCell(cell, widths[colIndex] ?? MIN_COLUMN_WIDTH, alignRight[colIndex] ?? false)).join(" | ")} |`;

  const divider = `| ${widths.map((colWidth) => "-".repeat(colWidth)).join(" | ")} |`;
  return [renderRow(headers), divider, ...formattedRows.map((row) => renderRow(row))];
}

function fitWidthsToTarget(widths: number[], targetLineWidth: number): void {
  let currentWidth = totalTableLineWidth(widths);
  while (currentWidth > targetLineWidth) {
    let reduced = false;
    for (let i = 0; i < widths.length; i += 1) {
      const colWidth = widths[i] ?? MIN_COLUMN_WIDTH;
      if (colWidth > MIN_COLUMN_WIDTH) {
        widths[i] = colWidth - 1;
        reduced = true;
        currentWidth = totalTableLineWidth(widths);
        if (currentWidth <= targetLineWidth) return;
      }
    }
    if (!reduced) return;
  }
}

function totalTableLineWidth(widths: number[]): number {
  if (!widths.length) return 0;
  return widths.reduce((acc, width) => acc + width, 0) + (widths.length * 3) + 1;
}

function formatCell(value: string, width: number, rightAlign: boolean): string {
  const normalized = truncate(oneLine(value), width, "...");
  if (normalized.length >= width) return normalized;
  const padding = " ".repeat(width - normalized.length);
  return rightAlign ? `${padding}${normalized}` : `${normalized}${padding}`;
}

function formatValue(value: CellValue): string {
  if (value === null) return "NULL";
  return String(value);
}

function wrapText(text: string, width: number, prefix: string = ""): string[] {
  const normalized = oneLine(text);
  if (!normalized) return [prefix ? `${prefix}(none)` : "(none)"];

  const availableWidth = Math.max(20, width - prefix.length);
  const lines: string[] = [];
  let current = "";

  for (const word of normalized.split(" ")) {
    const token = current ? `${current} ${word}` : word;
    if (token.length <= availableWidth) {
      current = token;
      continue;
    }

    if (current) {
      lines.push(current);
      current = "";
    }

    if (word.length <= availableWidth) {
      current = word;
      continue;
    }

    const slices = chunkWord(word, availableWidth);
    lines.push(...slices.slice(0, -1));
    current = slices[slices.length - 1] ?? "";
  }

  if (current) lines.push(current);

  return lines.map((line, index) => (index === 0 ? `${prefix}${line}` : `${" ".repeat(prefix.length)}${line}`));
}

function chunkWord(word: string, chunkSize: number): string[] {
  const parts: string[] = [];
  for (let i = 0; i < word.length; i += chunkSize) {
    parts.push(word.slice(i, i + chunkSize));
  }
  return parts;
}

function oneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function truncate(text: string, maxLength: number, suffix: string): string {
  if (text.length <= maxLength) return text;
  const safeLength = Math.max(0, maxLength - suffix.length);
  return `${text.slice(0, safeLength)}${suffix}`;
}

function isNumericValue(value: string): boolean {
  return /^-?(?:\d+|\d*\.\d+)(?:e[+-]?\d+)?$/i.test(value.trim());
}

function clamp(value: number, minValue: number, maxValue: number): number {
  return Math.min(maxValue, Math.max(minValue, value));
}

function shouldUseColor(): boolean {
  if (!process.stdout.isTTY) return false;
  if ("NO_COLOR" in process.env) return false;
  return true;
}

function shouldUseUnicodeBorders(): boolean {
  if (!process.stdout.isTTY) return false;
  return (process.env.TERM ?? "").toLowerCase() !== "dumb";
}

function colorize(text: string, tone: "cyan" | "dim", useColor: boolean): string {
  if (!useColor) return text;
  if (tone === "cyan") return `${ANSI.bold}${ANSI.cyan}${text}${ANSI.reset}`;
  return `${ANSI.dim}${text}${ANSI.reset}`;
}
