import type { ChatClient } from "@vizpilot/ai";
import {
  VizPilotError,
  errorMessage,
  type ChartType,
  type DataSummary,
  type Instructions,
  type Logger,
  type SampleData,
  type SchemaMapping,
  type VisualizationSpec,
} from "@vizpilot/shared";
import { defaultInstructions, defaultVisualization, parseInstructions } from "./instruction-schema.js";

const SCHEMA_MAPPING_PROMPT = `
You are VizPilot Schema Mapper.
You convert technical database column names to business-friendly names.
Return only valid JSON mapping each technical name to its business name:
{ "technical_name": "Business Name" }
Rules:
- Include only the column names you were given.
- Never include markdown fences.
`;

const INSTRUCTION_PROMPT = `
You are VizPilot Data Processing Planner.
Translate the user's requirements into data operations and a chart.
Return only valid JSON with the shape:
{
  "filters": [{ "column": "string", "operator": "eq" | "ne" | "gt" | "ge" | "lt" | "le" | "isIn" | "contains", "value": "any" }],
  "groupByColumns": ["string"],
  "aggregation": { "method": "sum" | "mean" | "median" | "min" | "max" | "std" | "count", "targetColumn": "string" },
  "visualization": {
    "chartType": "bar" | "line" | "scatter" | "pie" | "area" | "histogram" | "density",
    "xAxis": "string",
    "yAxis": "string",
    "colorColumn": "string (optional)",
    "title": "string"
  }
}
Rules:
- Use technical column names exactly as given.
- Aggregated columns are named "<method>_<targetColumn>"; a count produces "count".
- Never include markdown fences.
`;

const EXPLANATION_PROMPT = `
You are VizPilot Quality Reviewer.
Explain concisely what the chart shows, patterns worth noticing, and how it addresses the request.
Keep it clear and non-technical. Plain text only, at most five sentences.
`;

interface KeywordChart {
  keywords: string[];
  chartType: ChartType;
}

const OFFLINE_CHART_KEYWORDS: KeywordChart[] = [
  { keywords: ["correlation", "relationship", "versus", " vs "], chartType: "scatter" },
  { keywords: ["distribution", "histogram", "spread"], chartType: "histogram" },
  { keywords: ["trend", "over time", "timeline", "time series"], chartType: "line" },
  { keywords: ["share", "proportion", "percentage", "breakdown"], chartType: "pie" },
];

/**
 * Turns free text into structured instructions through the chat client.
 * Every call degrades to a documented default instead of raising.
 */
export class InstructionInterpreter {
  constructor(
    private readonly client: ChatClient,
    private readonly logger: Logger = console,
  ) {}

  async mapColumns(columns: string[]): Promise<SchemaMapping> {
    if (!columns.length || !this.client.isConfigured()) return {};

    try {
      const response = await this.client.chatJson([
        { role: "system", content: SCHEMA_MAPPING_PROMPT },
        { role: "user", content: JSON.stringify({ columns }, null, 2) },
      ]);
      return sanitizeColumnMapping(response, columns);
    } catch (error) {
      this.logger.warn(`Schema mapping fell back to defaults: ${describeError(error)}`);
      return {};
    }
  }

  async interpretRequirements(
    requirementsText: string,
    schemaMapping: SchemaMapping,
    sampleData: SampleData,
  ): Promise<Instructions> {
    if (!this.client.isConfigured()) {
      return heuristicInstructions(requirementsText);
    }

    try {
      const response = await this.client.chatJson([
        { role: "system", content: INSTRUCTION_PROMPT },
        {
          role: "user",
          content: JSON.stringify({ requirements: requirementsText, schemaMapping, sampleData }, null, 2),
        },
      ]);
      const parsed = parseInstructions(response);
      for (const rejection of parsed.rejected) {
        this.logger.warn(`Ignoring malformed instruction: ${rejection}`);
      }
      return parsed.instructions;
    } catch (error) {
      this.logger.warn(`Requirement interpretation fell back to defaults: ${describeError(error)}`);
      return defaultInstructions();
    }
  }

  async explain(summary: DataSummary, visualization: VisualizationSpec): Promise<string> {
    if (!this.client.isConfigured()) {
      return describeVisualization(summary, visualization);
    }

    try {
      const text = await this.client.chat(
        [
          { role: "system", content: EXPLANATION_PROMPT },
          { role: "user", content: JSON.stringify({ visualization, summary }, null, 2) },
        ],
        0.7,
      );
      return text.trim() || describeVisualization(summary, visualization);
    } catch (error) {
      this.logger.warn(`Explanation fell back to template: ${describeError(error)}`);
      return describeVisualization(summary, visualization);
    }
  }
}

export function sanitizeColumnMapping(raw: unknown, columns: string[]): SchemaMapping {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return {};

  const requested = new Set(columns);
  const entries: Array<[string, string]> = [];
  for (const [column, label] of Object.entries(raw)) {
    if (!requested.has(column) || typeof label !== "string") continue;
    const normalized = label.replace(/\s+/g, " ").trim();
    if (normalized) entries.push([column, normalized]);
  }
  return Object.fromEntries(entries);
}

export function heuristicInstructions(requirementsText: string): Instructions {
  const lowered = ` ${requirementsText.toLowerCase()} `;
  const match = OFFLINE_CHART_KEYWORDS.find((rule) => rule.keywords.some((keyword) => lowered.includes(keyword)));
  return {
    ...defaultInstructions(),
    visualization: defaultVisualization(match?.chartType ?? "bar"),
  };
}

export function describeVisualization(summary: DataSummary, visualization: VisualizationSpec): string {
  const { chartType, xAxis, yAxis } = visualization;
  const axes = xAxis && yAxis ? ` of ${yAxis} by ${xAxis}` : xAxis ? ` of ${xAxis}` : "";
  const rowLabel = summary.rowCount === 1 ? "row" : "rows";
  const parts = [`This ${chartType} chart${axes} summarises ${summary.rowCount} ${rowLabel} across ${summary.columnCount} columns.`];

  const yStats = summary.numericStats[yAxis];
  if (yStats && yStats.min !== null && yStats.max !== null && yStats.mean !== null) {
    parts.push(`${yAxis} ranges from ${formatNumber(yStats.min)} to ${formatNumber(yStats.max)} with a mean of ${formatNumber(yStats.mean)}.`);
  }

  const top = summary.categoricalStats[xAxis]?.topValues[0];
  if (top) {
    parts.push(`The most frequent ${xAxis} value is ${top.value} (${top.count} ${top.count === 1 ? "row" : "rows"}).`);
  }

  return parts.join(" ");
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function describeError(error: unknown): string {
  if (error instanceof VizPilotError) return `${error.code}: ${error.message}`;
  return errorMessage(error);
}
