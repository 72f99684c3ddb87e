import { randomUUID } from "node:crypto";
import { errorMessage, type DataTable, type Logger, type VisualizationSpec } from "@vizpilot/shared";
import { columnValues, inferColumnKind } from "@vizpilot/agent-core";
import { escapeHtml, toScriptJson } from "../utils/html.js";

export interface ChartRenderer {
  render: (table: DataTable, visualization: VisualizationSpec) => string;
}

export const VEGA_SCRIPTS = [
  "https://cdn.jsdelivr.net/npm/vega@5",
  "https://cdn.jsdelivr.net/npm/vega-lite@5",
  "https://cdn.jsdelivr.net/npm/vega-embed@6",
];

const VEGA_LITE_SCHEMA = "https://vega.github.io/schema/vega-lite/v5.json";

type FieldType = "quantitative" | "ordinal" | "nominal";

interface ChannelDef {
  field?: string;
  type: FieldType;
  title?: string;
  bin?: boolean;
  aggregate?: "count";
}

export interface VegaLiteSpec {
  $schema: string;
  title: string;
  width: "container";
  data: { values: DataTable["rows"] };
  mark: { type: string; tooltip: boolean; point?: boolean };
  encoding: Record<string, ChannelDef>;
  transform?: Array<Record<string, unknown>>;
}

export interface ResolvedAxes {
  x: string;
  y: string;
}

export interface VegaLiteRendererOptions {
  logger?: Logger;
  createId?: () => string;
}

/** Missing or unknown axes fall back to the first column and the first other numeric column. */
export function resolveAxes(table: DataTable, visualization: VisualizationSpec): ResolvedAxes {
  const x = table.columns.includes(visualization.xAxis) ? visualization.xAxis : (table.columns[0] ?? "");
  if (table.columns.includes(visualization.yAxis)) return { x, y: visualization.yAxis };

  const numeric = table.columns.find(
    (column) => column !== x && inferColumnKind(columnValues(table, column)) === "numeric",
  );
  return { x, y: numeric ?? table.columns[1] ?? x };
}

export function buildVegaLiteSpec(table: DataTable, visualization: VisualizationSpec): VegaLiteSpec {
  const { x, y } = resolveAxes(table, visualization);
  const fieldType = (column: string, fallback: FieldType): FieldType =>
    inferColumnKind(columnValues(table, column)) === "numeric" ? "quantitative" : fallback;

  const spec: VegaLiteSpec = {
    $schema: VEGA_LITE_SCHEMA,
    title: visualization.title,
    width: "container",
    data: { values: table.rows },
    mark: { type: "bar", tooltip: true },
    encoding: {},
  };

  switch (visualization.chartType) {
    case "bar":
      spec.encoding = {
        x: { field: vegaField(x), type: fieldType(x, "nominal"), title: x },
        y: { field: vegaField(y), type: "quantitative", title: y },
      };
      break;
    case "line":
    case "area":
      spec.mark = visualization.chartType === "line" ? { type: "line", tooltip: true, point: true } : { type: "area", tooltip: true };
      spec.encoding = {
        x: { field: vegaField(x), type: fieldType(x, "ordinal"), title: x },
        y: { field: vegaField(y), type: "quantitative", title: y },
      };
      break;
    case "scatter":
      spec.mark = { type: "point", tooltip: true };
      spec.encoding = {
        x: { field: vegaField(x), type: fieldType(x, "nominal"), title: x },
        y: { field: vegaField(y), type: fieldType(y, "nominal"), title: y },
      };
      break;
    case "pie":
      spec.mark = { type: "arc", tooltip: true };
      spec.encoding = {
        theta: { field: vegaField(y), type: "quantitative", title: y },
        color: { field: vegaField(x), type: "nominal", title: x },
      };
      break;
    case "histogram":
      spec.encoding = {
        x: { field: vegaField(x), type: "quantitative", bin: true, title: x },
        y: { aggregate: "count", type: "quantitative", title: "count" },
      };
      break;
    case "density":
      spec.mark = { type: "area", tooltip: true };
      spec.transform = [{ density: vegaField(x), as: ["value", "density"] }];
      spec.encoding = {
        x: { field: "value", type: "quantitative", title: x },
        y: { field: "density", type: "quantitative", title: "density" },
      };
      break;
  }

  const color = visualization.colorColumn;
  if (color && table.columns.includes(color) && visualization.chartType !== "pie") {
    spec.encoding.color = { field: vegaField(color), type: fieldType(color, "nominal"), title: color };
  }
  return spec;
}

/** Renders Vega-Lite markup that vega-embed mounts in the browser. */
export class VegaLiteChartRenderer implements ChartRenderer {
  private readonly logger: Logger;
  private readonly createId: () => string;

  constructor(options: VegaLiteRendererOptions = {}) {
    this.logger = options.logger ?? console;
    this.createId = options.createId ?? (() => randomUUID().slice(0, 8));
  }

  render(table: DataTable, visualization: VisualizationSpec): string {
    try {
      if (!table.columns.length || !table.rows.length) {
        throw new Error("the transformed table is empty");
      }
      const spec = buildVegaLiteSpec(table, visualization);
      const elementId = `vizpilot-chart-${this.createId()}`;
      return [
        ...VEGA_SCRIPTS.map((src) => `<script src="${src}"></script>`),
        `<div id="${elementId}" class="vizpilot-chart" style="width: 100%"></div>`,
        `<script>vegaEmbed("#${elementId}", ${toScriptJson(spec)}, { actions: false });</script>`,
      ].join("\n");
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Chart rendering failed: ${message}`);
      return renderChartError(message);
    }
  }
}

export function renderChartError(message: string): string {
  return `<div class="vizpilot-chart-error">Error creating visualization: ${escapeHtml(message)}</div>`;
}

// Vega-Lite reads dots and brackets in field names as nested access.
function vegaField(column: string): string {
  return column.replace(/[.[\]\\]/g, (char) => `\\${char}`);
}
