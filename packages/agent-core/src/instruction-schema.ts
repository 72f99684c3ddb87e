import type {
  AggregationMethod,
  AggregationSpec,
  ChartType,
  FilterOperator,
  FilterSpec,
  FilterValue,
  Instructions,
  VisualizationSpec,
} from "@vizpilot/shared";

export const DEFAULT_CHART_TITLE = "Data Visualization";

export interface ParsedInstructions {
  instructions: Instructions;
  rejected: string[];
}

const OPERATOR_ALIASES = new Map<string, FilterOperator>([
  ["eq", "eq"],
  ["==", "eq"],
  ["=", "eq"],
  ["equals", "eq"],
  ["ne", "ne"],
  ["!=", "ne"],
  ["<>", "ne"],
  ["not_equals", "ne"],
  ["gt", "gt"],
  [">", "gt"],
  ["ge", "ge"],
  ["gte", "ge"],
  [">=", "ge"],
  ["lt", "lt"],
  ["<", "lt"],
  ["le", "le"],
  ["lte", "le"],
  ["<=", "le"],
  ["in", "isIn"],
  ["isin", "isIn"],
  ["is_in", "isIn"],
  ["contains", "contains"],
  ["like", "contains"],
]);

const METHOD_ALIASES = new Map<string, AggregationMethod>([
  ["sum", "sum"],
  ["total", "sum"],
  ["mean", "mean"],
  ["avg", "mean"],
  ["average", "mean"],
  ["median", "median"],
  ["min", "min"],
  ["minimum", "min"],
  ["max", "max"],
  ["maximum", "max"],
  ["std", "std"],
  ["stdev", "std"],
  ["count", "count"],
  ["size", "count"],
]);

const CHART_ALIASES = new Map<string, ChartType>([
  ["bar", "bar"],
  ["column", "bar"],
  ["line", "line"],
  ["scatter", "scatter"],
  ["point", "scatter"],
  ["pie", "pie"],
  ["donut", "pie"],
  ["area", "area"],
  ["histogram", "histogram"],
  ["hist", "histogram"],
  ["density", "density"],
]);

export function defaultInstructions(): Instructions {
  return {
    filters: [],
    groupByColumns: [],
    aggregation: { method: "sum" },
    visualization: defaultVisualization(),
  };
}

export function defaultVisualization(chartType: ChartType = "bar"): VisualizationSpec {
  return { chartType, xAxis: "", yAxis: "", title: DEFAULT_CHART_TITLE };
}

/**
 * Validates an interpreter payload into tagged instructions. Accepts the
 * camelCase contract and the snake_case / symbolic-operator shapes language
 * models tend to emit. Unusable filters are dropped and listed in `rejected`.
 */
export function parseInstructions(raw: unknown): ParsedInstructions {
  if (!isRecord(raw)) {
    return { instructions: defaultInstructions(), rejected: ["payload is not an object"] };
  }

  const rejected: string[] = [];
  const filters: FilterSpec[] = [];
  const rawFilters = raw.filters;
  if (Array.isArray(rawFilters)) {
    rawFilters.forEach((item, index) => {
      const parsed = parseFilter(item);
      if (typeof parsed === "string") {
        rejected.push(`filter[${index}]: ${parsed}`);
      } else {
        filters.push(parsed);
      }
    });
  } else if (rawFilters !== undefined && rawFilters !== null) {
    rejected.push("filters is not a list");
  }

  return {
    instructions: {
      filters,
      groupByColumns: readStringList(raw.groupByColumns ?? raw.groupby ?? raw.group_by),
      aggregation: parseAggregation(raw.aggregation),
      visualization: parseVisualization(raw.visualization),
    },
    rejected,
  };
}

function parseFilter(raw: unknown): FilterSpec | string {
  if (!isRecord(raw)) return "not an object";

  const column = readString(raw.column);
  if (!column) return "missing column";

  const operatorRaw = readString(raw.operator ?? raw.operation ?? raw.op);
  if (!operatorRaw) return "missing operator";
  const operator = OPERATOR_ALIASES.get(operatorRaw.toLowerCase());
  if (!operator) return `unknown operator '${operatorRaw}'`;

  const value = toFilterValue(raw.value);
  if (value === undefined) return "value is not a scalar or list";

  return { column, operator, value };
}

function parseAggregation(raw: unknown): AggregationSpec {
  if (!isRecord(raw)) return { method: "sum" };

  const methodRaw = readString(raw.method)?.toLowerCase();
  const method = (methodRaw ? METHOD_ALIASES.get(methodRaw) : undefined) ?? "sum";
  const targetColumn = readString(raw.targetColumn ?? raw.column ?? raw.target_column);

  return targetColumn ? { method, targetColumn } : { method };
}

function parseVisualization(raw: unknown): VisualizationSpec {
  if (!isRecord(raw)) return defaultVisualization();

  const typeRaw = readString(raw.chartType ?? raw.type ?? raw.chart_type)?.toLowerCase();
  const chartType = (typeRaw ? CHART_ALIASES.get(typeRaw) : undefined) ?? "bar";
  const colorColumn = readString(raw.colorColumn ?? raw.color ?? raw.color_column);

  const spec: VisualizationSpec = {
    chartType,
    xAxis: readString(raw.xAxis ?? raw.x_axis ?? raw.x) ?? "",
    yAxis: readString(raw.yAxis ?? raw.y_axis ?? raw.y) ?? "",
    title: readString(raw.title) ?? DEFAULT_CHART_TITLE,
  };
  if (colorColumn) spec.colorColumn = colorColumn;
  return spec;
}

function toFilterValue(raw: unknown): FilterValue | undefined {
  if (raw === undefined || raw === null) return null;
  if (typeof raw === "string" || typeof raw === "boolean") return raw;
  if (typeof raw === "number") return Number.isFinite(raw) ? raw : undefined;
  if (Array.isArray(raw)) {
    const items: FilterValue[] = [];
    for (const item of raw) {
      const value = toFilterValue(item);
      if (value === undefined) return undefined;
      items.push(value);
    }
    return items;
  }
  return undefined;
}

function readStringList(raw: unknown): string[] {
  if (typeof raw === "string") {
    const single = readString(raw);
    return single ? [single] : [];
  }
  if (!Array.isArray(raw)) return [];
  return raw
    .map((item) => readString(item))
    .filter((item): item is string => Boolean(item));
}

function readString(raw: unknown): string | undefined {
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
