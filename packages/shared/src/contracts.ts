export type CellValue = string | number | boolean | null;

export type DataRow = Record<string, CellValue>;

export interface DataTable {
  columns: string[];
  rows: DataRow[];
}

export type ColumnKind = "numeric" | "boolean" | "categorical";

export type SampleData = Record<string, CellValue[]>;

export type SchemaMapping = Record<string, string>;

export interface MappingEntry {
  businessLabel: string;
  confidence: number;
  observationCount: number;
}

export interface ColumnMappingRecord {
  technicalName: string;
  candidates: MappingEntry[];
}

export type FilterOperator = "eq" | "ne" | "gt" | "ge" | "lt" | "le" | "isIn" | "contains";

export type FilterValue = string | number | boolean | null | FilterValue[];

export interface FilterSpec {
  column: string;
  operator: FilterOperator;
  value: FilterValue;
}

export type AggregationMethod = "sum" | "mean" | "median" | "min" | "max" | "std" | "count";

export interface AggregationSpec {
  method: AggregationMethod;
  targetColumn?: string;
}

export type ChartType = "bar" | "line" | "scatter" | "pie" | "area" | "histogram" | "density";

export interface VisualizationSpec {
  chartType: ChartType;
  xAxis: string;
  yAxis: string;
  colorColumn?: string;
  title: string;
}

export interface Instructions {
  filters: FilterSpec[];
  groupByColumns: string[];
  aggregation: AggregationSpec;
  visualization: VisualizationSpec;
}

export interface NumericStats {
  min: number | null;
  max: number | null;
  mean: number | null;
}

export interface ValueCount {
  value: string;
  count: number;
}

export interface CategoricalStats {
  uniqueCount: number;
  topValues: ValueCount[];
}

export interface DataSummary {
  rowCount: number;
  columnCount: number;
  columnNames: string[];
  numericStats: Record<string, NumericStats>;
  categoricalStats: Record<string, CategoricalStats>;
  visualization?: VisualizationSpec;
}

export type StepOutcome =
  | { status: "applied"; step: string; detail: string }
  | { status: "skipped"; step: string; reason: string };

export type IssueSeverity = "error" | "warning" | "suggestion";

export interface QualityIssue {
  severity: IssueSeverity;
  message: string;
}

export interface QualityReview {
  issues: QualityIssue[];
  qualityScore: number;
}

export interface PipelineResult {
  id: string;
  renderedChart: string;
  explanationText: string;
  issues: QualityIssue[];
  qualityScore: number;
  rawTransformedData: DataTable;
  requirementsText: string;
  schemaMapping: SchemaMapping;
  visualization: VisualizationSpec;
  summary: DataSummary;
  diagnostics: StepOutcome[];
  sourceFile: string;
  createdAt: string;
}

export type PipelineResultView = Pick<
  PipelineResult,
  "id" | "renderedChart" | "explanationText" | "issues" | "qualityScore"
>;

export interface PipelineErrorPayload {
  error: string;
}

export interface FilePreview {
  filePath: string;
  schemaMapping: SchemaMapping;
  sampleData: SampleData;
}

export type PipelineStage =
  | "received"
  | "schema_resolved"
  | "data_transformed"
  | "rendered"
  | "reviewed"
  | "stored"
  | "failed";

export interface PipelineAudit {
  timestamp: string;
  sourceFile: string;
  requirementsText: string;
  stage: PipelineStage;
  success: boolean;
  resultId?: string;
  durationMs: number;
  error?: string;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export function isPipelineError(value: object): value is PipelineErrorPayload {
  return "error" in value && typeof value.error === "string";
}
