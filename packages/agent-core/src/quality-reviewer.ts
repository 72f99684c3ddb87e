import type { ChartType, DataSummary, IssueSeverity, QualityIssue, QualityReview, VisualizationSpec } from "@vizpilot/shared";

const MAX_PIE_CATEGORIES = 7;
const MAX_BAR_CATEGORIES = 15;
const SCATTER_COLOR_ROW_THRESHOLD = 50;
const STARTING_SCORE = 10;

const SEVERITY_PENALTY: Record<IssueSeverity, number> = {
  error: 2,
  warning: 1,
  suggestion: 0.5,
};

interface KeywordRule {
  keyword: string;
  accepts: ChartType[];
  advice: string;
}

const KEYWORD_RULES: KeywordRule[] = [
  { keyword: "time", accepts: ["line", "area"], advice: "a line chart or area chart" },
  { keyword: "trend", accepts: ["line"], advice: "a line chart" },
  { keyword: "distribution", accepts: ["histogram", "density"], advice: "a histogram or density plot" },
  { keyword: "correlation", accepts: ["scatter"], advice: "a scatter plot" },
];

export function reviewVisualization(
  requirementsText: string,
  visualization: VisualizationSpec,
  summary: DataSummary,
): QualityReview {
  const issues = [
    ...checkCategoryCounts(visualization, summary),
    ...checkScatterColor(visualization, summary),
    ...checkRequirementKeywords(requirementsText, visualization),
  ];

  return { issues, qualityScore: calculateQualityScore(issues) };
}

export function calculateQualityScore(issues: QualityIssue[]): number {
  const score = issues.reduce((acc, issue) => acc - SEVERITY_PENALTY[issue.severity], STARTING_SCORE);
  return Math.max(0, score);
}

function checkCategoryCounts(visualization: VisualizationSpec, summary: DataSummary): QualityIssue[] {
  const uniqueCount = summary.categoricalStats[visualization.xAxis]?.uniqueCount;
  if (uniqueCount === undefined) return [];

  if (visualization.chartType === "pie" && uniqueCount > MAX_PIE_CATEGORIES) {
    return [
      {
        severity: "warning",
        message: `Pie chart has ${uniqueCount} categories, which may be too many for effective visualization. Consider using a bar chart instead.`,
      },
    ];
  }

  if (visualization.chartType === "bar" && uniqueCount > MAX_BAR_CATEGORIES) {
    return [
      {
        severity: "warning",
        message: `Bar chart has ${uniqueCount} categories, which may be difficult to read. Consider filtering to show only top categories.`,
      },
    ];
  }

  return [];
}

function checkScatterColor(visualization: VisualizationSpec, summary: DataSummary): QualityIssue[] {
  if (visualization.chartType !== "scatter") return [];
  if (summary.rowCount <= SCATTER_COLOR_ROW_THRESHOLD || visualization.colorColumn) return [];

  return [
    {
      severity: "suggestion",
      message: "For scatter plots with many data points, using color to encode an additional variable can reveal patterns.",
    },
  ];
}

function checkRequirementKeywords(requirementsText: string, visualization: VisualizationSpec): QualityIssue[] {
  const lowered = requirementsText.toLowerCase();
  return KEYWORD_RULES.filter((rule) => lowered.includes(rule.keyword) && !rule.accepts.includes(visualization.chartType)).map(
    (rule): QualityIssue => ({
      severity: "suggestion",
      message: `Requirements mention '${rule.keyword}' which often works best with ${rule.advice}.`,
    }),
  );
}
