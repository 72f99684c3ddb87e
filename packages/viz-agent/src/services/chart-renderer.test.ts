import assert from "node:assert/strict";
import test from "node:test";
import type { DataTable, Logger, VisualizationSpec } from "@vizpilot/shared";
import { VegaLiteChartRenderer, buildVegaLiteSpec, resolveAxes } from "./chart-renderer.js";

const silentLogger: Logger = { info: () => undefined, warn: () => undefined, error: () => undefined };

const sales: DataTable = {
  columns: ["region", "sum_revenue", "segment"],
  rows: [
    { region: "north", sum_revenue: 300, segment: "retail" },
    { region: "south", sum_revenue: 40, segment: "online" },
  ],
};

function viz(overrides: Partial<VisualizationSpec> = {}): VisualizationSpec {
  return { chartType: "bar", xAxis: "region", yAxis: "sum_revenue", title: "Revenue", ...overrides };
}

test("resolveAxes fills blank or unknown axes from the table", () => {
  assert.deepEqual(resolveAxes(sales, viz({ xAxis: "", yAxis: "" })), { x: "region", y: "sum_revenue" });
  assert.deepEqual(resolveAxes(sales, viz({ xAxis: "segment", yAxis: "profit" })), { x: "segment", y: "sum_revenue" });
  assert.deepEqual(
    resolveAxes({ columns: ["a", "b"], rows: [{ a: "x", b: "y" }] }, viz({ xAxis: "", yAxis: "" })),
    { x: "a", y: "b" },
  );
});

test("buildVegaLiteSpec encodes a bar chart", () => {
  const spec = buildVegaLiteSpec(sales, viz({ colorColumn: "segment" }));
  assert.equal(spec.title, "Revenue");
  assert.deepEqual(spec.mark, { type: "bar", tooltip: true });
  assert.deepEqual(spec.encoding, {
    x: { field: "region", type: "nominal", title: "region" },
    y: { field: "sum_revenue", type: "quantitative", title: "sum_revenue" },
    color: { field: "segment", type: "nominal", title: "segment" },
  });
  assert.deepEqual(spec.data.values, sales.rows);
});

test("buildVegaLiteSpec encodes pie charts as arcs", () => {
  const spec = buildVegaLiteSpec(sales, viz({ chartType: "pie" }));
  assert.deepEqual(spec.mark, { type: "arc", tooltip: true });
  assert.deepEqual(spec.encoding, {
    theta: { field: "sum_revenue", type: "quantitative", title: "sum_revenue" },
    color: { field: "region", type: "nominal", title: "region" },
  });
});

test("buildVegaLiteSpec bins histograms and escapes dotted field names", () => {
  const table: DataTable = { columns: ["score.raw"], rows: [{ "score.raw": 1 }, { "score.raw": 4 }] };
  const spec = buildVegaLiteSpec(table, viz({ chartType: "histogram", xAxis: "score.raw", yAxis: "" }));
  assert.deepEqual(spec.encoding.x, { field: "score\\.raw", type: "quantitative", bin: true, title: "score.raw" });
  assert.deepEqual(spec.encoding.y, { aggregate: "count", type: "quantitative", title: "count" });
});

test("render embeds the Vega-Lite definition with vega-embed", () => {
  const renderer = new VegaLiteChartRenderer({ logger: silentLogger, createId: () => "abc123" });
  const markup = renderer.render(sales, viz({ title: "</script><b>x</b>" }));

  const lines = markup.split("\n");
  assert.equal(lines[0], '<script src="https://cdn.jsdelivr.net/npm/vega@5"></script>');
  assert.equal(lines[3], '<div id="vizpilot-chart-abc123" class="vizpilot-chart" style="width: 100%"></div>');
  assert.ok(lines[4]?.startsWith('<script>vegaEmbed("#vizpilot-chart-abc123", {'));
  assert.ok(lines[4]?.includes('"title":"\\u003c/script>\\u003cb>x\\u003c/b>"'));
  assert.equal(markup.includes("</script><b>"), false);
});

test("render returns an error fragment for an empty table", () => {
  const errors: string[] = [];
  const renderer = new VegaLiteChartRenderer({ logger: { ...silentLogger, error: (message) => errors.push(message) } });

  assert.equal(
    renderer.render({ columns: ["region"], rows: [] }, viz()),
    '<div class="vizpilot-chart-error">Error creating visualization: the transformed table is empty</div>',
  );
  assert.deepEqual(errors, ["Chart rendering failed: the transformed table is empty"]);
});
