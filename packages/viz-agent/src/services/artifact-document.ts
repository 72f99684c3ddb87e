import type { PipelineResult } from "@vizpilot/shared";
import { escapeHtml } from "../utils/html.js";

const DOCUMENT_STYLE = `
    body { margin: 0; font-family: "IBM Plex Sans", "Avenir Next", sans-serif; color: #1f2432; background: #f4eee1; }
    .shell { width: min(1100px, 94vw); margin: 24px auto; display: grid; gap: 16px; }
    .panel { border: 1px solid #d8c8a9; border-radius: 16px; background: #fffaf0; padding: 18px 22px; }
    h1 { margin: 0; font-size: clamp(24px, 4vw, 40px); }
    .muted { color: #6f6658; font-size: 13px; }
    .issue-warning, .issue-error { color: #cf4f2f; }`;

export function renderArtifactDocument(result: PipelineResult, generatedAt: Date): string {
  const title = escapeHtml(result.visualization.title);
  const paragraphs = result.explanationText
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter(Boolean)
    .map((paragraph) => `      <p>${escapeHtml(paragraph)}</p>`);
  const issues = result.issues.map(
    (issue) => `        <li class="issue-${issue.severity}">[${issue.severity}] ${escapeHtml(issue.message)}</li>`,
  );

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${title}</title>
  <style>${DOCUMENT_STYLE}
  </style>
</head>
<body>
  <main class="shell">
    <header class="panel">
      <h1>${title}</h1>
      <p class="muted">Requirements: ${escapeHtml(result.requirementsText)}</p>
    </header>
    <section class="panel">
${result.renderedChart}
    </section>
    <section class="panel">
      <h2>Explanation</h2>
${paragraphs.join("\n")}
    </section>
    <section class="panel">
      <h2>Quality review</h2>
      <p>Quality score: ${result.qualityScore} / 10</p>
      <ul>
${issues.join("\n")}
      </ul>
    </section>
    <footer class="muted">Generated ${generatedAt.toISOString()}</footer>
  </main>
</body>
</html>
`;
}

export function renderErrorDocument(message: string): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>Visualization unavailable</title>
</head>
<body>
  <h1>Visualization unavailable</h1>
  <p>${escapeHtml(message)}</p>
</body>
</html>
`;
}
