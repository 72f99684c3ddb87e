import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import boxen from "boxen";
import ora from "ora";
import stringWidth from "string-width";
import {
  errorMessage,
  isPipelineError,
  renderFilePreview,
  renderPipelineResult,
  type FilePreview,
  type PipelineErrorPayload,
  type PipelineResultView,
  type ResultRenderOptions,
} from "@vizpilot/shared";
import { buildTheme, qualityTone, resolveThemeContext, type CompatibilityMode, type Theme, type Tone } from "./theme.js";

export interface InteractiveSessionHandlers {
  onInspect: (filePath: string) => Promise<FilePreview>;
  onProcess: (requirements: string, options: { filePath: string }) => Promise<PipelineResultView | PipelineErrorPayload>;
  onResult: (id: string) => Promise<PipelineResultView | PipelineErrorPayload>;
  /** Resolves to the path the document was written to. */
  onDownload: (id: string, outPath?: string) => Promise<string>;
}

export interface InteractiveSessionOptions {
  compatibility?: CompatibilityMode;
  initialFilePath?: string;
}

export interface PromptRenderState {
  filePath: string;
  lastResultId: string;
}

export type SessionCommand =
  | { kind: "exit" }
  | { kind: "help" }
  | { kind: "file"; filePath: string }
  | { kind: "result"; id: string }
  | { kind: "download"; id: string; outPath?: string }
  | { kind: "process"; requirements: string }
  | { kind: "invalid"; message: string };

export function parseSessionCommand(raw: string): SessionCommand | null {
  const line = raw.trim();
  if (!line) return null;
  if (!line.startsWith("/")) return { kind: "process", requirements: line };

  const [command = "", ...args] = line.split(/\s+/);
  const rest = line.slice(command.length).trim();

  switch (command) {
    case "/exit":
    case "/quit":
      return { kind: "exit" };
    case "/help":
      return { kind: "help" };
    case "/file":
      return rest ? { kind: "file", filePath: rest } : { kind: "invalid", message: "Usage: /file <path>" };
    case "/result":
      return args[0] ? { kind: "result", id: args[0] } : { kind: "invalid", message: "Usage: /result <id>" };
    case "/download":
      if (!args[0]) return { kind: "invalid", message: "Usage: /download <id> [path]" };
      return args[1] ? { kind: "download", id: args[0], outPath: args.slice(1).join(" ") } : { kind: "download", id: args[0] };
    default:
      return { kind: "invalid", message: `Unknown command ${command}. Type /help for commands.` };
  }
}

export function renderPrompt(state: PromptRenderState, theme: Theme): string {
  const head = theme.style.accent("vizpilot");
  const resultText = `result:${state.lastResultId ? state.lastResultId.slice(0, 8) : "none"}`;
  const staticVisibleWidth = stringWidth("vizpilot") + stringWidth(`[${resultText}]`) + 6;
  const availableFileWidth = Math.max(16, theme.context.width - staticVisibleWidth);
  const fileText = `file:${truncateDisplay(state.filePath || "none", availableFileWidth)}`;

  return [
    head,
    renderBadge(fileText, state.filePath ? "accent" : "muted", theme),
    renderBadge(resultText, state.lastResultId ? "success" : "muted", theme),
    `${theme.style.muted(theme.symbols.prompt)} `,
  ].join(" ");
}

export function createInteractiveBanner(theme: Theme): string {
  const lines = [
    `${theme.style.accent("VizPilot")}${theme.style.muted(" interactive session")}`,
    `${theme.symbols.bullet} /file <path> to choose the active dataset file`,
    `${theme.symbols.bullet} type what you want to see to build a chart`,
    `${theme.symbols.bullet} /result <id> and /download <id> [path] for stored charts`,
    `${theme.symbols.bullet} /help for commands, /exit to quit`,
  ];

  return boxen(lines.join("\n"), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: theme.context.useUnicode ? "round" : "classic",
    borderColor: theme.context.useColor ? "cyan" : undefined,
  });
}

export function formatSystemMessage(
  tone: "info" | "success" | "warn" | "error",
  message: string,
  theme: Theme,
): string {
  const icon =
    tone === "success"
      ? theme.symbols.success
      : tone === "warn"
        ? theme.symbols.warn
        : tone === "error"
          ? theme.symbols.error
          : theme.symbols.info;

  const text = `${icon} ${message}`;
  if (tone === "success") return theme.style.success(text);
  if (tone === "warn") return theme.style.warn(text);
  if (tone === "error") return theme.style.error(text);
  return theme.style.muted(text);
}

export async function runInteractiveSession(
  handlers: InteractiveSessionHandlers,
  options: InteractiveSessionOptions = {},
): Promise<void> {
  const rl = readline.createInterface({ input, output });
  let filePath = options.initialFilePath ?? "";
  let lastResultId = "";

  const theme = buildTheme(
    resolveThemeContext({
      compatibility: options.compatibility ?? "auto",
      isTTY: Boolean(input.isTTY && output.isTTY),
      columns: output.columns,
      env: process.env,
    }),
  );

  output.write(`${createInteractiveBanner(theme)}\n\n`);

  while (true) {
    const command = parseSessionCommand(await rl.question(renderPrompt({ filePath, lastResultId }, theme)));
    if (!command) continue;
    if (command.kind === "exit") break;

    switch (command.kind) {
      case "help":
        output.write(`${renderHelp(theme)}\n`);
        break;
      case "invalid":
        output.write(`${formatSystemMessage("warn", command.message, theme)}\n`);
        break;
      case "file":
        try {
          const preview = await handlers.onInspect(command.filePath);
          filePath = command.filePath;
          output.write(`${formatSystemMessage("success", `Active file set to: ${filePath}`, theme)}\n`);
          output.write(`${renderFilePreview(preview, renderOptions(theme))}\n\n`);
        } catch (error) {
          output.write(`${formatSystemMessage("error", `Error: ${errorMessage(error)}`, theme)}\n`);
        }
        break;
      case "result": {
        const result = await handlers.onResult(command.id);
        if (isPipelineError(result)) {
          output.write(`${formatSystemMessage("error", result.error, theme)}\n`);
        } else {
          renderResult(result, theme);
        }
        break;
      }
      case "download":
        try {
          const written = await handlers.onDownload(command.id, command.outPath);
          output.write(`${formatSystemMessage("success", `Saved ${written}`, theme)}\n`);
        } catch (error) {
          output.write(`${formatSystemMessage("error", `Error: ${errorMessage(error)}`, theme)}\n`);
        }
        break;
      case "process": {
        if (!filePath) {
          output.write(
            `${formatSystemMessage("error", "No active file. Use /file <path> before describing a chart.", theme)}\n`,
          );
          break;
        }

        const spinner = ora({
          text: "Building visualization...",
          spinner: theme.context.useUnicode ? "dots" : "line",
          isEnabled: Boolean(output.isTTY),
        }).start();

        const result = await handlers.onProcess(command.requirements, { filePath });
        if (isPipelineError(result)) {
          spinner.fail("Visualization failed.");
          output.write(`${formatSystemMessage("error", `Error: ${result.error}`, theme)}\n`);
        } else {
          spinner.succeed(`Visualization ready ${formatQualityBadge(result.qualityScore, theme)}`);
          lastResultId = result.id;
          renderResult(result, theme);
        }
        break;
      }
    }
  }

  rl.close();
}

function renderHelp(theme: Theme): string {
  const lines = [
    theme.style.accent("Commands:"),
    `  /help                  ${theme.style.muted("Show this help")}`,
    `  /file <path>           ${theme.style.muted("Set the active dataset file and preview its schema")}`,
    `  /result <id>           ${theme.style.muted("Show a stored visualization")}`,
    `  /download <id> [path]  ${theme.style.muted("Save a visualization as standalone HTML")}`,
    `  /exit                  ${theme.style.muted("Exit interactive mode")}`,
    `  <text>                 ${theme.style.muted("Describe the chart to build from the active file")}`,
  ];

  return boxen(lines.join("\n"), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: theme.context.useUnicode ? "round" : "classic",
    borderColor: theme.context.useColor ? "yellow" : undefined,
  });
}

function renderOptions(theme: Theme): ResultRenderOptions {
  return {
    maxWidth: output.columns ?? theme.context.width,
    useColor: theme.context.useColor,
    sectionStyle: "panel",
    useUnicodeBorders: theme.context.useUnicode,
  };
}

function renderResult(result: PipelineResultView, theme: Theme): void {
  output.write("\n");
  output.write(`${renderPipelineResult(result, renderOptions(theme))}\n\n`);
}

function renderBadge(text: string, tone: Tone, theme: Theme): string {
  return theme.style[tone](`[${text}]`);
}

export function formatQualityBadge(score: number, theme: Theme): string {
  return renderBadge(`quality ${score.toFixed(1)}/10`, qualityTone(score), theme);
}

function truncateDisplay(value: string, maxWidth: number): string {
  if (stringWidth(value) <= maxWidth) return value;
  const ellipsis = "...";
  const allowed = Math.max(4, maxWidth - stringWidth(ellipsis));
  let out = "";

  for (const char of value) {
    const candidate = `${out}${char}`;
    if (stringWidth(candidate) > allowed) break;
    out = candidate;
  }

  return `${out}${ellipsis}`;
}
