import { writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { Command } from "commander";
import dotenv from "dotenv";
import { runInteractiveSession } from "@vizpilot/tui";
import {
  VizPilotError,
  isPipelineError,
  renderFilePreview,
  renderPipelineResult,
  type MappingEntry,
} from "@vizpilot/shared";
import { PipelineOrchestrator, RESULT_NOT_FOUND } from "../services/pipeline-orchestrator.js";
import { launchWebServer, type WebServerSession } from "./web-server.js";

dotenv.config({ path: join(process.cwd(), ".env") });

export type CliOrchestrator = Pick<
  PipelineOrchestrator,
  | "processFile"
  | "processRequest"
  | "getStoredResult"
  | "getDownloadableArtifact"
  | "addMapping"
  | "recordFeedback"
  | "listMappings"
  | "knownColumns"
>;

export interface CommandIo {
  writeLine: (line: string) => void;
}

export interface JsonFlag {
  json: boolean;
}

export interface ProcessCommandOptions extends JsonFlag {
  requirements: string;
}

export interface DownloadCommandOptions {
  out?: string;
}

export interface ServeCommandOptions {
  port: string;
  host: string;
}

type WebLauncher = (input: { port: number; host: string }) => Promise<WebServerSession>;

export interface CreateProgramOptions {
  orchestrator?: PipelineOrchestrator;
  io?: CommandIo;
}

export function createProgram(cwd: string = process.cwd(), options: CreateProgramOptions = {}): Command {
  const program = new Command();
  let orchestrator = options.orchestrator;
  const io = options.io ?? createDefaultIo();
  // Built on first use so `--help` never touches the project directory.
  const service = (): PipelineOrchestrator => {
    orchestrator ??= PipelineOrchestrator.create(cwd);
    return orchestrator;
  };

  program
    .name("vizpilot")
    .description("Turn tabular files and plain-language requests into reviewed charts")
    .option("--file <path>", "Active dataset file for the interactive session");

  program
    .command("inspect <file>")
    .description("Resolve business labels for a file's columns and show sample rows")
    .option("--json", "Emit the preview as JSON", false)
    .action(async (file: string, opts: JsonFlag) => {
      await runInspectCommand(service(), resolve(cwd, file), opts, io);
    });

  program
    .command("process <file>")
    .description("Build, review and store a visualization for a file")
    .requiredOption("-r, --requirements <text>", "What the chart should show")
    .option("--json", "Emit the result as JSON", false)
    .action(async (file: string, opts: ProcessCommandOptions) => {
      await runProcessCommand(service(), resolve(cwd, file), opts, io);
    });

  program
    .command("result <id>")
    .description("Show a stored visualization")
    .option("--json", "Emit the full stored record as JSON", false)
    .action(async (id: string, opts: JsonFlag) => {
      await runResultCommand(service(), id, opts, io);
    });

  program
    .command("download <id>")
    .description("Write a stored visualization as a standalone HTML document")
    .option("--out <path>", "Output path (defaults to visualization_<id>.html)")
    .action(async (id: string, opts: DownloadCommandOptions) => {
      await runDownloadCommand(service(), cwd, id, opts, io);
    });

  const mappingCommand = program.command("mapping").description("Schema mapping knowledge commands");

  mappingCommand
    .command("show <technicalName>")
    .description("List business label candidates for a column name")
    .action((technicalName: string) => {
      runMappingShowCommand(service(), technicalName, io);
    });

  mappingCommand
    .command("list")
    .description("List every column name with learned labels")
    .action(() => {
      runMappingListCommand(service(), io);
    });

  mappingCommand
    .command("add <technicalName> <businessLabel>")
    .description("Teach a business label for a column name")
    .option("--confidence <number>", "Initial confidence between 0 and 1", "0.8")
    .action(async (technicalName: string, businessLabel: string, opts: { confidence: string }) => {
      await service().addMapping(technicalName, businessLabel, parseConfidence(opts.confidence));
      io.writeLine(`Learned ${technicalName} -> ${businessLabel}`);
    });

  mappingCommand
    .command("feedback <technicalName> <businessLabel>")
    .description("Confirm a label, or reject it with --negative")
    .option("--negative", "Record negative feedback", false)
    .action(async (technicalName: string, businessLabel: string, opts: { negative: boolean }) => {
      await service().recordFeedback(technicalName, businessLabel, !opts.negative);
      io.writeLine(`Recorded ${opts.negative ? "negative" : "positive"} feedback for ${technicalName} -> ${businessLabel}`);
    });

  program
    .command("serve")
    .description("Launch the local web app")
    .option("--port <port>", "Web app port", "4173")
    .option("--host <host>", "Web app host", "127.0.0.1")
    .action(async (opts: ServeCommandOptions) => {
      await runServeCommand(opts, io, ({ port, host }) => launchWebServer({ orchestrator: service(), cwd, port, host }));
    });

  program.action(async () => {
    const opts = program.opts<{ file?: string }>();
    const pipeline = service();

    await runInteractiveSession(
      {
        onInspect: (filePath) => pipeline.processFile(resolve(cwd, filePath)),
        onProcess: (requirements, { filePath }) => pipeline.processRequest(resolve(cwd, filePath), requirements),
        onResult: (id) => pipeline.getResult(id),
        onDownload: (id, outPath) => writeDownload(pipeline, cwd, id, outPath),
      },
      { initialFilePath: opts.file },
    );
  });

  return program;
}

export async function runInspectCommand(
  orchestrator: Pick<CliOrchestrator, "processFile">,
  filePath: string,
  opts: JsonFlag,
  io: CommandIo,
): Promise<void> {
  const preview = await orchestrator.processFile(filePath);
  io.writeLine(opts.json ? JSON.stringify(preview, null, 2) : renderFilePreview(preview));
}

export async function runProcessCommand(
  orchestrator: Pick<CliOrchestrator, "processRequest">,
  filePath: string,
  opts: ProcessCommandOptions,
  io: CommandIo,
): Promise<void> {
  const requirements = opts.requirements.trim();
  if (!requirements) {
    throw new VizPilotError("process requires --requirements <text>.", "INVALID_ARGUMENT");
  }

  const result = await orchestrator.processRequest(filePath, requirements);
  if (isPipelineError(result)) {
    throw new VizPilotError(result.error, "PIPELINE_FAILED");
  }
  io.writeLine(opts.json ? JSON.stringify(result, null, 2) : renderPipelineResult(result));
}

export async function runResultCommand(
  orchestrator: Pick<CliOrchestrator, "getStoredResult">,
  id: string,
  opts: JsonFlag,
  io: CommandIo,
): Promise<void> {
  const result = await orchestrator.getStoredResult(id);
  if (!result) {
    throw new VizPilotError(`${RESULT_NOT_FOUND}: ${id}`, "RESULT_NOT_FOUND");
  }
  io.writeLine(opts.json ? JSON.stringify(result, null, 2) : renderPipelineResult(result));
}

export async function runDownloadCommand(
  orchestrator: Pick<CliOrchestrator, "getStoredResult" | "getDownloadableArtifact">,
  cwd: string,
  id: string,
  opts: DownloadCommandOptions,
  io: CommandIo,
): Promise<void> {
  const written = await writeDownload(orchestrator, cwd, id, opts.out);
  io.writeLine(`Saved ${written}`);
}

export function runMappingShowCommand(
  orchestrator: Pick<CliOrchestrator, "listMappings">,
  technicalName: string,
  io: CommandIo,
): void {
  const candidates = orchestrator.listMappings(technicalName);
  io.writeLine(technicalName);
  for (const candidate of candidates) {
    io.writeLine(`  ${formatCandidate(candidate)}`);
  }
}

export function runMappingListCommand(
  orchestrator: Pick<CliOrchestrator, "knownColumns" | "listMappings">,
  io: CommandIo,
): void {
  const names = orchestrator.knownColumns();
  if (!names.length) {
    io.writeLine("No mappings learned yet.");
    return;
  }
  for (const name of names) {
    const labels = orchestrator.listMappings(name).map((candidate) => formatCandidate(candidate));
    io.writeLine(`${name}: ${labels.join("; ")}`);
  }
}

export async function runServeCommand(opts: ServeCommandOptions, io: CommandIo, launcher: WebLauncher): Promise<void> {
  const port = parsePort(opts.port ?? "4173");
  const host = (opts.host ?? "127.0.0.1").trim() || "127.0.0.1";
  const session = await launcher({ port, host });

  io.writeLine(`VizPilot web app running at ${session.url}`);
  io.writeLine("Press Ctrl+C to stop the server.");
}

async function writeDownload(
  orchestrator: Pick<CliOrchestrator, "getStoredResult" | "getDownloadableArtifact">,
  cwd: string,
  id: string,
  outPath?: string,
): Promise<string> {
  const stored = await orchestrator.getStoredResult(id);
  if (!stored) {
    throw new VizPilotError(`${RESULT_NOT_FOUND}: ${id}`, "RESULT_NOT_FOUND");
  }
  const target = resolve(cwd, outPath?.trim() || `visualization_${stored.id}.html`);
  writeFileSync(target, await orchestrator.getDownloadableArtifact(stored.id), "utf-8");
  return target;
}

export function formatCandidate(candidate: MappingEntry): string {
  return `${candidate.businessLabel} (confidence ${candidate.confidence.toFixed(2)}, seen ${candidate.observationCount}x)`;
}

export function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (!value.trim() || Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new VizPilotError(`Invalid --confidence value '${value}'. Expected a number between 0 and 1.`, "INVALID_ARGUMENT");
  }
  return parsed;
}

function parsePort(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 65535) {
    throw new VizPilotError(`Invalid --port value '${value}'. Expected an integer between 0 and 65535.`, "INVALID_ARGUMENT");
  }
  return parsed;
}

function createDefaultIo(): CommandIo {
  return {
    writeLine: (line: string) => {
      console.log(line);
    },
  };
}
