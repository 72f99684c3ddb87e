import { randomUUID } from "node:crypto";
import { OpenRouterClient, type ChatClient } from "@vizpilot/ai";
import { InstructionInterpreter, applyInstructions, reviewVisualization } from "@vizpilot/agent-core";
import {
  ensureProjectDirectories,
  errorMessage,
  type DataSummary,
  type FilePreview,
  type Instructions,
  type Logger,
  type MappingEntry,
  type PipelineErrorPayload,
  type PipelineResult,
  type PipelineResultView,
  type PipelineStage,
  type SampleData,
  type SchemaMapping,
  type VisualizationSpec,
} from "@vizpilot/shared";
import { renderArtifactDocument, renderErrorDocument } from "./artifact-document.js";
import { AuditService, type AuditLog } from "./audit-service.js";
import { VegaLiteChartRenderer, type ChartRenderer } from "./chart-renderer.js";
import { MappingStore } from "./mapping-store.js";
import { ResultStore } from "./result-store.js";
import { SchemaResolver } from "./schema-resolver.js";
import { FileTableReader, type TableReader } from "./table-reader.js";

export const RESULT_NOT_FOUND = "Visualization not found";

export interface RequirementInterpreter {
  interpretRequirements: (requirementsText: string, schemaMapping: SchemaMapping, sampleData: SampleData) => Promise<Instructions>;
  explain: (summary: DataSummary, visualization: VisualizationSpec) => Promise<string>;
}

export interface PipelineDependencies {
  reader: TableReader;
  resolver: SchemaResolver;
  interpreter: RequirementInterpreter;
  renderer: ChartRenderer;
  results: ResultStore;
  audit?: AuditLog;
  logger?: Logger;
  createId?: () => string;
  now?: () => Date;
}

export interface CreateOrchestratorOptions {
  client?: ChatClient;
  logger?: Logger;
}

/**
 * Runs one request through read -> resolve -> interpret -> transform ->
 * render -> review -> store, and serves stored results back.
 */
export class PipelineOrchestrator {
  private readonly reader: TableReader;
  private readonly resolver: SchemaResolver;
  private readonly interpreter: RequirementInterpreter;
  private readonly renderer: ChartRenderer;
  private readonly results: ResultStore;
  private readonly audit?: AuditLog;
  private readonly logger: Logger;
  private readonly createId: () => string;
  private readonly now: () => Date;

  constructor(deps: PipelineDependencies) {
    this.reader = deps.reader;
    this.resolver = deps.resolver;
    this.interpreter = deps.interpreter;
    this.renderer = deps.renderer;
    this.results = deps.results;
    this.audit = deps.audit;
    this.logger = deps.logger ?? console;
    this.createId = deps.createId ?? (() => randomUUID());
    this.now = deps.now ?? (() => new Date());
  }

  /** Wires the default collaborators for a project directory. */
  static create(cwd: string, options: CreateOrchestratorOptions = {}): PipelineOrchestrator {
    ensureProjectDirectories(cwd);
    const logger = options.logger ?? console;
    const interpreter = new InstructionInterpreter(options.client ?? new OpenRouterClient(), logger);
    return new PipelineOrchestrator({
      reader: new FileTableReader(logger),
      resolver: new SchemaResolver(MappingStore.forProject(cwd, logger), interpreter, logger),
      interpreter,
      renderer: new VegaLiteChartRenderer({ logger }),
      results: new ResultStore(cwd, logger),
      audit: new AuditService(cwd),
      logger,
    });
  }

  async processFile(filePath: string): Promise<FilePreview> {
    const table = await this.reader.read(filePath);
    const schemaMapping = await this.resolver.resolveSchema(table.columns);
    return {
      filePath,
      schemaMapping,
      sampleData: this.resolver.sampleRows(table),
    };
  }

  async processRequest(filePath: string, requirementsText: string): Promise<PipelineResultView | PipelineErrorPayload> {
    const startedAt = Date.now();
    let stage: PipelineStage = "received";

    try {
      const table = await this.reader.read(filePath);
      const schemaMapping = await this.resolver.resolveSchema(table.columns);
      const sampleData = this.resolver.sampleRows(table);
      stage = "schema_resolved";

      const instructions = await this.interpreter.interpretRequirements(requirementsText, schemaMapping, sampleData);
      const applied = applyInstructions(table, instructions, this.logger);
      stage = "data_transformed";

      const renderedChart = this.renderer.render(applied.table, instructions.visualization);
      stage = "rendered";

      const review = reviewVisualization(requirementsText, instructions.visualization, applied.summary);
      const explanationText = await this.interpreter.explain(applied.summary, instructions.visualization);
      stage = "reviewed";

      const result: PipelineResult = {
        id: this.createId(),
        renderedChart,
        explanationText,
        issues: review.issues,
        qualityScore: review.qualityScore,
        rawTransformedData: applied.table,
        requirementsText,
        schemaMapping,
        visualization: instructions.visualization,
        summary: applied.summary,
        diagnostics: applied.diagnostics,
        sourceFile: filePath,
        createdAt: this.now().toISOString(),
      };
      await this.results.save(result);
      stage = "stored";

      await this.recordAudit({ filePath, requirementsText, stage, success: true, resultId: result.id, startedAt });
      return toView(result);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Pipeline failed after stage '${stage}': ${message}`);
      await this.recordAudit({ filePath, requirementsText, stage: "failed", success: false, error: message, startedAt });
      return { error: message };
    }
  }

  async getResult(id: string): Promise<PipelineResultView | PipelineErrorPayload> {
    const result = await this.getStoredResult(id);
    return result ? toView(result) : { error: RESULT_NOT_FOUND };
  }

  /** Full stored record, including the transformed table and diagnostics. */
  async getStoredResult(id: string): Promise<PipelineResult | null> {
    try {
      return await this.results.get(id);
    } catch (error) {
      this.logger.error(`Failed to load result ${id}: ${errorMessage(error)}`);
      return null;
    }
  }

  async getDownloadableArtifact(id: string): Promise<string> {
    const result = await this.getStoredResult(id);
    if (!result) return renderErrorDocument(RESULT_NOT_FOUND);
    return renderArtifactDocument(result, this.now());
  }

  async addMapping(technicalName: string, businessLabel: string, confidence?: number): Promise<void> {
    await this.resolver.learnMapping(technicalName, businessLabel, confidence);
  }

  async recordFeedback(technicalName: string, businessLabel: string, positive: boolean): Promise<void> {
    await this.resolver.recordFeedback(technicalName, businessLabel, positive);
  }

  listMappings(technicalName: string): MappingEntry[] {
    return this.resolver.listMappings(technicalName);
  }

  knownColumns(): string[] {
    return this.resolver.knownColumns();
  }

  private async recordAudit(input: {
    filePath: string;
    requirementsText: string;
    stage: PipelineStage;
    success: boolean;
    startedAt: number;
    resultId?: string;
    error?: string;
  }): Promise<void> {
    if (!this.audit) return;
    try {
      await this.audit.append({
        timestamp: this.now().toISOString(),
        sourceFile: input.filePath,
        requirementsText: input.requirementsText,
        stage: input.stage,
        success: input.success,
        resultId: input.resultId,
        durationMs: Date.now() - input.startedAt,
        error: input.error,
      });
    } catch (error) {
      this.logger.warn(`Failed to append audit entry: ${errorMessage(error)}`);
    }
  }
}

function toView(result: PipelineResult): PipelineResultView {
  return {
    id: result.id,
    renderedChart: result.renderedChart,
    explanationText: result.explanationText,
    issues: result.issues,
    qualityScore: result.qualityScore,
  };
}
