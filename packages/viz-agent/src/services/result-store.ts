import { KeyedLock, errorMessage, getResultPath, type Logger, type PipelineResult } from "@vizpilot/shared";
import { atomicWriteJson, readJsonFile } from "../utils/fs-utils.js";

/**
 * Two-tier store for finished pipeline results: a process-local map backed by
 * one mirrored JSON file per result id.
 */
export class ResultStore {
  private readonly results = new Map<string, PipelineResult>();
  private readonly locks = new KeyedLock();

  constructor(
    private readonly cwd: string,
    private readonly logger: Logger = console,
  ) {}

  /** The in-memory copy always lands; a failed mirror write is logged only. */
  async save(result: PipelineResult): Promise<void> {
    this.results.set(result.id, result);

    const path = getResultPath(result.id, this.cwd);
    if (!path) {
      this.logger.warn(`Result id ${result.id} is not a plain token; kept in memory only.`);
      return;
    }

    await this.locks.run(result.id, async () => {
      try {
        atomicWriteJson(path, result);
      } catch (error) {
        this.logger.error(`Failed to mirror result ${result.id} to ${path}: ${errorMessage(error)}`);
      }
    });
  }

  async get(id: string): Promise<PipelineResult | null> {
    const cached = this.results.get(id);
    if (cached) return cached;

    const path = getResultPath(id, this.cwd);
    if (!path) return null;

    return this.locks.run(id, async () => {
      const raced = this.results.get(id);
      if (raced) return raced;

      let raw: unknown;
      try {
        raw = readJsonFile(path);
      } catch (error) {
        this.logger.warn(`Stored result ${id} is unreadable: ${errorMessage(error)}`);
        return null;
      }
      if (raw === undefined) return null;
      if (!isPipelineResult(raw) || raw.id !== id) {
        this.logger.warn(`Stored result ${id} has an unexpected shape.`);
        return null;
      }

      this.results.set(id, raw);
      return raw;
    });
  }

  isCached(id: string): boolean {
    return this.results.has(id);
  }
}

export function isPipelineResult(value: unknown): value is PipelineResult {
  if (!isObject(value)) return false;
  const record = value;
  const table = record.rawTransformedData;
  return (
    typeof record.id === "string" &&
    typeof record.renderedChart === "string" &&
    typeof record.explanationText === "string" &&
    Array.isArray(record.issues) &&
    typeof record.qualityScore === "number" &&
    typeof record.requirementsText === "string" &&
    isObject(record.schemaMapping) &&
    isObject(record.visualization) &&
    isObject(record.summary) &&
    Array.isArray(record.diagnostics) &&
    typeof record.sourceFile === "string" &&
    typeof record.createdAt === "string" &&
    isObject(table) &&
    Array.isArray(table.columns) &&
    Array.isArray(table.rows)
  );
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
