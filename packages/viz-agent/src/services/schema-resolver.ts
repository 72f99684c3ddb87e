import type { DataTable, Logger, MappingEntry, SampleData, SchemaMapping } from "@vizpilot/shared";
import { humanizeColumnName, type MappingStore } from "./mapping-store.js";

export const DEFAULT_SAMPLE_SIZE = 5;

export interface ColumnMapper {
  mapColumns: (columns: string[]) => Promise<SchemaMapping>;
}

/** Resolves column labels from the store and asks the interpreter only about unknown columns. */
export class SchemaResolver {
  constructor(
    private readonly store: MappingStore,
    private readonly mapper: ColumnMapper,
    private readonly logger: Logger = console,
  ) {}

  async resolveSchema(columns: string[]): Promise<SchemaMapping> {
    const labels = new Map(columns.map((column) => [column, this.store.lookup(column)]));
    // A label equal to the humanized fallback carries no business knowledge yet.
    const unresolved = columns.filter((column) => labels.get(column) === humanizeColumnName(column));

    if (unresolved.length) {
      const suggested = await this.mapper.mapColumns(unresolved);
      const learned: string[] = [];
      for (const column of unresolved) {
        const label = Object.hasOwn(suggested, column) ? suggested[column] : undefined;
        if (typeof label !== "string" || !label.trim()) continue;
        labels.set(column, label);
        await this.store.merge(column, label);
        learned.push(column);
      }

      if (learned.length) {
        this.logger.info(`Learned labels for ${learned.length} of ${unresolved.length} unresolved column(s): ${learned.join(", ")}`);
      }
    }

    return Object.fromEntries(labels);
  }

  sampleRows(table: DataTable, n: number = DEFAULT_SAMPLE_SIZE): SampleData {
    const rows = table.rows.slice(0, Math.max(0, n));
    return Object.fromEntries(table.columns.map((column) => [column, rows.map((row) => row[column] ?? null)]));
  }

  async learnMapping(technicalName: string, businessLabel: string, confidence?: number): Promise<void> {
    await this.store.merge(technicalName, businessLabel, confidence);
  }

  async recordFeedback(technicalName: string, businessLabel: string, positive: boolean): Promise<void> {
    await this.store.feedback(technicalName, businessLabel, positive);
  }

  listMappings(technicalName: string): MappingEntry[] {
    return this.store.candidates(technicalName);
  }

  knownColumns(): string[] {
    return this.store.technicalNames();
  }
}
