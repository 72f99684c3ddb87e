import { KeyedLock, errorMessage, getProjectPaths, type Logger, type MappingEntry } from "@vizpilot/shared";
import { atomicWriteJson, readJsonFile } from "../utils/fs-utils.js";

export const DEFAULT_MERGE_CONFIDENCE = 0.8;
export const FALLBACK_CONFIDENCE = 0.5;

const MERGE_BOOST = 0.05;
const FEEDBACK_STEP = 0.1;
const FEEDBACK_MIN = 0.1;
const FEEDBACK_MAX = 1;
const POSITIVE_SEED = 0.6;
const NEGATIVE_SEED = 0.4;

interface MappingFile {
  schemaVersion: 1;
  mappings: Record<string, MappingEntry[]>;
}

/** `cust_id` -> `Cust Id`; the label used for any column the store has not learned. */
export function humanizeColumnName(technicalName: string): string {
  return technicalName
    .split(/[_\-.\s]+/)
    .filter(Boolean)
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`)
    .join(" ");
}

/**
 * Learned technical-name to business-label associations, shared by every
 * request in the process and persisted as one JSON file.
 */
export class MappingStore {
  private readonly records = new Map<string, MappingEntry[]>();
  private readonly locks = new KeyedLock();
  private readonly fileLock = new KeyedLock();

  constructor(
    private readonly path: string,
    private readonly logger: Logger = console,
  ) {
    this.load();
  }

  static forProject(cwd: string, logger: Logger = console): MappingStore {
    return new MappingStore(getProjectPaths(cwd).mappingStorePath, logger);
  }

  lookup(technicalName: string): string {
    const entries = this.records.get(technicalName);
    if (!entries?.length) return humanizeColumnName(technicalName);

    let best = entries[0];
    for (const entry of entries.slice(1)) {
      if (!best || ranksAbove(entry, best)) best = entry;
    }
    return best?.businessLabel ?? humanizeColumnName(technicalName);
  }

  candidates(technicalName: string): MappingEntry[] {
    const entries = this.records.get(technicalName);
    if (!entries?.length) {
      return [{ businessLabel: humanizeColumnName(technicalName), confidence: FALLBACK_CONFIDENCE, observationCount: 0 }];
    }
    return entries.map((entry) => ({ ...entry }));
  }

  technicalNames(): string[] {
    return [...this.records.keys()].sort();
  }

  async merge(technicalName: string, businessLabel: string, confidence: number = DEFAULT_MERGE_CONFIDENCE): Promise<void> {
    await this.locks.run(technicalName, async () => {
      const entries = this.records.get(technicalName);
      const seed = clamp(confidence, 0, 1);
      if (!entries) {
        this.records.set(technicalName, [{ businessLabel, confidence: seed, observationCount: 1 }]);
      } else {
        const match = findLabel(entries, businessLabel);
        if (match) {
          match.observationCount += 1;
          match.confidence = round(Math.min(1, match.confidence + MERGE_BOOST));
        } else {
          entries.push({ businessLabel, confidence: seed, observationCount: 1 });
        }
      }
      await this.persist();
    });
  }

  async feedback(technicalName: string, businessLabel: string, positive: boolean): Promise<void> {
    await this.locks.run(technicalName, async () => {
      const entries = this.records.get(technicalName);
      if (!entries) {
        this.records.set(technicalName, [
          { businessLabel, confidence: positive ? POSITIVE_SEED : NEGATIVE_SEED, observationCount: 1 },
        ]);
        await this.persist();
        return;
      }

      const match = findLabel(entries, businessLabel);
      if (match) {
        const delta = positive ? FEEDBACK_STEP : -FEEDBACK_STEP;
        match.confidence = round(clamp(match.confidence + delta, FEEDBACK_MIN, FEEDBACK_MAX));
        match.observationCount += 1;
      } else if (positive) {
        entries.push({ businessLabel, confidence: POSITIVE_SEED, observationCount: 1 });
      }
      await this.persist();
    });
  }

  private async persist(): Promise<void> {
    await this.fileLock.run(this.path, async () => {
      const payload: MappingFile = {
        schemaVersion: 1,
        mappings: Object.fromEntries(
          [...this.records].map(([technicalName, entries]) => [technicalName, entries.map((entry) => ({ ...entry }))]),
        ),
      };
      try {
        atomicWriteJson(this.path, payload);
      } catch (error) {
        this.logger.error(`Failed to persist mapping store at ${this.path}: ${errorMessage(error)}`);
      }
    });
  }

  private load(): void {
    let raw: unknown;
    try {
      raw = readJsonFile(this.path);
    } catch (error) {
      this.logger.warn(`Mapping store at ${this.path} is unreadable, starting empty: ${errorMessage(error)}`);
      return;
    }
    if (raw === undefined) return;

    if (!isRecord(raw) || raw.schemaVersion !== 1 || !isRecord(raw.mappings)) {
      this.logger.warn(`Mapping store at ${this.path} has an unexpected shape, starting empty.`);
      return;
    }

    for (const [technicalName, value] of Object.entries(raw.mappings)) {
      if (!Array.isArray(value)) continue;
      const entries: MappingEntry[] = [];
      for (const item of value) {
        const entry = readEntry(item);
        if (!entry) continue;
        const duplicate = findLabel(entries, entry.businessLabel);
        if (duplicate) {
          duplicate.observationCount += entry.observationCount;
          duplicate.confidence = Math.max(duplicate.confidence, entry.confidence);
        } else {
          entries.push(entry);
        }
      }
      if (entries.length) this.records.set(technicalName, entries);
    }
  }
}

function readEntry(raw: unknown): MappingEntry | null {
  if (!isRecord(raw)) return null;
  const { businessLabel, confidence, observationCount } = raw;
  if (typeof businessLabel !== "string" || !businessLabel.trim()) return null;
  if (typeof confidence !== "number" || !Number.isFinite(confidence)) return null;
  if (typeof observationCount !== "number" || !Number.isInteger(observationCount) || observationCount < 0) return null;
  return { businessLabel, confidence: clamp(confidence, 0, 1), observationCount };
}

function findLabel(entries: MappingEntry[], businessLabel: string): MappingEntry | undefined {
  const lowered = businessLabel.toLowerCase();
  return entries.find((entry) => entry.businessLabel.toLowerCase() === lowered);
}

function ranksAbove(candidate: MappingEntry, current: MappingEntry): boolean {
  if (candidate.confidence !== current.confidence) return candidate.confidence > current.confidence;
  return candidate.observationCount > current.observationCount;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// Keeps repeated +0.05 / ±0.1 steps from drifting (0.8 + 0.05 !== 0.85).
function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
