import { mkdirSync } from "node:fs";
import { join, resolve } from "node:path";

export interface ProjectPaths {
  projectRoot: string;
  stateRoot: string;
  mappingStorePath: string;
  resultsRoot: string;
  uploadsRoot: string;
  auditLogPath: string;
}

const RESULT_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function getProjectPaths(cwd: string = process.cwd()): ProjectPaths {
  const projectRoot = resolve(cwd);
  const stateRoot = join(projectRoot, ".vizpilot");
  const mappingStorePath = join(stateRoot, "mappings.json");
  const resultsRoot = join(stateRoot, "results");
  const uploadsRoot = join(stateRoot, "uploads");
  const auditLogPath = join(stateRoot, "logs", "audit.jsonl");

  return {
    projectRoot,
    stateRoot,
    mappingStorePath,
    resultsRoot,
    uploadsRoot,
    auditLogPath,
  };
}

export function ensureProjectDirectories(cwd: string = process.cwd()): ProjectPaths {
  const p = getProjectPaths(cwd);
  mkdirSync(p.stateRoot, { recursive: true });
  mkdirSync(p.resultsRoot, { recursive: true });
  mkdirSync(p.uploadsRoot, { recursive: true });
  mkdirSync(join(p.stateRoot, "logs"), { recursive: true });
  return p;
}

export function isValidResultId(id: string): boolean {
  return RESULT_ID_PATTERN.test(id);
}

/** Mirror file of one stored result; `null` when the id could escape the results directory. */
export function getResultPath(id: string, cwd: string = process.cwd()): string | null {
  if (!isValidResultId(id)) return null;
  return join(getProjectPaths(cwd).resultsRoot, `${id}.json`);
}
