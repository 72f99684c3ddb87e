import { getProjectPaths, type PipelineAudit } from "@vizpilot/shared";
import { appendText } from "../utils/fs-utils.js";

export interface AuditLog {
  append: (entry: PipelineAudit) => Promise<void>;
}

/** One JSON line per pipeline run in `.vizpilot/logs/audit.jsonl`. */
export class AuditService implements AuditLog {
  constructor(private readonly cwd: string) {}

  async append(entry: PipelineAudit): Promise<void> {
    const path = getProjectPaths(this.cwd).auditLogPath;
    appendText(path, `${JSON.stringify(entry)}\n`);
  }
}
