import fs from "fs";
import path from "path";
import type { StepOutcome } from "./types";

export type AuditSink = (outcome: StepOutcome) => void;

export function createAuditLog(auditPath: string): AuditSink {
  return (outcome) => {
    const dir = path.dirname(auditPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const line = JSON.stringify({
      ...outcome,
      ts: new Date().toISOString()
    });
    fs.appendFileSync(auditPath, line + "\n", "utf-8");
  };
}
