import fs from "node:fs/promises";
import path from "node:path";

export type SortOutcome = "moved" | "planned" | "skipped";

export type AuditEntry = {
  image: string;
  outcome: SortOutcome;
  folder: string | null;
  target: string | null;
  reply: string | null;
  createdFolder: string | null;
  error: string | null;
};

export async function appendAuditEntry(logPath: string, entry: AuditEntry) {
  await fs.mkdir(path.dirname(logPath), { recursive: true });
  await fs.appendFile(
    logPath,
    JSON.stringify({ ts: new Date().toISOString(), ...entry }) + "\n",
  );
}
