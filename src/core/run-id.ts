import { randomBytes } from "node:crypto";

/**
 * Generate a run ID.
 * Format: {station}-{YYYYMMDD}-{HHMMSS}-{hex6}
 */
export function generateRunId(stationId: string, now: Date = new Date()): string {
  const safeStation = stationId.replace(/[^a-zA-Z0-9_-]/g, "-").slice(0, 30);
  const iso = now.toISOString();
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `${safeStation}-${date}-${time}-${randomBytes(3).toString("hex")}`;
}
