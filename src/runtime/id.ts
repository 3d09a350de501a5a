import type { Environment } from "../config.ts";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local-time stamp used in run log file names: YYYYMMDD_HHMMSS
 * Example: "20260219_143005"
 */
export function formatFileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Generate a run ID: deploy-{environment}-{YYYYMMDD}-{6-char-hex}, dated in local time
 * Example: "deploy-local-20260219-a1b2c3"
 */
export function generateRunId(environment: Environment, date = new Date()): string {
  const dateStr = formatFileTimestamp(date).slice(0, 8);
  const bytes = crypto.getRandomValues(new Uint8Array(3));
  const hex = Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join(
    "",
  );
  return `deploy-${environment}-${dateStr}-${hex}`;
}

export function runLogFileName(date: Date): string {
  return `deployment_${formatFileTimestamp(date)}.log`;
}
