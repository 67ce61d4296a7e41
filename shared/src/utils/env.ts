export function getEnvBoolean(key: string, defaultValue = false): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === null || raw === "") {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;

  return defaultValue;
}

export function getEnvNumber(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return defaultValue;
  }
  const parsed = Number(raw.trim());
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function getEnvString(key: string, defaultValue = ""): string {
  const raw = process.env[key];
  if (raw === undefined) return defaultValue;
  const trimmed = raw.trim();
  return trimmed === "" ? defaultValue : trimmed;
}

/**
 * Comma-separated list, trimmed, empties dropped.
 */
export function getEnvList(key: string, defaultValue: string[]): string[] {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const items = raw
    .split(",")
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length ? items : defaultValue;
}
