export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoFileSafe(): string {
  return nowUtcIsoSeconds().replace(/:/g, "-");
}

export function todayIsoDate(now = new Date()): string {
  return now.toISOString().slice(0, 10);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** strftime-style formatting (UTC) for the tokens used in bucket patterns. */
export function formatUtcPattern(pattern: string, now = new Date()): string {
  const tokens: Record<string, string> = {
    Y: pad(now.getUTCFullYear(), 4),
    m: pad(now.getUTCMonth() + 1),
    d: pad(now.getUTCDate()),
    H: pad(now.getUTCHours()),
    M: pad(now.getUTCMinutes()),
    S: pad(now.getUTCSeconds()),
    "%": "%"
  };
  return pattern.replace(/%(.)/g, (match, token: string) => tokens[token] ?? match);
}

export async function sleep(ms: number): Promise<void> {
  if (ms <= 0) return;
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}
