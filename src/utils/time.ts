export function nowUtcIsoSeconds(): string {
  const iso = new Date().toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoFileSafe(): string {
  return nowUtcIsoSeconds().replace(/:/g, "-");
}

const MS_PER_DAY = 86_400_000;

/**
 * Formats a millisecond span as `H:MM:SS`, adding `.ffffff` for a sub-second
 * part and an `N day(s), ` prefix past 24 hours. Negative spans read as zero.
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  const days = Math.floor(total / MS_PER_DAY);
  let rest = total % MS_PER_DAY;
  const hours = Math.floor(rest / 3_600_000);
  rest %= 3_600_000;
  const minutes = Math.floor(rest / 60_000);
  rest %= 60_000;
  const seconds = Math.floor(rest / 1000);
  const millis = rest % 1000;

  let clock = `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
  if (millis > 0) {
    clock += `.${String(millis * 1000).padStart(6, "0")}`;
  }
  if (days > 0) {
    return `${days} ${days === 1 ? "day" : "days"}, ${clock}`;
  }
  return clock;
}
