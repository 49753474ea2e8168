import { randomBytes } from "node:crypto";

/**
 * Generate a compact, time-sortable event ID.
 * Format: base36(timestamp) + "-" + 8 hex chars of randomness.
 */
export function generateEventId(): string {
  const timePart = Date.now().toString(36);
  const randomPart = randomBytes(4).toString("hex");
  return `${timePart}-${randomPart}`;
}

/** UTC `YYYYMMDD_HHMMSS`, so ids and filenames sort chronologically. */
export function formatStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 4)}${iso.slice(5, 7)}${iso.slice(8, 10)}_${iso.slice(11, 13)}${iso.slice(14, 16)}${iso.slice(17, 19)}`;
}

/**
 * Task id: creation stamp + source + 6 hex chars to disambiguate tasks
 * from the same source within one second.
 */
export function generateTaskId(source: string, createdAt: Date): string {
  return `${formatStamp(createdAt)}_${source}_${randomBytes(3).toString("hex")}`;
}

export function slugify(text: string, maxLength = 40): string {
  const slug = text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, maxLength)
    .replace(/-+$/, "");
  return slug || "task";
}
