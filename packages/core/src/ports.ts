import { PortSpecError } from "./errors.js";
import type { PortRange } from "./types.js";

const MIN_PORT = 1;
const MAX_PORT = 65535;
const RANGE_PATTERN = /^(\d{1,5})(?:\s*-\s*(\d{1,5}))?$/;

// Parse "80,443,8000-8100" (or several such strings) into the minimal covering set.
export function parsePortSpec(spec: string | string[]): PortRange[] {
  const parts = (Array.isArray(spec) ? spec : [spec])
    .flatMap((entry) => entry.split(","))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return normalizePortRanges(parts.map(parsePortRange));
}

export function parsePortRange(text: string): PortRange {
  const match = RANGE_PATTERN.exec(text.trim());
  if (!match || !match[1]) {
    throw new PortSpecError(text, "expected PORT or START-END");
  }
  const start = Number.parseInt(match[1], 10);
  const end = match[2] ? Number.parseInt(match[2], 10) : start;
  if (start < MIN_PORT || end > MAX_PORT) {
    throw new PortSpecError(text, `ports must be between ${MIN_PORT} and ${MAX_PORT}`);
  }
  if (start > end) {
    throw new PortSpecError(text, "range start is greater than its end");
  }
  return { start, end };
}

// Sort and merge overlapping or adjacent ranges.
export function normalizePortRanges(ranges: PortRange[]): PortRange[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: PortRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end + 1) {
      last.end = Math.max(last.end, range.end);
      continue;
    }
    merged.push({ start: range.start, end: range.end });
  }
  return merged;
}

export function formatPortRange(range: PortRange): string {
  return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`;
}

export function formatPortSpec(ranges: PortRange[]): string {
  return ranges.map(formatPortRange).join(",");
}

export function isFullPortRange(ranges: PortRange[]): boolean {
  return normalizePortRanges(ranges).some((range) => range.start === MIN_PORT && range.end === MAX_PORT);
}
