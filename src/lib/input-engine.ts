import fs from "fs";
import { parse as parseCsv } from "csv-parse/sync";
import { format, isValid, parse } from "date-fns";
import { z } from "zod";
import type { DateSet, UnavailabilityIndex } from "@/lib/calendar-engine";
import { UNASSIGNED } from "@/lib/week-engine";

export type SkippedLine = {
  source: string;
  line: number; // 1-based
  text: string;
  reason: string;
};

export type ParseResult<T> = {
  value: T;
  skipped: SkippedLine[];
};

const csvRowsSchema = z.array(z.array(z.string()));

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

// Strict YYYY-MM-DD that is also a real calendar day (rejects 2025-02-30)
export function parseISODateToken(token: string): Date | null {
  if (!ISO_DATE_REGEX.test(token)) return null;
  const d = parse(token, "yyyy-MM-dd", new Date());
  if (!isValid(d)) return null;
  return format(d, "yyyy-MM-dd") === token ? d : null;
}

function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

function isIgnorable(line: string): boolean {
  return line === "" || line.startsWith("#");
}

function reportSkipped(skipped: SkippedLine[]) {
  for (const s of skipped) {
    console.warn(`[input] ${s.source}:${s.line} skipped (${s.reason}): ${JSON.stringify(s.text)}`);
  }
}

function readLines(file: string): string | null {
  if (!fs.existsSync(file)) {
    console.warn(`[input] ${file} not found, treating as empty`);
    return null;
  }
  return fs.readFileSync(file, "utf-8");
}

export function parseRoster(text: string, source = "roster"): ParseResult<string[]> {
  const value: string[] = [];
  const skipped: SkippedLine[] = [];
  splitLines(text).forEach((raw, i) => {
    const name = raw.trim();
    if (isIgnorable(name)) return;
    if (name === UNASSIGNED) {
      skipped.push({ source, line: i + 1, text: raw, reason: `"${UNASSIGNED}" is reserved` });
      return;
    }
    value.push(name);
  });
  return { value, skipped };
}

export function parseDateSet(text: string, source = "dates"): ParseResult<DateSet> {
  const value = new Set<string>();
  const skipped: SkippedLine[] = [];
  splitLines(text).forEach((raw, i) => {
    const token = raw.trim();
    if (isIgnorable(token)) return;
    if (!parseISODateToken(token)) {
      skipped.push({ source, line: i + 1, text: raw, reason: "expected YYYY-MM-DD" });
      return;
    }
    value.add(token);
  });
  return { value, skipped };
}

export function parseUnavailability(text: string, source = "unavailability"): ParseResult<UnavailabilityIndex> {
  const value = new Map<string, Set<string>>();
  const skipped: SkippedLine[] = [];
  splitLines(text).forEach((raw, i) => {
    const line = raw.trim();
    if (isIgnorable(line)) return;

    // Names containing commas must be quoted: "Smith, Jo",2024-01-02
    let rows: z.infer<typeof csvRowsSchema>;
    try {
      rows = csvRowsSchema.parse(parseCsv(line, { trim: true, relax_column_count: true }));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      skipped.push({ source, line: i + 1, text: raw, reason: `malformed CSV: ${detail}` });
      return;
    }
    const fields = rows[0] ?? [];
    if (fields.length !== 2 || !fields[0]) {
      skipped.push({ source, line: i + 1, text: raw, reason: "expected Name,YYYY-MM-DD" });
      return;
    }
    const [name, token] = fields;
    if (!parseISODateToken(token)) {
      skipped.push({ source, line: i + 1, text: raw, reason: "expected YYYY-MM-DD" });
      return;
    }

    const days = value.get(name) ?? new Set<string>();
    days.add(token);
    value.set(name, days);
  });
  return { value, skipped };
}

export function loadRoster(file: string): string[] {
  const text = readLines(file);
  if (text === null) return [];
  const { value, skipped } = parseRoster(text, file);
  reportSkipped(skipped);
  return value;
}

export function loadDateSet(file: string): DateSet {
  const text = readLines(file);
  if (text === null) return new Set();
  const { value, skipped } = parseDateSet(text, file);
  reportSkipped(skipped);
  return value;
}

export function loadUnavailability(file: string): UnavailabilityIndex {
  const text = readLines(file);
  if (text === null) return new Map();
  const { value, skipped } = parseUnavailability(text, file);
  reportSkipped(skipped);
  return value;
}

// Fisher-Yates over a copy; pass `random` for a repeatable order
export function shuffleRoster<T>(arr: readonly T[], random: () => number = Math.random): T[] {
  const a = [...arr];
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}
