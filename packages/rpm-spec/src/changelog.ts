import { RpmSpecError, type ChangelogEntry } from "./types.js";

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];
const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

const HEADER_PATTERN = /^\*\s+([A-Za-z]{3})\s+([A-Za-z]{3})\s+(\d{1,2})\s+(\d{4})\s+(.+?)\s*$/;

function parseHeader(text: string, line: number): ChangelogEntry {
  const match = text.match(HEADER_PATTERN);
  if (!match) {
    throw new RpmSpecError(`malformed changelog header '${text}'`, line);
  }
  const [, weekday, monthName, dayText, yearText, rest] = match;
  if (!WEEKDAYS.includes(weekday)) {
    throw new RpmSpecError(`unknown weekday '${weekday}' in changelog header`, line);
  }
  const month = MONTHS.indexOf(monthName);
  if (month < 0) {
    throw new RpmSpecError(`unknown month '${monthName}' in changelog header`, line);
  }
  const day = Number(dayText);
  const year = Number(yearText);
  const date = new Date(Date.UTC(year, month, day));
  if (date.getUTCDate() !== day) {
    throw new RpmSpecError(`invalid date '${monthName} ${dayText} ${yearText}' in changelog header`, line);
  }

  let identity = rest;
  let version: string | undefined;
  const versionMatch = identity.match(/\s+-\s+(\S+)$/);
  if (versionMatch) {
    version = versionMatch[1];
    identity = identity.slice(0, versionMatch.index).trim();
  }

  let author = identity;
  let email: string | undefined;
  const emailMatch = identity.match(/^(.*?)\s*<([^>]+)>$/);
  if (emailMatch) {
    author = emailMatch[1].trim();
    email = emailMatch[2].trim();
  }

  const entry: ChangelogEntry = { date, weekday, author, notes: [], line };
  if (email) entry.email = email;
  if (version) entry.version = version;
  return entry;
}

/**
 * Parses the body of a `%changelog` section. `firstLine` is the 1-based line
 * number of the first body line in the spec file.
 */
export function parseChangelog(body: string, firstLine: number): ChangelogEntry[] {
  const entries: ChangelogEntry[] = [];
  let current: ChangelogEntry | null = null;

  const lines = body.split("\n");
  for (let offset = 0; offset < lines.length; offset += 1) {
    const line = firstLine + offset;
    const text = lines[offset].trimEnd();
    if (!text.trim()) continue;

    if (text.startsWith("*")) {
      current = parseHeader(text, line);
      entries.push(current);
      continue;
    }
    if (!current) {
      throw new RpmSpecError("changelog entries must start with a '*' header line", line);
    }
    const trimmed = text.trim();
    if (trimmed.startsWith("-")) {
      current.notes.push(trimmed.replace(/^-\s*/, ""));
      continue;
    }
    if (current.notes.length === 0) {
      current.notes.push(trimmed);
      continue;
    }
    const last = current.notes.length - 1;
    current.notes[last] = `${current.notes[last]} ${trimmed}`;
  }

  return entries;
}
