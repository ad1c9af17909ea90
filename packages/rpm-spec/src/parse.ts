import { parseChangelog } from "./changelog.js";
import { expandMacros, parseMacroDefinition, unescapePercent } from "./macros.js";
import {
  RPM_SECTION_NAMES,
  RpmSpecError,
  type RpmSection,
  type RpmSectionName,
  type RpmSpec,
} from "./types.js";

const SECTION_PATTERN = new RegExp(`^%(${RPM_SECTION_NAMES.join("|")})(?=\\s|$)(.*)$`);
const TAG_PATTERN = /^([A-Za-z][A-Za-z0-9]*(?:\([^)]*\))?)\s*:\s*(.*)$/;
const PACKAGE_PATTERN = /^%package(?=\s|$)/;
const NUMBERED_TAG_PATTERN = /^(source|patch)(\d*)$/;
const DEPENDENCY_OPERATORS = new Set(["<", "<=", "=", ">=", ">"]);

const REQUIRED_TAGS: Array<[string, string]> = [
  ["name", "Name"],
  ["version", "Version"],
  ["release", "Release"],
  ["summary", "Summary"],
  ["license", "License"],
];

type PendingSection = {
  name: RpmSectionName;
  args: string;
  line: number;
  lines: string[];
};

function isSectionName(value: string): value is RpmSectionName {
  return (RPM_SECTION_NAMES as readonly string[]).includes(value);
}

/** Splits a `Requires:`-style value into entries, keeping `name op version` triples together. */
export function parseDependencyList(value: string): string[] {
  const result: string[] = [];
  for (const chunk of value.split(",")) {
    const tokens = chunk.trim().split(/\s+/).filter(Boolean);
    for (let i = 0; i < tokens.length; i += 1) {
      const operator = tokens[i + 1];
      const version = tokens[i + 2];
      if (operator !== undefined && DEPENDENCY_OPERATORS.has(operator) && version !== undefined) {
        result.push(`${tokens[i]} ${operator} ${version}`);
        i += 2;
      } else {
        result.push(tokens[i]);
      }
    }
  }
  return result;
}

function trimBlankEdges(lines: string[]): { text: string; leading: number } {
  let start = 0;
  let end = lines.length;
  while (start < end && !lines[start].trim()) start += 1;
  while (end > start && !lines[end - 1].trim()) end -= 1;
  return { text: lines.slice(start, end).join("\n"), leading: start };
}

export function parseRpmSpec(text: string): RpmSpec {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const macros: Record<string, string> = {};
  const tags: Record<string, string> = {};
  const tagLines: Record<string, number> = {};
  const sources: Record<number, string> = {};
  const patches: Record<number, string> = {};
  const requires: string[] = [];
  const buildRequires: string[] = [];
  const pending: PendingSection[] = [];
  let current: PendingSection | null = null;

  for (let index = 0; index < lines.length; index += 1) {
    const raw = lines[index];
    const lineNumber = index + 1;

    if (PACKAGE_PATTERN.test(raw)) {
      throw new RpmSpecError("subpackages (%package) are not supported", lineNumber);
    }
    const sectionMatch = raw.match(SECTION_PATTERN);
    if (sectionMatch && isSectionName(sectionMatch[1])) {
      const name = sectionMatch[1];
      const previous = pending.find(section => section.name === name);
      if (previous) {
        throw new RpmSpecError(`duplicate %${name} section, first opened at line ${previous.line}`, lineNumber);
      }
      current = { name, args: sectionMatch[2].trim(), line: lineNumber, lines: [] };
      pending.push(current);
      continue;
    }
    if (current) {
      current.lines.push(raw);
      continue;
    }

    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const definition = parseMacroDefinition(trimmed);
    if (definition) {
      macros[definition.name] = expandMacros(definition.value, macros);
      continue;
    }

    // Conditionals and other preamble directives are not evaluated.
    const tagMatch = trimmed.match(TAG_PATTERN);
    if (!tagMatch) continue;

    const key = tagMatch[1].toLowerCase();
    const expanded = expandMacros(tagMatch[2].trim(), macros);
    const value = unescapePercent(expanded);
    tags[key] = value;
    tagLines[key] = lineNumber;

    if (key === "name" || key === "version" || key === "release") {
      macros[key] = expanded;
    } else if (key === "requires") {
      requires.push(...parseDependencyList(value));
    } else if (key === "buildrequires") {
      buildRequires.push(...parseDependencyList(value));
    } else {
      const numbered = key.match(NUMBERED_TAG_PATTERN);
      if (numbered) {
        const slot = numbered[2] ? Number(numbered[2]) : 0;
        if (numbered[1] === "source") {
          sources[slot] = value;
        } else {
          patches[slot] = value;
        }
      }
    }
  }

  const missing = REQUIRED_TAGS.filter(([key]) => !tags[key]).map(([, label]) => label);
  if (missing.length > 0) {
    throw new RpmSpecError(`missing required tag${missing.length > 1 ? "s" : ""}: ${missing.join(", ")}`);
  }

  let epoch: number | undefined;
  if (tags.epoch !== undefined) {
    if (!/^\d+$/.test(tags.epoch)) {
      throw new RpmSpecError(`Epoch must be a non-negative integer, got '${tags.epoch}'`, tagLines.epoch);
    }
    epoch = Number(tags.epoch);
  }

  const sections: Partial<Record<RpmSectionName, RpmSection>> = {};
  let changelogStart = 0;
  for (const section of pending) {
    const { text: body, leading } = trimBlankEdges(section.lines);
    sections[section.name] = { args: section.args, body, line: section.line };
    if (section.name === "changelog") {
      changelogStart = section.line + 1 + leading;
    }
  }

  const description = sections.description
    ? unescapePercent(expandMacros(sections.description.body, macros))
    : "";
  const changelog = sections.changelog ? parseChangelog(sections.changelog.body, changelogStart) : [];

  const spec: RpmSpec = {
    name: tags.name,
    version: tags.version,
    release: tags.release,
    summary: tags.summary,
    license: tags.license,
    sources,
    patches,
    requires,
    buildRequires,
    tags,
    macros,
    description,
    sections,
    changelog,
  };
  if (epoch !== undefined) spec.epoch = epoch;
  if (tags.url) spec.url = tags.url;
  if (tags.buildarch) spec.buildArch = tags.buildarch;
  return spec;
}
