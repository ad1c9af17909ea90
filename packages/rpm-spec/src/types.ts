export const RPM_SECTION_NAMES = [
  "description",
  "prep",
  "build",
  "install",
  "check",
  "clean",
  "files",
  "pre",
  "post",
  "preun",
  "postun",
  "changelog",
] as const;

export type RpmSectionName = (typeof RPM_SECTION_NAMES)[number];

export interface RpmSection {
  /** Text following the section keyword, e.g. `-f files.list` for `%files -f files.list`. */
  args: string;
  body: string;
  line: number;
}

export interface ChangelogEntry {
  date: Date;
  weekday: string;
  author: string;
  email?: string;
  version?: string;
  notes: string[];
  line: number;
}

export interface RpmSpec {
  name: string;
  version: string;
  release: string;
  summary: string;
  license: string;
  epoch?: number;
  url?: string;
  buildArch?: string;
  sources: Record<number, string>;
  patches: Record<number, string>;
  requires: string[];
  buildRequires: string[];
  /** Every preamble tag, keyed by its lower-cased name. The last occurrence wins. */
  tags: Record<string, string>;
  macros: Record<string, string>;
  description: string;
  sections: Partial<Record<RpmSectionName, RpmSection>>;
  changelog: ChangelogEntry[];
}

export interface RpmNevra {
  name: string;
  epoch?: number | string;
  version: string;
  release: string;
  arch: string;
}

export class RpmSpecError extends Error {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = "RpmSpecError";
    this.line = line;
  }
}
