import { UsageError } from "clipanion";

export interface RepositoryCoordinates {
  subject: string;
  repository: string;
}

export interface PackageCoordinates extends RepositoryCoordinates {
  package: string;
}

export interface VersionCoordinates extends PackageCoordinates {
  version: string;
}

const SHAPES = {
  1: "subject",
  2: "subject/repo",
  3: "subject/repo/package",
  4: "subject/repo/package/version",
} as const;

/**
 * Splits `subject/repo/...` into `count` parts. The subject may be left out
 * when a default one is configured.
 */
export function splitCoordinates(text: string, count: keyof typeof SHAPES, defaultSubject?: string): string[] {
  const parts = text.split("/");
  if (parts.length === count - 1 && defaultSubject) parts.unshift(defaultSubject);
  if (parts.length !== count || parts.some(part => part.trim() === "")) {
    throw new UsageError(`expected ${SHAPES[count]}, got "${text}"`);
  }
  return parts;
}

export function parseSubject(text: string | undefined, defaultSubject?: string): string {
  const subject = text ?? defaultSubject;
  if (!subject) throw new UsageError("no subject given and none configured");
  splitCoordinates(subject, 1);
  return subject;
}

export function parseRepository(text: string, defaultSubject?: string): RepositoryCoordinates {
  const [subject = "", repository = ""] = splitCoordinates(text, 2, defaultSubject);
  return { subject, repository };
}

export function parsePackage(text: string, defaultSubject?: string): PackageCoordinates {
  const [subject = "", repository = "", pkg = ""] = splitCoordinates(text, 3, defaultSubject);
  return { subject, repository, package: pkg };
}

export function parseVersion(text: string, defaultSubject?: string): VersionCoordinates {
  const [subject = "", repository = "", pkg = "", version = ""] = splitCoordinates(text, 4, defaultSubject);
  return { subject, repository, package: pkg, version };
}
