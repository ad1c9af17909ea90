import type { Package, Repository, Version } from "@bintray-kit/client";
import type { RpmSpec } from "@bintray-kit/rpm-spec";
import { specRpmFilename } from "@bintray-kit/rpm-spec";

export type Field = string | number | boolean | Date | readonly string[] | undefined;

export type Fields = Record<string, Field>;

function render(value: Exclude<Field, undefined>): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return String(value);
  return value.join(", ");
}

function isShown(entry: [string, Field]): entry is [string, Exclude<Field, undefined>] {
  const value = entry[1];
  if (value === undefined || value === "") return false;
  return !(Array.isArray(value) && value.length === 0);
}

/** `key: value` lines; unset and empty values are left out. */
export function formatRecord(record: Fields): string[] {
  const entries = Object.entries(record).filter(isShown);
  const width = Math.max(0, ...entries.map(([key]) => key.length));
  return entries.map(([key, value]) => `${`${key}:`.padEnd(width + 1)} ${render(value)}`);
}

export function describeRepository(repository: Repository): Fields {
  return {
    name: repository.name,
    owner: repository.subject,
    type: repository.type,
    private: repository.isPrivate,
    premium: repository.isPremium,
    desc: repository.desc,
    labels: repository.labels,
    gpg_sign_metadata: repository.gpgSignMetadata,
    gpg_sign_files: repository.gpgSignFiles,
    gpg_use_owner_key: repository.gpgUseOwnerKey,
    yum_metadata_depth: repository.yumMetadataDepth,
    created: repository.created,
    package_count: repository.packageCount,
  };
}

export function describePackage(pkg: Package): Fields {
  return {
    name: pkg.name,
    repo: pkg.repository,
    owner: pkg.subject,
    desc: pkg.desc,
    labels: pkg.labels,
    licenses: pkg.licenses,
    website_url: pkg.websiteUrl,
    vcs_url: pkg.vcsUrl,
    issue_tracker_url: pkg.issueTrackerUrl,
    github_repo: pkg.githubRepo,
    maturity: pkg.maturity,
    created: pkg.created,
    updated: pkg.updated,
    latest_version: pkg.latestVersion(),
    versions: pkg.versions(),
  };
}

export function describeVersion(version: Version): Fields {
  return {
    name: version.name,
    package: version.pkg,
    repo: version.repository,
    owner: version.subject,
    desc: version.desc,
    labels: version.labels,
    released: version.released,
    vcs_tag: version.vcsTag,
    published: version.published,
    created: version.created,
    updated: version.updated,
  };
}

export function describeRpmSpec(spec: RpmSpec): Fields {
  return {
    name: spec.name,
    epoch: spec.epoch,
    version: spec.version,
    release: spec.release,
    summary: spec.summary,
    license: spec.license,
    url: spec.url,
    build_arch: spec.buildArch,
    rpm: specRpmFilename(spec),
    sources: Object.values(spec.sources),
    patches: Object.values(spec.patches),
    requires: spec.requires,
    build_requires: spec.buildRequires,
    changelog_entries: spec.changelog.length,
  };
}

/** The same record for `--json`, with dates as ISO strings. */
export function toJson(record: Fields): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => [key, value instanceof Date ? value.toISOString() : value])
  );
}
