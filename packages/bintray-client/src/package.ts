import type { BintrayClient } from "./client.js";
import { BintrayError, parseBody, readApiError } from "./errors.js";
import { scopedLogger, type ScopedLogger } from "./logger.js";
import { createdSchema, packageSchema, parseDate, sorted, type PackageMaturity } from "./schemas.js";
import { Version } from "./version.js";
import { sortVersions } from "./versions.js";

export { PACKAGE_MATURITIES, type PackageMaturity } from "./schemas.js";

export class Package {
  desc = "";
  labels: string[] = [];
  licenses: string[] = [];
  websiteUrl = "";
  vcsUrl = "";
  issueTrackerUrl = "";
  githubRepo = "";
  githubReleaseNotesFile = "";
  maturity: PackageMaturity = "";
  created?: Date;
  updated?: Date;

  private cachedVersions?: string[];
  private readonly log: ScopedLogger;

  constructor(
    private readonly client: BintrayClient,
    readonly subject: string,
    readonly repository: string,
    readonly name: string
  ) {
    this.log = scopedLogger(client.logger, "package");
  }

  setDesc(desc: string): this {
    this.desc = desc;
    return this;
  }

  setLabels(labels: readonly string[]): this {
    this.labels = sorted(labels);
    return this;
  }

  setLicenses(licenses: readonly string[]): this {
    this.licenses = sorted(licenses);
    return this;
  }

  setWebsiteUrl(url: string): this {
    this.websiteUrl = url;
    return this;
  }

  setVcsUrl(url: string): this {
    this.vcsUrl = url;
    return this;
  }

  setIssueTrackerUrl(url: string): this {
    this.issueTrackerUrl = url;
    return this;
  }

  setGithubRepo(repo: string): this {
    this.githubRepo = repo;
    return this;
  }

  setGithubReleaseNotesFile(file: string): this {
    this.githubReleaseNotesFile = file;
    return this;
  }

  setMaturity(maturity: PackageMaturity): this {
    this.maturity = maturity;
    return this;
  }

  private get url(): URL {
    return this.client.apiUrl(`/packages/${this.subject}/${this.repository}/${this.name}`);
  }

  private attributes(): Record<string, unknown> {
    return {
      desc: this.desc,
      labels: this.labels,
      licenses: this.licenses,
      website_url: this.websiteUrl,
      vcs_url: this.vcsUrl,
      issue_tracker_url: this.issueTrackerUrl,
      github_repo: this.githubRepo,
      github_release_notes_file: this.githubReleaseNotesFile,
      maturity: this.maturity,
    };
  }

  async create(): Promise<this> {
    const url = this.client.apiUrl(`/packages/${this.subject}/${this.repository}`);
    const response = await this.client.json("POST", url, { name: this.name, ...this.attributes() });
    if (!response.ok) {
      throw await readApiError(response, "CreatePackage", this.toString(), { log: this.log });
    }
    const stamps = await parseBody(response, createdSchema.nullable(), `CreatePackage(${this.toString()})`, this.log);
    this.created = parseDate(stamps?.created);
    this.updated = parseDate(stamps?.updated);
    return this;
  }

  exists(): Promise<boolean> {
    return this.client.probe(this.url);
  }

  async get(): Promise<this> {
    const response = await this.client.get(this.url);
    if (!response.ok) {
      throw await readApiError(response, "GetPackage", this.toString(), { log: this.log });
    }
    const record = await parseBody(response, packageSchema, `GetPackage(${this.toString()})`, this.log);

    this.desc = record.desc ?? "";
    this.labels = sorted(record.labels);
    this.licenses = sorted(record.licenses);
    this.websiteUrl = record.website_url ?? "";
    this.vcsUrl = record.vcs_url ?? "";
    this.issueTrackerUrl = record.issue_tracker_url ?? "";
    this.githubRepo = record.github_repo ?? "";
    this.githubReleaseNotesFile = record.github_release_notes_file ?? "";
    this.maturity = record.maturity ?? "";
    this.created = parseDate(record.created);
    this.updated = parseDate(record.updated);
    this.cachedVersions = sortVersions(record.versions ?? []);
    return this;
  }

  async update(): Promise<this> {
    const response = await this.client.json("PATCH", this.url, this.attributes());
    if (!response.ok) {
      throw await readApiError(response, "UpdatePackage", this.toString(), { log: this.log });
    }
    await response.body?.cancel();
    // The PATCH response carries no timestamp; the cached one is stale.
    this.updated = undefined;
    return this;
  }

  async delete(): Promise<void> {
    const response = await this.client.delete(this.url);
    if (!response.ok) {
      throw await readApiError(response, "DeletePackage", this.toString(), { log: this.log });
    }
    await response.body?.cancel();
  }

  /** Version names from the last `get()`, oldest first. */
  versions(): string[] {
    if (this.cachedVersions === undefined) {
      throw new BintrayError("call-get-first", `${this.toString()}: call get() before versions()`);
    }
    return [...this.cachedVersions];
  }

  latestVersion(): string | undefined {
    const versions = this.versions();
    return versions[versions.length - 1];
  }

  version(name: string): Version {
    return new Version(this.client, this.subject, this.repository, this.name, name);
  }

  toString(): string {
    return `bintray::Package(${this.subject}:${this.repository}:${this.name})`;
  }
}
