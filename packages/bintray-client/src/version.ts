import type { BintrayClient } from "./client.js";
import { Content } from "./content.js";
import { parseBody, readApiError } from "./errors.js";
import { scopedLogger, type ScopedLogger } from "./logger.js";
import { parseDate, publishSchema, sorted, versionSchema, type RepositoryType, type VersionRecord } from "./schemas.js";

export interface PublishOptions {
  /** Discard the unpublished files instead of publishing them. */
  discard?: boolean;
  /** Seconds Bintray should wait for publication before answering. */
  waitForSecs?: number;
}

export class Version {
  desc = "";
  labels: string[] = [];
  released?: Date;
  vcsTag?: string;
  githubUseTagReleaseNotes = false;
  githubReleaseNotesFile?: string;
  published = false;
  created?: Date;
  updated?: Date;

  private readonly log: ScopedLogger;

  constructor(
    private readonly client: BintrayClient,
    readonly subject: string,
    readonly repository: string,
    readonly pkg: string,
    readonly name: string
  ) {
    this.log = scopedLogger(client.logger, "version");
  }

  setDesc(desc: string): this {
    this.desc = desc;
    return this;
  }

  setLabels(labels: readonly string[]): this {
    this.labels = sorted(labels);
    return this;
  }

  setReleased(released: Date): this {
    this.released = released;
    return this;
  }

  setVcsTag(tag: string): this {
    this.vcsTag = tag;
    return this;
  }

  setGithubUseTagReleaseNotes(flag: boolean): this {
    this.githubUseTagReleaseNotes = flag;
    return this;
  }

  setGithubReleaseNotesFile(file: string): this {
    this.githubReleaseNotesFile = file;
    return this;
  }

  private get url(): URL {
    return this.client.apiUrl(`/packages/${this.subject}/${this.repository}/${this.pkg}/versions/${this.name}`);
  }

  private attributes(): Record<string, unknown> {
    const body: Record<string, unknown> = {
      desc: this.desc,
      labels: this.labels,
      github_use_tag_release_notes: this.githubUseTagReleaseNotes,
    };
    if (this.released) body.released = this.released.toISOString();
    if (this.vcsTag !== undefined) body.vcs_tag = this.vcsTag;
    if (this.githubReleaseNotesFile !== undefined) body.github_release_notes_file = this.githubReleaseNotesFile;
    return body;
  }

  private applyServerState(record: VersionRecord): void {
    this.published = record.published ?? false;
    this.created = parseDate(record.created);
    this.updated = parseDate(record.updated);
  }

  async create(): Promise<this> {
    const url = this.client.apiUrl(`/packages/${this.subject}/${this.repository}/${this.pkg}/versions`);
    const response = await this.client.json("POST", url, { name: this.name, ...this.attributes() });
    if (!response.ok) {
      throw await readApiError(response, "CreateVersion", this.toString(), { log: this.log });
    }
    const record = await parseBody(response, versionSchema, `CreateVersion(${this.toString()})`, this.log);
    if (!this.released) this.released = parseDate(record.released);
    this.applyServerState(record);
    return this;
  }

  exists(): Promise<boolean> {
    return this.client.probe(this.url);
  }

  async get(): Promise<this> {
    const response = await this.client.get(this.url);
    if (!response.ok) {
      throw await readApiError(response, "GetVersion", this.toString(), { log: this.log });
    }
    const record = await parseBody(response, versionSchema, `GetVersion(${this.toString()})`, this.log);
    this.desc = record.desc ?? "";
    this.labels = sorted(record.labels);
    this.released = parseDate(record.released);
    this.vcsTag = record.vcs_tag ?? undefined;
    this.githubUseTagReleaseNotes = record.github_use_tag_release_notes ?? false;
    this.githubReleaseNotesFile = record.github_release_notes_file ?? undefined;
    this.applyServerState(record);
    return this;
  }

  async update(): Promise<this> {
    const response = await this.client.json("PATCH", this.url, this.attributes());
    if (!response.ok) {
      throw await readApiError(response, "UpdateVersion", this.toString(), { log: this.log });
    }
    await response.body?.cancel();
    return this;
  }

  async delete(): Promise<void> {
    const response = await this.client.delete(this.url);
    if (!response.ok) {
      throw await readApiError(response, "DeleteVersion", this.toString(), { log: this.log });
    }
    await response.body?.cancel();
  }

  /** Publishes the version's pending files and returns how many were affected. */
  async publish(options: PublishOptions = {}): Promise<number> {
    const url = this.client.apiUrl(`/content/${this.subject}/${this.repository}/${this.pkg}/${this.name}/publish`);
    const body: Record<string, unknown> = {};
    if (options.discard !== undefined) body.discard = options.discard;
    if (options.waitForSecs !== undefined) body.publish_wait_for_secs = options.waitForSecs;

    const response = await this.client.json("POST", url, body);
    if (!response.ok) {
      throw await readApiError(response, "PublishVersion", this.toString(), { log: this.log });
    }
    const result = await parseBody(response, publishSchema, `PublishVersion(${this.toString()})`, this.log);
    if (!options.discard) this.published = true;
    return result.files;
  }

  file(path: string, repositoryType?: RepositoryType): Content {
    return new Content(this.client, this.subject, this.repository, this.pkg, this.name, path, repositoryType);
  }

  toString(): string {
    return `bintray::Version(${this.subject}:${this.repository}:${this.pkg}:${this.name})`;
  }
}
