import type { BintrayClient } from "./client.js";
import { parseBody, readApiError } from "./errors.js";
import { scopedLogger, type ScopedLogger } from "./logger.js";
import { Package } from "./package.js";
import {
  createdSchema,
  nameListSchema,
  parseDate,
  repositorySchema,
  sorted,
  type RepositoryRecord,
  type RepositoryType,
} from "./schemas.js";

export { REPOSITORY_TYPES, type RepositoryType } from "./schemas.js";

/** Debian and RPM repositories are indexed by Bintray after each upload. */
export function isIndexedRepositoryType(type: RepositoryType): boolean {
  return type === "debian" || type === "rpm";
}

function omitUnset(body: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(body).filter(([, value]) => value !== undefined));
}

export class Repository {
  type: RepositoryType = "generic";
  isPrivate = false;
  isPremium = false;
  businessUnit?: string;
  desc?: string;
  labels?: string[];
  gpgSignMetadata = false;
  gpgSignFiles = false;
  gpgUseOwnerKey = false;
  defaultDebianArchitecture?: string;
  defaultDebianDistribution?: string;
  defaultDebianComponent?: string;
  yumMetadataDepth?: number;
  yumGroupsFile?: string;
  created?: Date;
  packageCount = 0;

  private readonly log: ScopedLogger;

  constructor(
    private readonly client: BintrayClient,
    readonly subject: string,
    readonly name: string
  ) {
    this.log = scopedLogger(client.logger, "repository");
  }

  setType(type: RepositoryType): this {
    this.type = type;
    return this;
  }

  setPrivate(flag: boolean): this {
    this.isPrivate = flag;
    return this;
  }

  setBusinessUnit(unit: string): this {
    this.businessUnit = unit;
    return this;
  }

  setDesc(desc: string): this {
    this.desc = desc;
    return this;
  }

  setLabels(labels: readonly string[]): this {
    this.labels = sorted(labels);
    return this;
  }

  setGpgSignMetadata(flag: boolean): this {
    this.gpgSignMetadata = flag;
    return this;
  }

  setGpgSignFiles(flag: boolean): this {
    this.gpgSignFiles = flag;
    return this;
  }

  setGpgUseOwnerKey(flag: boolean): this {
    this.gpgUseOwnerKey = flag;
    return this;
  }

  setDefaultDebianArchitecture(architecture: string): this {
    this.defaultDebianArchitecture = architecture;
    return this;
  }

  setDefaultDebianDistribution(distribution: string): this {
    this.defaultDebianDistribution = distribution;
    return this;
  }

  setDefaultDebianComponent(component: string): this {
    this.defaultDebianComponent = component;
    return this;
  }

  setYumMetadataDepth(depth: number): this {
    this.yumMetadataDepth = depth;
    return this;
  }

  setYumGroupsFile(file: string): this {
    this.yumGroupsFile = file;
    return this;
  }

  private get url(): URL {
    return this.client.apiUrl(`/repos/${this.subject}/${this.name}`);
  }

  private apply(record: RepositoryRecord): void {
    this.type = record.type;
    this.isPrivate = record.private;
    this.isPremium = record.premium;
    this.businessUnit = record.business_unit ?? undefined;
    this.desc = record.desc ?? undefined;
    this.labels = record.labels ? sorted(record.labels) : undefined;
    this.gpgSignMetadata = record.gpg_sign_metadata;
    this.gpgSignFiles = record.gpg_sign_files;
    this.gpgUseOwnerKey = record.gpg_use_owner_key;
    this.defaultDebianArchitecture = record.default_debian_architecture ?? undefined;
    this.defaultDebianDistribution = record.default_debian_distribution ?? undefined;
    this.defaultDebianComponent = record.default_debian_component ?? undefined;
    this.yumMetadataDepth = record.yum_metadata_depth ?? undefined;
    this.yumGroupsFile = record.yum_groups_file ?? undefined;
    this.created = parseDate(record.created);
    this.packageCount = record.package_count;
  }

  async get(): Promise<this> {
    const response = await this.client.get(this.url);
    if (!response.ok) {
      throw await readApiError(response, "GetRepository", this.toString(), { log: this.log });
    }
    this.apply(await parseBody(response, repositorySchema, `GetRepository(${this.toString()})`, this.log));
    return this;
  }

  exists(): Promise<boolean> {
    return this.client.probe(this.url);
  }

  async create(): Promise<this> {
    const body = omitUnset({
      name: this.name,
      type: this.type,
      private: this.isPrivate,
      business_unit: this.businessUnit,
      desc: this.desc,
      labels: this.labels,
      gpg_sign_metadata: this.gpgSignMetadata,
      gpg_sign_files: this.gpgSignFiles,
      gpg_use_owner_key: this.gpgUseOwnerKey,
      default_debian_architecture: this.defaultDebianArchitecture,
      default_debian_distribution: this.defaultDebianDistribution,
      default_debian_component: this.defaultDebianComponent,
      yum_metadata_depth: this.yumMetadataDepth,
      yum_groups_file: this.yumGroupsFile,
    });
    const response = await this.client.json("POST", this.url, body);
    if (!response.ok) {
      throw await readApiError(response, "CreateRepository", this.toString(), { log: this.log });
    }
    const created = await parseBody(
      response,
      createdSchema.nullable(),
      `CreateRepository(${this.toString()})`,
      this.log
    );
    this.created = parseDate(created?.created);
    return this;
  }

  async update(): Promise<this> {
    const body = omitUnset({
      business_unit: this.businessUnit,
      desc: this.desc,
      labels: this.labels,
      gpg_sign_metadata: this.gpgSignMetadata,
      gpg_sign_files: this.gpgSignFiles,
      gpg_use_owner_key: this.gpgUseOwnerKey,
    });
    const response = await this.client.json("PATCH", this.url, body);
    if (!response.ok) {
      throw await readApiError(response, "UpdateRepository", this.toString(), { log: this.log });
    }
    await response.body?.cancel();
    return this;
  }

  /** Deletes the repository. A repository that is already gone counts as deleted. */
  async delete(): Promise<void> {
    const response = await this.client.delete(this.url);
    if (response.status === 404) {
      await readApiError(response, "DeleteRepository", this.toString(), { log: this.log, expected: [404] });
      this.log.info(`DeleteRepository(${this.toString()}): already absent`);
    } else if (!response.ok) {
      throw await readApiError(response, "DeleteRepository", this.toString(), { log: this.log });
    } else {
      await response.body?.cancel();
    }
    this.created = undefined;
  }

  async packageNames(): Promise<string[]> {
    const response = await this.client.get(this.client.apiUrl(`/repos/${this.subject}/${this.name}/packages`));
    if (!response.ok) {
      throw await readApiError(response, "ListPackages", this.toString(), { log: this.log });
    }
    const entries = await parseBody(response, nameListSchema, `ListPackages(${this.toString()})`, this.log);
    return entries.map(entry => entry.name).sort();
  }

  package(name: string): Package {
    return new Package(this.client, this.subject, this.name, name);
  }

  toString(): string {
    return `bintray::Repository(${this.subject}:${this.name})`;
  }
}
