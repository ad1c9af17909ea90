import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { promisify } from "node:util";
import { gunzip } from "node:zlib";

import fs from "fs-extra";
import type { BodyInit, Response } from "undici";

import {
  CHECKSUM_HEADER,
  checksumBytes,
  checksumFile,
  checksumFromResponse,
  checksumToHex,
  sameChecksum,
  type ContentChecksum,
} from "./checksum.js";
import type { BintrayClient, HttpMethod } from "./client.js";
import { BintrayError, defaultStatusMessage, readApiError, reportWarning, unexpectedStatus } from "./errors.js";
import { scopedLogger, type ScopedLogger } from "./logger.js";
import { basename, cleanPath } from "./paths.js";
import { parsePrimary, parseRepomd, rpmPackageFilename, type PrimaryPackage } from "./repodata.js";
import { isIndexedRepositoryType } from "./repository.js";
import { sorted, type RepositoryType } from "./schemas.js";
import { done, TRY_AGAIN, waitForCondition, type ProbeResult } from "./wait.js";

const gunzipAsync = promisify(gunzip);

export interface WaitForAvailabilityOptions {
  timeoutMs: number;
  intervalMs?: number;
}

export interface WaitForIndexationOptions {
  timeoutMs: number;
  intervalMs?: number;
}

const AVAILABILITY_INTERVAL_MS = 1_000;
const INDEXATION_INTERVAL_MS = 30_000;
const RPM_SHA1_TYPES = new Set(["sha", "sha1"]);

function flag(value: boolean): string {
  return value ? "1" : "0";
}

function isNotYetThere(status: number): boolean {
  return status === 401 || status === 404;
}

async function discard(response: Response): Promise<void> {
  await response.body?.cancel();
}

/** A file inside a version. */
export class Content {
  readonly path: string;

  private publishFlag?: boolean;
  private overrideFlag?: boolean;
  private explodeFlag?: boolean;
  private checksum: ContentChecksum = {};
  private debianDistributions: string[] = [];
  private debianComponents: string[] = [];
  private debianArchitectures: string[] = [];
  private gpgPassphrase?: string;
  private repositoryType?: RepositoryType;
  private readonly log: ScopedLogger;

  constructor(
    private readonly client: BintrayClient,
    readonly subject: string,
    readonly repository: string,
    readonly pkg: string,
    readonly version: string,
    path: string,
    repositoryType?: RepositoryType
  ) {
    this.path = cleanPath(path);
    this.repositoryType = repositoryType;
    this.log = scopedLogger(client.logger, "content");
  }

  setPublish(value: boolean): this {
    this.publishFlag = value;
    return this;
  }

  setOverride(value: boolean): this {
    this.overrideFlag = value;
    return this;
  }

  setExplode(value: boolean): this {
    this.explodeFlag = value;
    return this;
  }

  setChecksumSha1(checksum: Uint8Array): this {
    this.checksum.sha1 = checksum;
    return this;
  }

  setChecksumSha256(checksum: Uint8Array): this {
    this.checksum.sha256 = checksum;
    return this;
  }

  async setChecksumFromFile(path: string): Promise<this> {
    this.checksum = await checksumFile(path);
    return this;
  }

  setChecksumFromBytes(data: Uint8Array): this {
    this.checksum = checksumBytes(data);
    return this;
  }

  getChecksum(): ContentChecksum {
    return { ...this.checksum };
  }

  setDebianDistributions(distributions: readonly string[]): this {
    this.debianDistributions = sorted(distributions);
    return this;
  }

  setDebianComponents(components: readonly string[]): this {
    this.debianComponents = sorted(components);
    return this;
  }

  setDebianArchitectures(architectures: readonly string[]): this {
    this.debianArchitectures = sorted(architectures);
    return this;
  }

  setGpgPassphrase(passphrase: string): this {
    this.gpgPassphrase = passphrase;
    return this;
  }

  /** The repository type given at construction, or fetched from Bintray once. */
  async getRepositoryType(): Promise<RepositoryType> {
    if (this.repositoryType === undefined) {
      const repository = await this.client.subject(this.subject).repository(this.repository).get();
      this.repositoryType = repository.type;
    }
    return this.repositoryType;
  }

  private get downloadUrl(): URL {
    return this.client.dlUrl(`/${this.subject}/${this.repository}/${this.path}`);
  }

  private uploadHeaders(type: RepositoryType): Record<string, string> {
    const headers: Record<string, string> = {};
    if (this.publishFlag !== undefined) headers["X-Bintray-Publish"] = flag(this.publishFlag);
    if (type !== "maven") {
      if (this.overrideFlag !== undefined) headers["X-Bintray-Override"] = flag(this.overrideFlag);
      if (this.explodeFlag !== undefined) headers["X-Bintray-Explode"] = flag(this.explodeFlag);
    }
    if (this.checksum.sha256) headers[CHECKSUM_HEADER] = checksumToHex(this.checksum.sha256);
    if (type === "debian") {
      if (this.debianDistributions.length > 0) {
        headers["X-Bintray-Debian-Distribution"] = this.debianDistributions.join(",");
      }
      if (this.debianComponents.length > 0) {
        headers["X-Bintray-Debian-Component"] = this.debianComponents.join(",");
      }
      if (this.debianArchitectures.length > 0) {
        headers["X-Bintray-Debian-Architecture"] = this.debianArchitectures.join(",");
      }
    }
    if (this.gpgPassphrase !== undefined) headers["X-GPG-PASSPHRASE"] = this.gpgPassphrase;
    return headers;
  }

  async upload(body: BodyInit, extraHeaders: Record<string, string> = {}): Promise<this> {
    const type = await this.getRepositoryType();
    const url =
      type === "maven"
        ? this.client.apiUrl(`/maven/${this.subject}/${this.repository}/${this.pkg}/${this.path}`)
        : this.client.apiUrl(`/content/${this.subject}/${this.repository}/${this.pkg}/${this.version}/${this.path}`);
    const headers = { ...this.uploadHeaders(type), ...extraHeaders };
    this.log.trace(`${this.toString()} upload: ${url.toString()} ${JSON.stringify(Object.keys(headers))}`);

    const response = await this.client.put(url, { headers, body });
    if (!response.ok) {
      throw await readApiError(response, "UploadContent", this.toString(), { log: this.log });
    }
    const text = await response.text();
    if (text) {
      try {
        reportWarning(JSON.parse(text), `UploadContent(${this.toString()})`, this.log);
      } catch {
        this.log.debug(`UploadContent(${this.toString()}): non-JSON response ignored`);
      }
    }
    return this;
  }

  uploadFromBytes(data: Uint8Array): Promise<this> {
    return this.upload(data);
  }

  async uploadFromFile(path: string): Promise<this> {
    const stats = await fs.stat(path);
    return this.upload(fs.createReadStream(path), { "content-length": String(stats.size) });
  }

  /** GETs the file from the download server; the caller consumes the body. */
  async download(): Promise<Response> {
    const url = this.downloadUrl;
    this.log.trace(`${this.toString()} download: ${url.toString()}`);
    const response = await this.client.get(url, { headers: { accept: "*/*" } });
    if (!response.ok) {
      throw await readApiError(response, "DownloadContent", this.toString(), { log: this.log });
    }
    return response;
  }

  /** Streams the file to `target` and returns the number of bytes written. */
  async downloadToFile(target: string): Promise<number> {
    const response = await this.download();
    let written = 0;
    const source = response.body ? Readable.fromWeb(response.body) : Readable.from([]);
    try {
      await pipeline(
        source,
        async function* (chunks: AsyncIterable<Buffer>) {
          for await (const chunk of chunks) {
            written += chunk.byteLength;
            yield chunk;
          }
        },
        fs.createWriteStream(target)
      );
    } catch (error) {
      this.log.debug(`${this.toString()} download: removing partial ${target}`);
      await fs.remove(target);
      throw error;
    }
    return written;
  }

  /**
   * HEADs the download URL. With a known sha256 the file only counts as
   * present when Bintray reports the same digest; otherwise the reported
   * digest is remembered.
   */
  async exists(): Promise<boolean> {
    const response = await this.client.head(this.downloadUrl);
    if (response.ok) {
      const reported = checksumFromResponse(response.headers);
      if (this.checksum.sha256) return sameChecksum(reported, this.checksum.sha256);
      this.checksum.sha256 = reported;
      return true;
    }
    if (isNotYetThere(response.status)) {
      this.log.info(`${this.toString()} exists: ${defaultStatusMessage(response.status)} (${response.status})`);
      return false;
    }
    throw unexpectedStatus(response.status);
  }

  async waitForAvailability(options: WaitForAvailabilityOptions): Promise<this> {
    const url = this.downloadUrl;
    const known = this.checksum.sha256;
    const label = `${this.toString()} availability`;

    const reported = await waitForCondition(
      async (signal): Promise<ProbeResult<Uint8Array | undefined>> => {
        const response = await this.poll("HEAD", url, signal, label);
        this.log.trace(`${label}: ${response.status}`);
        if (response.ok) {
          const checksum = checksumFromResponse(response.headers);
          if (known === undefined || sameChecksum(checksum, known)) return done(checksum);
          return TRY_AGAIN;
        }
        if (isNotYetThere(response.status)) return TRY_AGAIN;
        throw new BintrayError("content-not-available", `${label}: unexpected status ${response.status}`, {
          status: response.status,
        });
      },
      {
        timeoutMs: options.timeoutMs,
        intervalMs: options.intervalMs ?? AVAILABILITY_INTERVAL_MS,
        label,
        log: this.log,
      }
    );

    if (reported === undefined) {
      throw new BintrayError(
        "content-checksum-not-returned",
        `${label}: Bintray did not return the ${CHECKSUM_HEADER} header`
      );
    }
    this.checksum.sha256 = reported;
    return this;
  }

  async waitForIndexation(options: WaitForIndexationOptions): Promise<this> {
    const type = await this.getRepositoryType();
    if (!isIndexedRepositoryType(type)) {
      throw new BintrayError(
        "only-for-indexed-packages",
        `${this.toString()}: indexation only happens in Debian and RPM repositories (got ${type})`
      );
    }
    const intervalMs = options.intervalMs ?? INDEXATION_INTERVAL_MS;
    const deadline = Date.now() + options.timeoutMs;

    if (type === "debian") {
      await this.waitForDebianIndexation(deadline, intervalMs);
    } else {
      await this.waitForRpmIndexation(deadline, intervalMs);
    }
    return this;
  }

  private async waitForDebianIndexation(deadline: number, intervalMs: number): Promise<void> {
    const sha256 = this.checksum.sha256;
    if (!sha256) {
      throw new BintrayError("content-checksum-required", `${this.toString()}: a sha256 checksum is required`);
    }
    const expectedLine = `SHA256: ${checksumToHex(sha256)}`;

    for (const distribution of this.debianDistributions) {
      for (const component of this.debianComponents) {
        for (const architecture of this.debianArchitectures) {
          const url = this.client.dlUrl(
            `/${this.subject}/${this.repository}/dists/${distribution}/${component}/binary-${architecture}/Packages`
          );
          const label = `${this.toString()} indexation in ${distribution}/${component}/${architecture}`;
          await waitForCondition(
            async (signal): Promise<ProbeResult<true>> => {
              const response = await this.poll("GET", url, signal, label);
              this.log.trace(`${label}: ${response.status}`);
              if (response.ok) {
                const packages = await response.text();
                return packages.split(/\r?\n/).some(line => line === expectedLine) ? done(true) : TRY_AGAIN;
              }
              await discard(response);
              if (isNotYetThere(response.status)) return TRY_AGAIN;
              throw new BintrayError("content-not-available", `${label}: unexpected status ${response.status}`, {
                status: response.status,
              });
            },
            { timeoutMs: Math.max(0, deadline - Date.now()), intervalMs, label, log: this.log }
          );
        }
      }
    }
  }

  private async waitForRpmIndexation(deadline: number, intervalMs: number): Promise<void> {
    const sha1 = this.checksum.sha1;
    if (!sha1) {
      throw new BintrayError("content-checksum-required", `${this.toString()}: a sha1 checksum is required`);
    }
    const expected = checksumToHex(sha1);

    const repository = await this.client.subject(this.subject).repository(this.repository).get();
    const depth = repository.yumMetadataDepth ?? 0;
    const components = this.path.split("/");
    const root =
      depth > 0
        ? `/${this.subject}/${this.repository}/${components.slice(0, depth).join("/")}/`
        : `/${this.subject}/${this.repository}/`;
    const repodataUrl = this.client.dlUrl(root);
    const repomdUrl = new URL("repodata/repomd.xml", repodataUrl);
    const filename = basename(this.path);
    const label = `${this.toString()} indexation`;

    await waitForCondition(
      async (signal): Promise<ProbeResult<true>> => {
        const response = await this.poll("GET", repomdUrl, signal, label);
        this.log.trace(`${label}: repomd.xml ${response.status}`);
        if (!response.ok) {
          await discard(response);
          if (isNotYetThere(response.status)) return TRY_AGAIN;
          throw new BintrayError("content-not-available", `${label}: unexpected status ${response.status}`, {
            status: response.status,
          });
        }

        const primary = parseRepomd(await response.text()).find(entry => entry.type === "primary");
        if (!primary) return TRY_AGAIN;
        const primaryUrl = new URL(primary.href, repodataUrl);

        const packages = await this.fetchPrimary(primaryUrl, signal, label);
        if (!packages) return TRY_AGAIN;

        const match = packages.find(pkg => rpmPackageFilename(pkg) === filename);
        if (!match) return TRY_AGAIN;
        this.log.trace(`${label}: ${filename} listed with ${match.checksumType} ${match.checksum}`);
        if (!RPM_SHA1_TYPES.has(match.checksumType)) {
          throw new BintrayError(
            "rpm-repo-checksum-unsupported",
            `${label}: repository metadata uses ${match.checksumType} checksums`
          );
        }
        return match.checksum.toLowerCase() === expected ? done(true) : TRY_AGAIN;
      },
      { timeoutMs: Math.max(0, deadline - Date.now()), intervalMs, label, log: this.log }
    );
  }

  /** A request made while waiting; a transport failure ends the wait as `content-not-available`. */
  private async poll(method: HttpMethod, url: URL, signal: AbortSignal, label: string): Promise<Response> {
    try {
      return await this.client.request(method, url, { signal, headers: { accept: "*/*" } });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new BintrayError("content-not-available", `${label}: request to ${url.toString()} failed`, {
        cause: error,
      });
    }
  }

  /** Fetches and unpacks the primary metadata; `undefined` means try again later. */
  private async fetchPrimary(url: URL, signal: AbortSignal, label: string): Promise<PrimaryPackage[] | undefined> {
    let response: Response;
    try {
      response = await this.client.get(url, { signal, headers: { accept: "*/*" } });
    } catch (error) {
      if (signal.aborted) throw error;
      this.log.debug(`${label}: fetching ${url.toString()} failed: ${String(error)}`);
      return undefined;
    }
    if (!response.ok) {
      this.log.debug(`${label}: ${url.toString()} answered ${response.status}`);
      await discard(response);
      return undefined;
    }
    let xml: string;
    try {
      const compressed = new Uint8Array(await response.arrayBuffer());
      xml = url.pathname.endsWith(".gz")
        ? (await gunzipAsync(compressed)).toString("utf8")
        : Buffer.from(compressed).toString("utf8");
    } catch (error) {
      if (signal.aborted) throw error;
      // Bintray may serve a primary file that is still being written.
      this.log.debug(`${label}: unpacking ${url.toString()} failed: ${String(error)}`);
      return undefined;
    }
    return parsePrimary(xml);
  }

  async delete(): Promise<void> {
    const response = await this.client.delete(
      this.client.apiUrl(`/content/${this.subject}/${this.repository}/${this.path}`)
    );
    if (!response.ok) {
      throw await readApiError(response, "DeleteContent", this.toString(), { log: this.log });
    }
    await discard(response);
  }

  toString(): string {
    return `bintray::Content(${this.subject}:${this.repository}:${this.pkg}:${this.version}:${this.path})`;
  }
}
