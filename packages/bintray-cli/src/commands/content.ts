import path from "node:path";

import { checksumToHex, isIndexedRepositoryType, type Content } from "@bintray-kit/client";
import { Command, Option } from "clipanion";

import { parseVersion } from "../coordinates.js";
import { ApiCommand } from "./base.js";
import { parseCount } from "./repository.js";

abstract class ContentCommand extends ApiCommand {
  coordinates = Option.String();

  protected async content(remotePath: string): Promise<Content> {
    const coords = parseVersion(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    return client
      .subject(coords.subject)
      .repository(coords.repository)
      .package(coords.package)
      .version(coords.version)
      .file(remotePath);
  }
}

export class ContentUploadCommand extends ContentCommand {
  static paths = [["content", "upload"]];

  static usage = Command.Usage({
    description: "Upload a file to a version",
    details: `
      With \`--wait\`, the command polls the download server until the file is served with the
      uploaded checksum, then (for Debian and RPM repositories) until the repository metadata lists it.
      Both waits share the given number of seconds.
    `,
    examples: [
      [
        "Upload and publish a Debian package",
        "$0 content upload acme/deb-repo/myapp/1.0 ./myapp_1.0_all.deb pool/main/m/myapp_1.0_all.deb --publish --deb-distribution focal --deb-component main --deb-architecture all",
      ],
    ],
  });

  localFile = Option.String();

  remotePath = Option.String();

  publish = Option.Boolean("--publish");

  override = Option.Boolean("--override");

  explode = Option.Boolean("--explode");

  debDistributions = Option.Array("--deb-distribution", []);

  debComponents = Option.Array("--deb-component", []);

  debArchitectures = Option.Array("--deb-architecture", []);

  wait = Option.String("--wait", { description: "Seconds to wait for availability and indexation" });

  protected async run(): Promise<number> {
    const waitSecs = parseCount("--wait", this.wait);
    const content = await this.content(this.remotePath);
    await content.setChecksumFromFile(this.localFile);
    if (this.publish !== undefined) content.setPublish(this.publish);
    if (this.override !== undefined) content.setOverride(this.override);
    if (this.explode !== undefined) content.setExplode(this.explode);
    content
      .setDebianDistributions(this.debDistributions)
      .setDebianComponents(this.debComponents)
      .setDebianArchitectures(this.debArchitectures);

    await content.uploadFromFile(this.localFile);

    if (waitSecs !== undefined) {
      const deadline = Date.now() + waitSecs * 1_000;
      await content.waitForAvailability({ timeoutMs: waitSecs * 1_000 });
      if (isIndexedRepositoryType(await content.getRepositoryType())) {
        await content.waitForIndexation({ timeoutMs: Math.max(0, deadline - Date.now()) });
      }
    }

    const { sha1, sha256 } = content.getChecksum();
    this.done(`Uploaded ${path.basename(this.localFile)} to ${content.path}`, {
      path: content.path,
      sha1: sha1 && checksumToHex(sha1),
      sha256: sha256 && checksumToHex(sha256),
    });
    return 0;
  }
}

export class ContentDownloadCommand extends ContentCommand {
  static paths = [["content", "download"]];

  static usage = Command.Usage({ description: "Download a file of a version" });

  remotePath = Option.String();

  localFile = Option.String();

  protected async run(): Promise<number> {
    const content = await this.content(this.remotePath);
    const bytes = await content.downloadToFile(this.localFile);
    this.done(`Downloaded ${content.path} (${bytes} bytes)`, { path: content.path, file: this.localFile, bytes });
    return 0;
  }
}

export class ContentDeleteCommand extends ContentCommand {
  static paths = [["content", "delete"]];

  static usage = Command.Usage({ description: "Delete a file from a repository" });

  remotePath = Option.String();

  protected async run(): Promise<number> {
    const content = await this.content(this.remotePath);
    await content.delete();
    this.done(`Deleted ${content.path}`, { deleted: content.path });
    return 0;
  }
}
