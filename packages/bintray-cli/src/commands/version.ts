import type { Version } from "@bintray-kit/client";
import { Command, Option, UsageError } from "clipanion";

import { parseVersion } from "../coordinates.js";
import { describeVersion } from "../format.js";
import { ApiCommand } from "./base.js";
import { parseCount } from "./repository.js";

abstract class VersionCommand extends ApiCommand {
  coordinates = Option.String();

  protected async version(): Promise<Version> {
    const coords = parseVersion(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    return client
      .subject(coords.subject)
      .repository(coords.repository)
      .package(coords.package)
      .version(coords.version);
  }

  protected get label(): string {
    return this.coordinates;
  }
}

export class VersionGetCommand extends VersionCommand {
  static paths = [["version", "get"]];

  static usage = Command.Usage({ description: "Show a version" });

  protected async run(): Promise<number> {
    const version = await (await this.version()).get();
    this.printFields(describeVersion(version));
    return 0;
  }
}

export class VersionCreateCommand extends VersionCommand {
  static paths = [["version", "create"]];

  static usage = Command.Usage({
    description: "Create a version",
    examples: [["Create a tagged version", "$0 version create acme/generic-repo/myapp/1.0 --vcs-tag v1.0"]],
  });

  desc = Option.String("--desc");

  labels = Option.Array("--label", []);

  released = Option.String("--released", { description: "Release date (ISO 8601); Bintray uses today otherwise" });

  vcsTag = Option.String("--vcs-tag");

  protected async run(): Promise<number> {
    const released = this.released === undefined ? undefined : new Date(this.released);
    if (released && Number.isNaN(released.getTime())) {
      throw new UsageError(`--released expects an ISO 8601 date, got "${this.released}"`);
    }
    const version = (await this.version()).setLabels(this.labels);
    if (this.desc !== undefined) version.setDesc(this.desc);
    if (released) version.setReleased(released);
    if (this.vcsTag !== undefined) version.setVcsTag(this.vcsTag);
    await version.create();
    this.done(`Created ${this.label}`, describeVersion(version));
    return 0;
  }
}

export class VersionDeleteCommand extends VersionCommand {
  static paths = [["version", "delete"]];

  static usage = Command.Usage({ description: "Delete a version and its files" });

  protected async run(): Promise<number> {
    await (await this.version()).delete();
    this.done(`Deleted ${this.label}`, { deleted: this.label });
    return 0;
  }
}

export class VersionPublishCommand extends VersionCommand {
  static paths = [["version", "publish"]];

  static usage = Command.Usage({
    description: "Publish (or discard) the unpublished files of a version",
  });

  discard = Option.Boolean("--discard", false);

  waitFor = Option.String("--wait-for", { description: "Seconds Bintray may take before answering" });

  protected async run(): Promise<number> {
    const waitForSecs = parseCount("--wait-for", this.waitFor);
    const files = await (await this.version()).publish({ discard: this.discard || undefined, waitForSecs });
    const verb = this.discard ? "Discarded" : "Published";
    this.done(`${verb} ${files} file(s) of ${this.label}`, { files, discarded: this.discard });
    return 0;
  }
}
