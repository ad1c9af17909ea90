import { REPOSITORY_TYPES } from "@bintray-kit/client";
import { Command, Option, UsageError } from "clipanion";
import { z } from "zod";

import { parseRepository, parseSubject } from "../coordinates.js";
import { describeRepository } from "../format.js";
import { ApiCommand } from "./base.js";

const repositoryTypeSchema = z.enum(REPOSITORY_TYPES);

export function parseCount(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new UsageError(`${flag} expects a non-negative integer, got "${value}"`);
  }
  return count;
}

export class ReposListCommand extends ApiCommand {
  static paths = [["repos", "list"]];

  static usage = Command.Usage({
    description: "List the repositories of a subject",
    examples: [["List acme's repositories", "$0 repos list acme"]],
  });

  subject = Option.String({ required: false });

  protected async run(): Promise<number> {
    const subject = parseSubject(this.subject, await this.defaultSubject());
    const client = await this.createClient();
    this.printList(await client.subject(subject).repositoryNames());
    return 0;
  }
}

export class RepoGetCommand extends ApiCommand {
  static paths = [["repo", "get"]];

  static usage = Command.Usage({ description: "Show a repository" });

  coordinates = Option.String();

  protected async run(): Promise<number> {
    const { subject, repository } = parseRepository(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    const repo = await client.subject(subject).repository(repository).get();
    this.printFields(describeRepository(repo));
    return 0;
  }
}

export class RepoCreateCommand extends ApiCommand {
  static paths = [["repo", "create"]];

  static usage = Command.Usage({
    description: "Create a repository",
    examples: [["Create an RPM repository", "$0 repo create acme/rpm-repo --type rpm --yum-depth 1"]],
  });

  coordinates = Option.String();

  type = Option.String("--type", "generic", { description: `One of ${REPOSITORY_TYPES.join(", ")}` });

  desc = Option.String("--desc");

  labels = Option.Array("--label", []);

  isPrivate = Option.Boolean("--private", false);

  yumDepth = Option.String("--yum-depth", { description: "Directory depth of YUM metadata" });

  protected async run(): Promise<number> {
    const type = repositoryTypeSchema.safeParse(this.type);
    if (!type.success) {
      throw new UsageError(`--type must be one of ${REPOSITORY_TYPES.join(", ")}`);
    }
    const yumDepth = parseCount("--yum-depth", this.yumDepth);
    const { subject, repository } = parseRepository(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();

    const repo = client
      .subject(subject)
      .repository(repository)
      .setType(type.data)
      .setPrivate(this.isPrivate)
      .setLabels(this.labels);
    if (this.desc !== undefined) repo.setDesc(this.desc);
    if (yumDepth !== undefined) repo.setYumMetadataDepth(yumDepth);
    await repo.create();

    this.done(`Created ${subject}/${repository}`, describeRepository(repo));
    return 0;
  }
}

export class RepoDeleteCommand extends ApiCommand {
  static paths = [["repo", "delete"]];

  static usage = Command.Usage({ description: "Delete a repository and everything in it" });

  coordinates = Option.String();

  protected async run(): Promise<number> {
    const { subject, repository } = parseRepository(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    await client.subject(subject).repository(repository).delete();
    this.done(`Deleted ${subject}/${repository}`, { deleted: `${subject}/${repository}` });
    return 0;
  }
}

export class PackagesListCommand extends ApiCommand {
  static paths = [["packages", "list"]];

  static usage = Command.Usage({ description: "List the packages of a repository" });

  coordinates = Option.String();

  protected async run(): Promise<number> {
    const { subject, repository } = parseRepository(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    this.printList(await client.subject(subject).repository(repository).packageNames());
    return 0;
  }
}
