import { Builtins, Cli } from "clipanion";

import type { BintrayContext } from "./commands/base.js";
import { ConfigSetCommand, ConfigShowCommand } from "./commands/config.js";
import { ContentDeleteCommand, ContentDownloadCommand, ContentUploadCommand } from "./commands/content.js";
import { PackageCreateCommand, PackageDeleteCommand, PackageGetCommand } from "./commands/package.js";
import {
  PackagesListCommand,
  RepoCreateCommand,
  RepoDeleteCommand,
  RepoGetCommand,
  ReposListCommand,
} from "./commands/repository.js";
import { RpmSpecInspectCommand } from "./commands/rpm-spec.js";
import {
  VersionCreateCommand,
  VersionDeleteCommand,
  VersionGetCommand,
  VersionPublishCommand,
} from "./commands/version.js";

export const CLI_VERSION = "0.1.0";

export function createCli(): Cli<BintrayContext> {
  const cli = new Cli<BintrayContext>({
    binaryLabel: "Bintray toolkit",
    binaryName: "bintray",
    binaryVersion: CLI_VERSION,
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);
  cli.register(ReposListCommand);
  cli.register(RepoGetCommand);
  cli.register(RepoCreateCommand);
  cli.register(RepoDeleteCommand);
  cli.register(PackagesListCommand);
  cli.register(PackageGetCommand);
  cli.register(PackageCreateCommand);
  cli.register(PackageDeleteCommand);
  cli.register(VersionGetCommand);
  cli.register(VersionCreateCommand);
  cli.register(VersionDeleteCommand);
  cli.register(VersionPublishCommand);
  cli.register(ContentUploadCommand);
  cli.register(ContentDownloadCommand);
  cli.register(ContentDeleteCommand);
  cli.register(ConfigSetCommand);
  cli.register(ConfigShowCommand);
  cli.register(RpmSpecInspectCommand);
  return cli;
}

export type { BintrayContext } from "./commands/base.js";
export { configPath, loadConfig, maskSecret, resolveCredentials, saveConfig, type CliConfig } from "./config.js";
export { applyDescriptor, loadDescriptor, type PackageDescriptor } from "./descriptor.js";
export { parsePackage, parseRepository, parseSubject, parseVersion } from "./coordinates.js";
