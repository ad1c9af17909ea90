import path from "node:path";

import { PACKAGE_MATURITIES } from "@bintray-kit/client";
import { Command, Option, UsageError } from "clipanion";
import fs from "fs-extra";
import { z } from "zod";

import { parsePackage } from "../coordinates.js";
import { applyDescriptor, DESCRIPTOR_FILE, loadDescriptor } from "../descriptor.js";
import { describePackage } from "../format.js";
import { ApiCommand } from "./base.js";

const maturitySchema = z.enum(PACKAGE_MATURITIES);

export class PackageGetCommand extends ApiCommand {
  static paths = [["package", "get"]];

  static usage = Command.Usage({ description: "Show a package and its versions" });

  coordinates = Option.String();

  protected async run(): Promise<number> {
    const coords = parsePackage(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    const pkg = await client.subject(coords.subject).repository(coords.repository).package(coords.package).get();
    this.printFields(describePackage(pkg));
    return 0;
  }
}

export class PackageCreateCommand extends ApiCommand {
  static paths = [["package", "create"]];

  static usage = Command.Usage({
    description: "Create a package",
    details: `
      Metadata is read from \`${DESCRIPTOR_FILE}\` in the working directory (or the file given with
      \`--descriptor\`) when present. Options given on the command line take precedence.
    `,
    examples: [["Create a package", "$0 package create acme/generic-repo/myapp --license MIT --vcs-url https://example.com/myapp.git"]],
  });

  coordinates = Option.String();

  descriptor = Option.String("--descriptor", { description: `Package descriptor (default ./${DESCRIPTOR_FILE})` });

  desc = Option.String("--desc");

  licenses = Option.Array("--license");

  labels = Option.Array("--label");

  vcsUrl = Option.String("--vcs-url");

  websiteUrl = Option.String("--website-url");

  maturity = Option.String("--maturity", { description: PACKAGE_MATURITIES.filter(Boolean).join(", ") });

  private async descriptorFile(): Promise<string | undefined> {
    if (this.descriptor !== undefined) return path.resolve(this.descriptor);
    const fallback = path.resolve(DESCRIPTOR_FILE);
    return (await fs.pathExists(fallback)) ? fallback : undefined;
  }

  protected async run(): Promise<number> {
    const maturity = this.maturity === undefined ? undefined : maturitySchema.safeParse(this.maturity);
    if (maturity && !maturity.success) {
      throw new UsageError(`--maturity must be one of ${PACKAGE_MATURITIES.filter(Boolean).join(", ")}`);
    }
    const coords = parsePackage(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    const pkg = client.subject(coords.subject).repository(coords.repository).package(coords.package);

    const file = await this.descriptorFile();
    if (file !== undefined) {
      const descriptor = await loadDescriptor(file);
      if (descriptor.name !== undefined && descriptor.name !== coords.package) {
        throw new Error(`${path.basename(file)} describes ${descriptor.name}, not ${coords.package}`);
      }
      applyDescriptor(pkg, descriptor);
    }
    if (this.desc !== undefined) pkg.setDesc(this.desc);
    if (this.licenses !== undefined) pkg.setLicenses(this.licenses);
    if (this.labels !== undefined) pkg.setLabels(this.labels);
    if (this.vcsUrl !== undefined) pkg.setVcsUrl(this.vcsUrl);
    if (this.websiteUrl !== undefined) pkg.setWebsiteUrl(this.websiteUrl);
    if (maturity?.success) pkg.setMaturity(maturity.data);
    await pkg.create();

    const name = `${coords.subject}/${coords.repository}/${coords.package}`;
    this.done(`Created ${name}`, { name: pkg.name, repo: pkg.repository, owner: pkg.subject, created: pkg.created });
    return 0;
  }
}

export class PackageDeleteCommand extends ApiCommand {
  static paths = [["package", "delete"]];

  static usage = Command.Usage({ description: "Delete a package and its versions" });

  coordinates = Option.String();

  protected async run(): Promise<number> {
    const coords = parsePackage(this.coordinates, await this.defaultSubject());
    const client = await this.createClient();
    await client.subject(coords.subject).repository(coords.repository).package(coords.package).delete();
    const name = `${coords.subject}/${coords.repository}/${coords.package}`;
    this.done(`Deleted ${name}`, { deleted: name });
    return 0;
  }
}
