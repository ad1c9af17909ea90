import path from "node:path";

import { PACKAGE_MATURITIES, type Package } from "@bintray-kit/client";
import fs from "fs-extra";
import { parse } from "yaml";
import { z } from "zod";

export const DESCRIPTOR_FILE = ".bintray.yaml";

const descriptorSchema = z.object({
  name: z.string().optional(),
  desc: z.string().optional(),
  licenses: z.array(z.string()).optional(),
  labels: z.array(z.string()).optional(),
  website_url: z.string().optional(),
  vcs_url: z.string().optional(),
  issue_tracker_url: z.string().optional(),
  github_repo: z.string().optional(),
  github_release_notes_file: z.string().optional(),
  maturity: z.enum(PACKAGE_MATURITIES).optional(),
});

/** Package metadata kept beside the project in `.bintray.yaml`. */
export type PackageDescriptor = z.infer<typeof descriptorSchema>;

export async function loadDescriptor(file: string): Promise<PackageDescriptor> {
  const text = await fs.readFile(file, "utf8");
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new Error(`${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
  const parsed = descriptorSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`${path.basename(file)}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function applyDescriptor(pkg: Package, descriptor: PackageDescriptor): Package {
  if (descriptor.desc !== undefined) pkg.setDesc(descriptor.desc);
  if (descriptor.licenses !== undefined) pkg.setLicenses(descriptor.licenses);
  if (descriptor.labels !== undefined) pkg.setLabels(descriptor.labels);
  if (descriptor.website_url !== undefined) pkg.setWebsiteUrl(descriptor.website_url);
  if (descriptor.vcs_url !== undefined) pkg.setVcsUrl(descriptor.vcs_url);
  if (descriptor.issue_tracker_url !== undefined) pkg.setIssueTrackerUrl(descriptor.issue_tracker_url);
  if (descriptor.github_repo !== undefined) pkg.setGithubRepo(descriptor.github_repo);
  if (descriptor.github_release_notes_file !== undefined) {
    pkg.setGithubReleaseNotesFile(descriptor.github_release_notes_file);
  }
  if (descriptor.maturity !== undefined) pkg.setMaturity(descriptor.maturity);
  return pkg;
}
