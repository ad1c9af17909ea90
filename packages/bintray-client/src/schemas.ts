import { z } from "zod";

export const REPOSITORY_TYPES = [
  "debian",
  "docker",
  "generic",
  "maven",
  "npm",
  "nuget",
  "opkg",
  "rpm",
  "vagrant",
  "conan",
  "chef",
  "puppet",
] as const;

export type RepositoryType = (typeof REPOSITORY_TYPES)[number];

export const PACKAGE_MATURITIES = ["Official", "Stable", "Development", "Experimental", ""] as const;

export type PackageMaturity = (typeof PACKAGE_MATURITIES)[number];

// Bintray reports some Debian repositories as `deb`.
const rawRepositoryTypeSchema = z.enum([...REPOSITORY_TYPES, "deb"]);

function normalizeRepositoryType(type: z.infer<typeof rawRepositoryTypeSchema>): RepositoryType {
  return type === "deb" ? "debian" : type;
}

export const repositoryTypeSchema = rawRepositoryTypeSchema.transform(normalizeRepositoryType);

export const nameListSchema = z.array(z.object({ name: z.string() }));

export const repositorySchema = z.object({
  name: z.string(),
  owner: z.string(),
  type: repositoryTypeSchema.default("generic"),
  private: z.boolean().default(false),
  premium: z.boolean().default(false),
  desc: z.string().nullish(),
  labels: z.array(z.string()).nullish(),
  business_unit: z.string().nullish(),
  gpg_sign_metadata: z.boolean().default(false),
  gpg_sign_files: z.boolean().default(false),
  gpg_use_owner_key: z.boolean().default(false),
  default_debian_architecture: z.string().nullish(),
  default_debian_distribution: z.string().nullish(),
  default_debian_component: z.string().nullish(),
  yum_metadata_depth: z.number().int().nonnegative().nullish(),
  yum_groups_file: z.string().nullish(),
  created: z.string().nullish(),
  package_count: z.number().int().nonnegative().default(0),
});

export type RepositoryRecord = z.infer<typeof repositorySchema>;

export const createdSchema = z.object({
  created: z.string().nullish(),
  updated: z.string().nullish(),
});

export const packageSchema = z.object({
  name: z.string(),
  repo: z.string(),
  owner: z.string(),
  desc: z.string().nullish(),
  labels: z.array(z.string()).nullish(),
  licenses: z.array(z.string()).nullish(),
  website_url: z.string().nullish(),
  vcs_url: z.string().nullish(),
  issue_tracker_url: z.string().nullish(),
  github_repo: z.string().nullish(),
  github_release_notes_file: z.string().nullish(),
  maturity: z.enum(PACKAGE_MATURITIES).nullish(),
  created: z.string().nullish(),
  updated: z.string().nullish(),
  versions: z.array(z.string()).nullish(),
});

export type PackageRecord = z.infer<typeof packageSchema>;

export const versionSchema = z.object({
  name: z.string(),
  package: z.string(),
  repo: z.string(),
  owner: z.string(),
  desc: z.string().nullish(),
  labels: z.array(z.string()).nullish(),
  released: z.string().nullish(),
  vcs_tag: z.string().nullish(),
  github_use_tag_release_notes: z.boolean().nullish(),
  github_release_notes_file: z.string().nullish(),
  published: z.boolean().nullish(),
  created: z.string().nullish(),
  updated: z.string().nullish(),
});

export type VersionRecord = z.infer<typeof versionSchema>;

export const publishSchema = z.object({ files: z.number().int().nonnegative() });

export function parseDate(value: string | null | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function sorted(values: readonly string[] | null | undefined): string[] {
  return [...(values ?? [])].sort();
}
