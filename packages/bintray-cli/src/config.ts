import path from "node:path";

import envPaths from "env-paths";
import fs from "fs-extra";
import { z } from "zod";

export const CONFIG_FILE_MODE = 0o600;

const configSchema = z
  .object({
    user: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    subject: z.string().min(1).optional(),
    apiUrl: z.string().url().optional(),
    dlUrl: z.string().url().optional(),
  })
  .strict();

export type CliConfig = z.infer<typeof configSchema>;

export type Environment = Record<string, string | undefined>;

export function configPath(env: Environment): string {
  const override = env.BINTRAY_CONFIG?.trim();
  if (override) return path.resolve(override);
  return path.join(envPaths("bintray-kit", { suffix: "" }).config, "config.json");
}

export async function loadConfig(file: string): Promise<CliConfig> {
  if (!(await fs.pathExists(file))) return {};
  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    throw new Error(`${file}: not valid JSON`, { cause: error });
  }
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`${file}: invalid configuration (${issues.join("; ")})`);
  }
  return parsed.data;
}

export async function saveConfig(file: string, config: CliConfig): Promise<void> {
  await fs.ensureDir(path.dirname(file));
  await fs.writeJson(file, configSchema.parse(config), { spaces: 2, mode: CONFIG_FILE_MODE });
  // writeJson only applies the mode to new files.
  await fs.chmod(file, CONFIG_FILE_MODE);
}

export interface Credentials {
  user?: string;
  apiKey?: string;
}

/** Command-line values win over the environment, which wins over the stored file. */
export function resolveCredentials(config: CliConfig, env: Environment, options: Credentials): Credentials {
  return {
    user: options.user ?? env.BINTRAY_USERNAME ?? config.user,
    apiKey: options.apiKey ?? env.BINTRAY_API_KEY ?? config.apiKey,
  };
}

export function maskSecret(secret: string | undefined): string {
  if (!secret) return "(not set)";
  if (secret.length <= 4) return "****";
  return `${"*".repeat(secret.length - 4)}${secret.slice(-4)}`;
}
