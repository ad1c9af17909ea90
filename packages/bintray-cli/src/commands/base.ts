import { BintrayClient, createConsoleLogger, parseLogLevel } from "@bintray-kit/client";
import chalk from "chalk";
import { Command, Option, UsageError, type BaseContext } from "clipanion";
import type { Dispatcher } from "undici";

import { configPath, loadConfig, resolveCredentials, type CliConfig } from "../config.js";
import { formatRecord, toJson, type Fields } from "../format.js";

export interface BintrayContext extends BaseContext {
  /** undici dispatcher handed to every client; the global one when unset. */
  dispatcher?: Dispatcher;
}

export abstract class BintrayCommand extends Command<BintrayContext> {
  json = Option.Boolean("--json", false, { description: "Print machine-readable JSON" });

  protected abstract run(): Promise<number>;

  async execute(): Promise<number> {
    try {
      return await this.run();
    } catch (error) {
      if (error instanceof UsageError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      this.context.stderr.write(`${chalk.red("error:")} ${message}\n`);
      return 1;
    }
  }

  protected get configFile(): string {
    return configPath(this.context.env);
  }

  protected loadConfig(): Promise<CliConfig> {
    return loadConfig(this.configFile);
  }

  protected write(line = ""): void {
    this.context.stdout.write(`${line}\n`);
  }

  protected printList(values: readonly string[]): void {
    if (this.json) {
      this.write(JSON.stringify(values, null, 2));
      return;
    }
    for (const value of values) this.write(value);
  }

  protected printFields(fields: Fields): void {
    if (this.json) {
      this.write(JSON.stringify(toJson(fields), null, 2));
      return;
    }
    for (const line of formatRecord(fields)) this.write(line);
  }

  protected done(message: string, fields: Fields = {}): void {
    if (this.json) {
      this.write(JSON.stringify(toJson(fields), null, 2));
      return;
    }
    this.write(`${chalk.green("✔")} ${message}`);
  }
}

/** Commands that talk to Bintray. */
export abstract class ApiCommand extends BintrayCommand {
  user = Option.String("--user", { description: "Bintray user name" });

  apiKey = Option.String("--api-key", { description: "Bintray API key" });

  apiUrl = Option.String("--api-url", { description: "Base URL of the REST API" });

  dlUrl = Option.String("--dl-url", { description: "Base URL of the download server" });

  private config?: CliConfig;

  protected async settings(): Promise<CliConfig> {
    this.config ??= await this.loadConfig();
    return this.config;
  }

  protected async defaultSubject(): Promise<string | undefined> {
    return (await this.settings()).subject;
  }

  protected async createClient(): Promise<BintrayClient> {
    const config = await this.settings();
    const env = this.context.env;
    const client = new BintrayClient({
      apiBaseUrl: this.apiUrl ?? config.apiUrl,
      dlBaseUrl: this.dlUrl ?? config.dlUrl,
      dispatcher: this.context.dispatcher,
      logger: createConsoleLogger(parseLogLevel(env.BINTRAY_LOG)),
    });
    const { user, apiKey } = resolveCredentials(config, env, { user: this.user, apiKey: this.apiKey });
    if (user === undefined && apiKey === undefined) return client;
    if (user === undefined || apiKey === undefined) {
      throw new UsageError(`incomplete credentials: ${user === undefined ? "user" : "API key"} missing`);
    }
    return client.user(user, apiKey);
  }
}
