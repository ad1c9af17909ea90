import { Command, Option, UsageError } from "clipanion";

import { maskSecret, saveConfig, type CliConfig } from "../config.js";
import { BintrayCommand } from "./base.js";

export class ConfigSetCommand extends BintrayCommand {
  static paths = [["config", "set"]];

  static usage = Command.Usage({
    description: "Store credentials and defaults",
    details: `
      Values are merged into the configuration file (\`BINTRAY_CONFIG\` overrides its location).
      \`BINTRAY_USERNAME\` and \`BINTRAY_API_KEY\` still take precedence over stored credentials.
    `,
    examples: [["Store credentials", "$0 config set --user jdoe --api-key <key> --subject acme"]],
  });

  user = Option.String("--user");

  apiKey = Option.String("--api-key");

  subject = Option.String("--subject", { description: "Subject used when coordinates leave it out" });

  apiUrl = Option.String("--api-url");

  dlUrl = Option.String("--dl-url");

  protected async run(): Promise<number> {
    const updates: CliConfig = {
      user: this.user,
      apiKey: this.apiKey,
      subject: this.subject,
      apiUrl: this.apiUrl,
      dlUrl: this.dlUrl,
    };
    const changed = Object.entries(updates).filter(([, value]) => value !== undefined);
    if (changed.length === 0) throw new UsageError("nothing to set");

    const file = this.configFile;
    const config: CliConfig = { ...(await this.loadConfig()), ...Object.fromEntries(changed) };
    await saveConfig(file, config);
    this.done(`Saved ${changed.map(([key]) => key).join(", ")} to ${file}`, { file });
    return 0;
  }
}

export class ConfigShowCommand extends BintrayCommand {
  static paths = [["config", "show"]];

  static usage = Command.Usage({ description: "Show the stored configuration (API key masked)" });

  protected async run(): Promise<number> {
    const config = await this.loadConfig();
    this.printFields({
      file: this.configFile,
      user: config.user,
      api_key: maskSecret(config.apiKey),
      subject: config.subject,
      api_url: config.apiUrl,
      dl_url: config.dlUrl,
    });
    return 0;
  }
}
