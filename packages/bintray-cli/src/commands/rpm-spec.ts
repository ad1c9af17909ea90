import { parseRpmSpec } from "@bintray-kit/rpm-spec";
import { Command, Option } from "clipanion";
import fs from "fs-extra";

import { describeRpmSpec } from "../format.js";
import { BintrayCommand } from "./base.js";

export class RpmSpecInspectCommand extends BintrayCommand {
  static paths = [["rpm-spec", "inspect"]];

  static usage = Command.Usage({
    description: "Parse an RPM .spec file and print what it declares",
    examples: [["Inspect a spec file", "$0 rpm-spec inspect ./myapp.spec --json"]],
  });

  file = Option.String();

  protected async run(): Promise<number> {
    const spec = parseRpmSpec(await fs.readFile(this.file, "utf8"));
    if (this.json) {
      this.write(JSON.stringify(spec, null, 2));
      return 0;
    }
    this.printFields(describeRpmSpec(spec));
    return 0;
  }
}
