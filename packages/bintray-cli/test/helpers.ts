import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable, Writable } from "node:stream";

import { MockAgent } from "undici";

import { createCli, type BintrayContext } from "../src/index.js";

export const API_ORIGIN = "https://api.bintray.com";
export const DL_ORIGIN = "https://dl.bintray.com";

export function basicAuth(user: string, apiKey: string): string {
  return `Basic ${Buffer.from(`${user}:${apiKey}`).toString("base64")}`;
}

function capture() {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => text };
}

export interface Harness {
  agent: MockAgent;
  dir: string;
  configFile: string;
  run(args: string[], env?: Record<string, string>): Promise<{ code: number; stdout: string; stderr: string }>;
  close(): Promise<void>;
}

/** A CLI wired to a MockAgent and a configuration file in a fresh temp directory. */
export async function createHarness(): Promise<Harness> {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const dir = await mkdtemp(join(tmpdir(), "bintray-cli-"));
  const configFile = join(dir, "config.json");

  return {
    agent,
    dir,
    configFile,
    async run(args, env = {}) {
      const stdout = capture();
      const stderr = capture();
      const context: BintrayContext = {
        env: { BINTRAY_CONFIG: configFile, BINTRAY_LOG: "error", ...env },
        stdin: Readable.from([]),
        stdout: stdout.stream,
        stderr: stderr.stream,
        colorDepth: 1,
        dispatcher: agent,
      };
      const code = await createCli().run(args, context);
      return { code, stdout: stdout.text(), stderr: stderr.text() };
    },
    async close() {
      await agent.close();
      await rm(dir, { recursive: true, force: true });
    },
  };
}
