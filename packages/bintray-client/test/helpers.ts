import { MockAgent } from "undici";

import { BintrayClient, type Logger, type LogLevel } from "../src/index.js";

export const API_ORIGIN = "https://api.bintray.com";
export const DL_ORIGIN = "https://dl.bintray.com";

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  log(level: LogLevel, scope: string, message: string): void {
    this.entries.push({ level, scope, message });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(entry => entry.level === level).map(entry => entry.message);
  }
}

export function createMockClient() {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const logger = new RecordingLogger();
  const client = new BintrayClient({ dispatcher: agent, logger }).user("test-user", "test-secret");
  return {
    agent,
    logger,
    client,
    api: agent.get(API_ORIGIN),
    dl: agent.get(DL_ORIGIN),
  };
}

export const AUTHORIZATION = `Basic ${Buffer.from("test-user:test-secret").toString("base64")}`;
