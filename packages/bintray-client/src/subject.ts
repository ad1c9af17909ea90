import type { BintrayClient } from "./client.js";
import { parseBody, readApiError } from "./errors.js";
import { scopedLogger } from "./logger.js";
import { Repository } from "./repository.js";
import { nameListSchema } from "./schemas.js";

/** A Bintray user or organization. */
export class Subject {
  constructor(
    private readonly client: BintrayClient,
    readonly name: string
  ) {}

  async repositoryNames(): Promise<string[]> {
    const log = scopedLogger(this.client.logger, "subject");
    const response = await this.client.get(this.client.apiUrl(`/repos/${this.name}`));
    if (!response.ok) {
      throw await readApiError(response, "ListRepositories", this.toString(), { log });
    }
    const entries = await parseBody(response, nameListSchema, `ListRepositories(${this.toString()})`, log);
    return entries.map(entry => entry.name).sort();
  }

  repository(name: string): Repository {
    return new Repository(this.client, this.name, name);
  }

  toString(): string {
    return `bintray::Subject(${this.name})`;
  }
}
