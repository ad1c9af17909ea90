import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createMockClient } from "./helpers.js";

const VERSIONS_PATH = "/packages/acme/generic-repo/myapp/versions";

function versionRecord(overrides: Record<string, unknown> = {}) {
  return {
    name: "1.0",
    package: "myapp",
    repo: "generic-repo",
    owner: "acme",
    desc: "First release",
    labels: ["stable", "beta"],
    released: "2018-07-26T00:00:00.000Z",
    vcs_tag: "v1.0",
    github_use_tag_release_notes: false,
    github_release_notes_file: null,
    published: false,
    created: "2018-07-26T10:00:00.000Z",
    updated: "2018-07-26T11:00:00.000Z",
    ...overrides,
  };
}

describe("Version", () => {
  let mock: ReturnType<typeof createMockClient>;

  beforeEach(() => {
    mock = createMockClient();
  });

  afterEach(async () => {
    await mock.agent.close();
  });

  const version = () => mock.client.subject("acme").repository("generic-repo").package("myapp").version("1.0");

  it("sends the release date when one is set", async () => {
    let sent: unknown;
    mock.api
      .intercept({
        path: VERSIONS_PATH,
        method: "POST",
        body: (body: string) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(201, versionRecord({ released: "2019-01-01T00:00:00.000Z" }));

    const created = await version()
      .setDesc("First release")
      .setReleased(new Date("2019-01-01T00:00:00.000Z"))
      .setVcsTag("v1.0")
      .create();

    expect(sent).toEqual({
      name: "1.0",
      desc: "First release",
      labels: [],
      github_use_tag_release_notes: false,
      released: "2019-01-01T00:00:00.000Z",
      vcs_tag: "v1.0",
    });
    expect(created.created?.toISOString()).toBe("2018-07-26T10:00:00.000Z");
  });

  it("takes the release date from Bintray when none is set", async () => {
    mock.api.intercept({ path: VERSIONS_PATH, method: "POST" }).reply(201, versionRecord());

    const created = await version().create();
    expect(created.released?.toISOString()).toBe("2018-07-26T00:00:00.000Z");
    expect(created.published).toBe(false);
  });

  it("reads attributes and reports warnings", async () => {
    mock.api
      .intercept({ path: `${VERSIONS_PATH}/1.0`, method: "GET" })
      .reply(200, versionRecord({ warn: "Version is about to expire" }));

    const fetched = await version().get();

    expect(fetched.labels).toEqual(["beta", "stable"]);
    expect(fetched.vcsTag).toBe("v1.0");
    expect(fetched.githubReleaseNotesFile).toBeUndefined();
    expect(mock.logger.messages("warn")).toEqual([
      "GetVersion(bintray::Version(acme:generic-repo:myapp:1.0)): Version is about to expire",
    ]);
  });

  it("publishes pending files", async () => {
    let sent: unknown;
    mock.api
      .intercept({
        path: "/content/acme/generic-repo/myapp/1.0/publish",
        method: "POST",
        body: (body: string) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(200, { files: 3 });

    const target = version();
    await expect(target.publish({ waitForSecs: 10 })).resolves.toBe(3);
    expect(sent).toEqual({ publish_wait_for_secs: 10 });
    expect(target.published).toBe(true);
  });

  it("updates, probes and deletes", async () => {
    mock.api.intercept({ path: `${VERSIONS_PATH}/1.0`, method: "PATCH" }).reply(200, { message: "success" });
    mock.api.intercept({ path: `${VERSIONS_PATH}/1.0`, method: "HEAD" }).reply(200, "");
    mock.api.intercept({ path: `${VERSIONS_PATH}/1.0`, method: "DELETE" }).reply(200, { message: "success" });

    const target = version();
    await target.setLabels(["x"]).update();
    await expect(target.exists()).resolves.toBe(true);
    await expect(target.delete()).resolves.toBeUndefined();
    mock.agent.assertNoPendingInterceptors();
  });

  it("creates content handles with a cleaned path", () => {
    const content = version().file("/./dist/myapp.tar.gz", "generic");
    expect(content.path).toBe("dist/myapp.tar.gz");
    expect(content.toString()).toBe("bintray::Content(acme:generic-repo:myapp:1.0:dist/myapp.tar.gz)");
  });
});
