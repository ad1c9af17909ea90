import { readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { API_ORIGIN, basicAuth, createHarness, DL_ORIGIN, type Harness } from "./helpers.js";

const SPEC_FIXTURE = fileURLToPath(new URL("../../rpm-spec/test/fixtures/myapp.spec", import.meta.url));

describe("bintray CLI", () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = await createHarness();
  });

  afterEach(async () => {
    await harness.close();
  });

  const storeConfig = (config: Record<string, string>) => writeFile(harness.configFile, JSON.stringify(config));

  describe("credentials", () => {
    it("uses the stored credentials", async () => {
      await storeConfig({ user: "stored-user", apiKey: "test-secret" });
      harness.agent
        .get(API_ORIGIN)
        .intercept({
          path: "/repos/acme",
          method: "GET",
          headers: { authorization: basicAuth("stored-user", "test-secret") },
        })
        .reply(200, [{ name: "beta" }, { name: "alpha" }]);

      const result = await harness.run(["repos", "list", "acme", "--json"]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual(["alpha", "beta"]);
    });

    it("prefers options over the environment over the stored file", async () => {
      await storeConfig({ user: "stored-user", apiKey: "stored-secret" });
      harness.agent
        .get(API_ORIGIN)
        .intercept({
          path: "/repos/acme",
          method: "GET",
          headers: { authorization: basicAuth("cli-user", "env-secret") },
        })
        .reply(200, []);

      const result = await harness.run(["repos", "list", "acme", "--user", "cli-user"], {
        BINTRAY_USERNAME: "env-user",
        BINTRAY_API_KEY: "env-secret",
      });

      expect(result.code).toBe(0);
      expect(result.stdout).toBe("");
    });

    it("refuses a user without an API key", async () => {
      const result = await harness.run(["repos", "list", "acme", "--user", "someone"]);

      expect(result.code).toBe(1);
      expect(result.stdout + result.stderr).toContain("incomplete credentials: API key missing");
    });
  });

  describe("repositories", () => {
    it("fills in the configured subject", async () => {
      await storeConfig({ subject: "acme" });
      harness.agent
        .get(API_ORIGIN)
        .intercept({ path: "/repos/acme/generic-repo", method: "GET" })
        .reply(200, { name: "generic-repo", owner: "acme", type: "generic", package_count: 2 });

      const result = await harness.run(["repo", "get", "generic-repo", "--json"]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({
        name: "generic-repo",
        owner: "acme",
        type: "generic",
        private: false,
        package_count: 2,
      });
    });

    it("creates a repository from the options", async () => {
      let sent: unknown;
      harness.agent
        .get(API_ORIGIN)
        .intercept({
          path: "/repos/acme/rpm-repo",
          method: "POST",
          body: (body: string) => {
            sent = JSON.parse(body);
            return true;
          },
        })
        .reply(201, { name: "rpm-repo", owner: "acme", type: "rpm" });

      const result = await harness.run([
        "repo",
        "create",
        "acme/rpm-repo",
        "--type",
        "rpm",
        "--private",
        "--label",
        "el7",
        "--yum-depth",
        "1",
      ]);

      expect(result.code).toBe(0);
      expect(result.stdout).toContain("Created acme/rpm-repo");
      expect(sent).toMatchObject({ name: "rpm-repo", type: "rpm", private: true, labels: ["el7"], yum_metadata_depth: 1 });
    });

    it("rejects an unknown repository type", async () => {
      const result = await harness.run(["repo", "create", "acme/odd-repo", "--type", "tarball"]);

      expect(result.code).toBe(1);
      expect(result.stdout + result.stderr).toContain("--type must be one of");
    });

    it("reports API errors on stderr", async () => {
      harness.agent
        .get(API_ORIGIN)
        .intercept({ path: "/repos/acme/missing", method: "GET" })
        .reply(404, { message: "Repo 'missing' was not found" });

      const result = await harness.run(["repo", "get", "acme/missing"]);

      expect(result.code).toBe(1);
      expect(result.stderr).toContain(
        "GetRepository(bintray::Repository(acme:missing)): Repo 'missing' was not found (404"
      );
    });

    it("rejects malformed coordinates", async () => {
      const result = await harness.run(["packages", "list", "acme/generic-repo/extra"]);

      expect(result.code).toBe(1);
      expect(result.stdout + result.stderr).toContain('expected subject/repo, got "acme/generic-repo/extra"');
    });
  });

  describe("packages", () => {
    it("merges the descriptor with the options", async () => {
      const descriptor = join(harness.dir, "package.yaml");
      await writeFile(
        descriptor,
        [
          "name: myapp",
          "desc: From the descriptor",
          "licenses: [Apache-2.0]",
          "labels: [cli]",
          "vcs_url: https://example.com/myapp.git",
          "maturity: Stable",
        ].join("\n")
      );
      let sent: unknown;
      harness.agent
        .get(API_ORIGIN)
        .intercept({
          path: "/packages/acme/generic-repo",
          method: "POST",
          body: (body: string) => {
            sent = JSON.parse(body);
            return true;
          },
        })
        .reply(201, { created: "2020-05-01T00:00:00.000Z" });

      const result = await harness.run([
        "package",
        "create",
        "acme/generic-repo/myapp",
        "--descriptor",
        descriptor,
        "--license",
        "MIT",
        "--json",
      ]);

      expect(result.code).toBe(0);
      expect(sent).toEqual({
        name: "myapp",
        desc: "From the descriptor",
        labels: ["cli"],
        licenses: ["MIT"],
        website_url: "",
        vcs_url: "https://example.com/myapp.git",
        issue_tracker_url: "",
        github_repo: "",
        github_release_notes_file: "",
        maturity: "Stable",
      });
      expect(JSON.parse(result.stdout)).toEqual({
        name: "myapp",
        repo: "generic-repo",
        owner: "acme",
        created: "2020-05-01T00:00:00.000Z",
      });
    });

    it("refuses a descriptor for another package", async () => {
      const descriptor = join(harness.dir, "package.yaml");
      await writeFile(descriptor, "name: other\n");

      const result = await harness.run(["package", "create", "acme/generic-repo/myapp", "--descriptor", descriptor]);

      expect(result.code).toBe(1);
      expect(result.stderr).toContain("package.yaml describes other, not myapp");
    });

    it("shows versions newest last", async () => {
      harness.agent
        .get(API_ORIGIN)
        .intercept({ path: "/packages/acme/generic-repo/myapp", method: "GET" })
        .reply(200, { name: "myapp", repo: "generic-repo", owner: "acme", versions: ["1.10", "1.2"] });

      const result = await harness.run(["package", "get", "acme/generic-repo/myapp", "--json"]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout)).toMatchObject({ latest_version: "1.10", versions: ["1.2", "1.10"] });
    });
  });

  describe("versions", () => {
    it("publishes and reports the file count", async () => {
      let sent: unknown;
      harness.agent
        .get(API_ORIGIN)
        .intercept({
          path: "/content/acme/generic-repo/myapp/1.0/publish",
          method: "POST",
          body: (body: string) => {
            sent = JSON.parse(body);
            return true;
          },
        })
        .reply(200, { files: 2 });

      const result = await harness.run(["version", "publish", "acme/generic-repo/myapp/1.0", "--wait-for", "5", "--json"]);

      expect(result.code).toBe(0);
      expect(sent).toEqual({ publish_wait_for_secs: 5 });
      expect(JSON.parse(result.stdout)).toEqual({ files: 2, discarded: false });
    });

    it("rejects an invalid release date", async () => {
      const result = await harness.run(["version", "create", "acme/generic-repo/myapp/1.0", "--released", "soon"]);

      expect(result.code).toBe(1);
      expect(result.stdout + result.stderr).toContain('--released expects an ISO 8601 date, got "soon"');
    });
  });

  describe("content", () => {
    const HELLO_SHA1 = "aaf4c61ddcc5e8a2dabede0f3b482cd9aea9434d";
    const HELLO_SHA256 = "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824";

    it("uploads a file and waits until it is served", async () => {
      const local = join(harness.dir, "myapp.txt");
      await writeFile(local, "hello");
      const api = harness.agent.get(API_ORIGIN);
      const dl = harness.agent.get(DL_ORIGIN);
      api
        .intercept({ path: "/repos/acme/generic-repo", method: "GET" })
        .reply(200, { name: "generic-repo", owner: "acme", type: "generic" });
      api
        .intercept({
          path: "/content/acme/generic-repo/myapp/1.0/dist/myapp.txt",
          method: "PUT",
          headers: { "x-bintray-publish": "1", "x-checksum-sha2": HELLO_SHA256 },
        })
        .reply(201, { message: "success" });
      dl.intercept({ path: "/acme/generic-repo/dist/myapp.txt", method: "HEAD" }).reply(404, "");
      dl.intercept({ path: "/acme/generic-repo/dist/myapp.txt", method: "HEAD" }).reply(200, "", {
        headers: { "x-checksum-sha2": HELLO_SHA256 },
      });

      const result = await harness.run([
        "content",
        "upload",
        "acme/generic-repo/myapp/1.0",
        local,
        "dist/myapp.txt",
        "--publish",
        "--wait",
        "5",
        "--json",
      ]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({ path: "dist/myapp.txt", sha1: HELLO_SHA1, sha256: HELLO_SHA256 });
      harness.agent.assertNoPendingInterceptors();
    });

    it("sends the Debian options as upload headers", async () => {
      const local = join(harness.dir, "myapp_1.0_all.deb");
      await writeFile(local, "hello");
      const api = harness.agent.get(API_ORIGIN);
      api
        .intercept({ path: "/repos/acme/deb-repo", method: "GET" })
        .reply(200, { name: "deb-repo", owner: "acme", type: "deb" });
      api
        .intercept({
          path: "/content/acme/deb-repo/myapp/1.0/pool/main/m/myapp_1.0_all.deb",
          method: "PUT",
          headers: {
            "x-bintray-override": "0",
            "x-bintray-debian-distribution": "bionic,focal",
            "x-bintray-debian-component": "main",
            "x-bintray-debian-architecture": "all",
          },
        })
        .reply(201, { message: "success" });

      const result = await harness.run([
        "content",
        "upload",
        "acme/deb-repo/myapp/1.0",
        local,
        "pool/main/m/myapp_1.0_all.deb",
        "--no-override",
        "--deb-distribution",
        "focal",
        "--deb-distribution",
        "bionic",
        "--deb-component",
        "main",
        "--deb-architecture",
        "all",
      ]);

      expect(result.code).toBe(0);
      expect(result.stdout).toContain("Uploaded myapp_1.0_all.deb to pool/main/m/myapp_1.0_all.deb");
      harness.agent.assertNoPendingInterceptors();
    });

    it("reports a file that is never served within the wait", async () => {
      const local = join(harness.dir, "myapp.txt");
      await writeFile(local, "hello");
      const api = harness.agent.get(API_ORIGIN);
      api
        .intercept({ path: "/repos/acme/generic-repo", method: "GET" })
        .reply(200, { name: "generic-repo", owner: "acme", type: "generic" });
      api
        .intercept({ path: "/content/acme/generic-repo/myapp/1.0/myapp.txt", method: "PUT" })
        .reply(201, { message: "success" });
      harness.agent
        .get(DL_ORIGIN)
        .intercept({ path: "/acme/generic-repo/myapp.txt", method: "HEAD" })
        .reply(404, "")
        .persist();

      const result = await harness.run([
        "content",
        "upload",
        "acme/generic-repo/myapp/1.0",
        local,
        "myapp.txt",
        "--wait",
        "0",
      ]);

      expect(result.code).toBe(1);
      expect(result.stderr).toContain(
        "bintray::Content(acme:generic-repo:myapp:1.0:myapp.txt) availability: content not available after 0 ms"
      );
    });

    it("downloads a file", async () => {
      harness.agent
        .get(DL_ORIGIN)
        .intercept({ path: "/acme/generic-repo/dist/myapp.txt", method: "GET" })
        .reply(200, "hello");
      const target = join(harness.dir, "myapp.txt");

      const result = await harness.run([
        "content",
        "download",
        "acme/generic-repo/myapp/1.0",
        "dist/myapp.txt",
        target,
        "--json",
      ]);

      expect(result.code).toBe(0);
      expect(JSON.parse(result.stdout)).toEqual({ path: "dist/myapp.txt", file: target, bytes: 5 });
      await expect(readFile(target, "utf8")).resolves.toBe("hello");
    });

    it("deletes a file", async () => {
      harness.agent
        .get(API_ORIGIN)
        .intercept({ path: "/content/acme/generic-repo/dist/myapp.txt", method: "DELETE" })
        .reply(200, { message: "success" });

      const result = await harness.run(["content", "delete", "acme/generic-repo/myapp/1.0", "dist/myapp.txt"]);

      expect(result.code).toBe(0);
      expect(result.stdout).toContain("Deleted dist/myapp.txt");
      harness.agent.assertNoPendingInterceptors();
    });
  });

  describe("config", () => {
    it("stores values privately and masks the API key", async () => {
      const set = await harness.run(["config", "set", "--user", "jdoe", "--api-key", "test-secret", "--subject", "acme"]);
      expect(set.code).toBe(0);

      const stored = JSON.parse(await readFile(harness.configFile, "utf8"));
      expect(stored).toEqual({ user: "jdoe", apiKey: "test-secret", subject: "acme" });
      expect((await stat(harness.configFile)).mode & 0o777).toBe(0o600);

      const show = await harness.run(["config", "show", "--json"]);
      expect(JSON.parse(show.stdout)).toEqual({
        file: harness.configFile,
        user: "jdoe",
        api_key: "*******cret",
        subject: "acme",
      });
    });

    it("keeps existing values when setting others", async () => {
      await storeConfig({ user: "jdoe", apiKey: "test-secret" });

      const result = await harness.run(["config", "set", "--subject", "acme"]);

      expect(result.code).toBe(0);
      expect(JSON.parse(await readFile(harness.configFile, "utf8"))).toEqual({
        user: "jdoe",
        apiKey: "test-secret",
        subject: "acme",
      });
    });

    it("reports a broken configuration file", async () => {
      await storeConfig({ user: "jdoe", token: "test-secret" });

      const result = await harness.run(["config", "show"]);

      expect(result.code).toBe(1);
      expect(result.stderr).toContain(`${harness.configFile}: invalid configuration`);
    });
  });

  describe("rpm-spec inspect", () => {
    it("prints the parsed spec file as JSON", async () => {
      const result = await harness.run(["rpm-spec", "inspect", SPEC_FIXTURE, "--json"]);

      expect(result.code).toBe(0);
      const spec = JSON.parse(result.stdout);
      expect(spec).toMatchObject({ name: "myapp", version: "1.0", release: "1", license: "BSD" });
      expect(spec.changelog[0].date).toBe("2018-07-26T00:00:00.000Z");
    });

    it("summarizes the spec file as text", async () => {
      const result = await harness.run(["rpm-spec", "inspect", SPEC_FIXTURE]);

      expect(result.code).toBe(0);
      const lines = result.stdout.trimEnd().split("\n");
      expect(lines.find(line => line.startsWith("rpm:"))?.split(/\s+/)).toEqual(["rpm:", "myapp-1.0-1.noarch.rpm"]);
      expect(lines.find(line => line.startsWith("sources:"))?.split(/\s+/)).toEqual([
        "sources:",
        "myapp_1.0.orig.tar.gz",
      ]);
    });
  });
});
