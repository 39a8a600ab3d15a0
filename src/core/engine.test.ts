import { describe, expect, it } from "vitest";
import { FakePlatform } from "../testing/fakePlatform.js";
import { MemoryLogger, noSleep, testConfig } from "../testing/helpers.js";
import { runBulkReplace } from "./engine.js";
import { AuthenticationError, NotFoundError, TransientApiError } from "./errors.js";
import type { RunConfig } from "./types.js";

function run(fake: FakePlatform, config: RunConfig, options: { signal?: AbortSignal; logger?: MemoryLogger } = {}) {
  return runBulkReplace({
    client: fake,
    config,
    logger: options.logger ?? new MemoryLogger(),
    signal: options.signal,
    sleep: noSleep,
    now: () => new Date("2026-01-01T00:00:00.000Z"),
  });
}

describe("runBulkReplace", () => {
  it("previews then applies a single replacement", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo baz", "/b.txt": "baz baz" } });

    const preview = await run(fake, testConfig({ dryRun: true }));
    expect(preview.counts["would-apply"]).toBe(1);
    expect(preview.outcomes[0]?.files).toEqual([{ path: "/a.txt", matchCount: 1 }]);
    expect(fake.mutatingCalls()).toEqual([]);

    const live = await run(fake, testConfig());
    expect(live.counts.applied).toBe(1);
    expect(fake.pushes).toHaveLength(1);
    expect(fake.pushes[0]?.changes).toEqual([{ path: "/a.txt", content: "bar baz" }]);
    expect(fake.files("api")).toEqual({ "/a.txt": "bar baz", "/b.txt": "baz baz" });
  });

  it("finds nothing to do on a second run", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    await run(fake, testConfig());

    const again = await run(fake, testConfig());

    expect(again.counts).toEqual({ applied: 0, "would-apply": 0, "no-changes": 1, "skipped-error": 0 });
    expect(fake.pushes).toHaveLength(1);
  });

  it("never reports a change for a rule that replaces a string with itself", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });

    const report = await run(fake, testConfig({ rules: [{ search: "foo", replace: "foo" }] }));

    expect(report.outcomes.map((outcome) => outcome.status)).toEqual(["no-changes"]);
    expect(fake.mutatingCalls()).toEqual([]);
  });

  it("makes no mutating call in a dry run across repositories", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    fake.addRepository({ project: "Web", name: "site", files: { "/index.html": "<p>foo</p>" } });

    const report = await run(fake, testConfig({ dryRun: true }));

    expect(report.dryRun).toBe(true);
    expect(report.counts["would-apply"]).toBe(2);
    expect(fake.mutatingCalls()).toEqual([]);
  });

  it("isolates a failing repository from the others", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    fake.addRepository({ project: "Platform", name: "worker", files: { "/w.txt": "foo" } });
    fake.addRepository({ project: "Platform", name: "gone", files: { "/g.txt": "foo" } });
    fake.fail("pushCommit", () => new AuthenticationError("403 Forbidden"), { repository: "api" });
    fake.fail("getRepository", () => new NotFoundError("repository deleted"), { repository: "gone" });

    const report = await run(fake, testConfig());

    expect(report.outcomes.map((outcome) => [outcome.target.repositoryName, outcome.status])).toEqual([
      ["api", "skipped-error"],
      ["worker", "applied"],
      ["gone", "skipped-error"],
    ]);
    expect(report.failures.map((failure) => failure.error.code)).toEqual(["AUTHENTICATION", "NOT_FOUND"]);
    expect(fake.files("worker")).toEqual({ "/w.txt": "bar" });
    expect(fake.files("api")).toEqual({ "/a.txt": "foo" });
  });

  it("reports a rejected credential as fatal without scanning", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    fake.fail("listProjects", () => new AuthenticationError("401 Unauthorized"));

    const report = await run(fake, testConfig());

    expect(report.fatal).toEqual({ code: "AUTHENTICATION", message: "401 Unauthorized" });
    expect(report.outcomes).toEqual([]);
    expect(fake.callsTo("listFiles")).toEqual([]);
  });

  it("rejects invalid rules before calling the platform", async () => {
    const fake = new FakePlatform();
    const report = await run(fake, testConfig({ rules: [{ search: "", replace: "x" }] }));

    expect(report.fatal?.code).toBe("CONFIGURATION");
    expect(fake.calls).toEqual([]);
  });

  it("reports an unknown project as a scope failure", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });

    const report = await run(fake, testConfig({ scope: { kind: "subset", entries: [{ project: "Missing" }] } }));

    expect(report.fatal).toEqual({
      code: "SCOPE_RESOLUTION",
      message: 'Project "Missing" was not found in organization "contoso".',
    });
  });

  it("stops dispatching once cancelled and lists what did not start", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    const worker = fake.addRepository({ project: "Platform", name: "worker", files: { "/w.txt": "foo" } });
    const site = fake.addRepository({ project: "Platform", name: "site", files: { "/s.txt": "foo" } });
    const controller = new AbortController();
    fake.onNextPush(() => controller.abort());
    const logger = new MemoryLogger();

    const report = await run(fake, testConfig({ concurrency: { repositories: 1, files: 1 } }), {
      signal: controller.signal,
      logger,
    });

    expect(report.cancelled).toBe(true);
    expect(report.outcomes.map((outcome) => [outcome.target.repositoryName, outcome.status])).toEqual([["api", "applied"]]);
    expect(report.notStarted).toEqual([worker, site]);
    expect(fake.callsTo("listFiles", "worker")).toEqual([]);
    expect(logger.messages()).toContain("Run cancelled; 2 repositories were not started");
  });

  it("reports a run cancelled during scope resolution as cancelled, not fatal", async () => {
    const fake = new FakePlatform();
    fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    const controller = new AbortController();
    fake.fail("listProjects", () => {
      controller.abort();
      return new TransientApiError("503", 503);
    });
    const logger = new MemoryLogger();

    const report = await run(fake, testConfig(), { signal: controller.signal, logger });

    expect(report.fatal).toBeUndefined();
    expect(report.cancelled).toBe(true);
    expect(report.outcomes).toEqual([]);
    expect(report.notStarted).toEqual([]);
    expect(logger.messages()).toContain("Run cancelled while resolving the scope: list projects was cancelled while waiting to retry.");
  });

  it("warns about rules that undo each other", async () => {
    const fake = new FakePlatform();
    const logger = new MemoryLogger();
    await run(fake, testConfig({ rules: [{ search: "foo", replace: "foofoo" }] }), { logger });
    expect(logger.messages()).toContain("Rule 1 reintroduces a search string; a second run will change files again");
  });
});
