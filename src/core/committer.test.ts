import { describe, expect, it } from "vitest";
import { FakePlatform, type FakeFile } from "../testing/fakePlatform.js";
import { testConfig, testContext } from "../testing/helpers.js";
import { applyChangePlan } from "./committer.js";
import { AuthenticationError, ConflictError, RequestTimeoutError, TransientApiError } from "./errors.js";
import { buildChangePlan } from "./planner.js";
import { scanRepository } from "./scanner.js";
import type { RunConfig } from "./types.js";

async function planFor(files: Record<string, FakeFile>, config: RunConfig = testConfig()) {
  const fake = new FakePlatform();
  const target = fake.addRepository({ project: "Platform", name: "api", files });
  const ctx = testContext(fake, config);
  const plan = buildChangePlan(await scanRepository(ctx, target));
  return { fake, target, ctx, plan };
}

describe("applyChangePlan", () => {
  it("pushes every planned file in one commit", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo baz", "/b.txt": "baz baz", "/c.txt": "foo foo" });
    const baseHead = fake.head("api");

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("applied");
    expect(outcome.filesChanged).toBe(2);
    expect(outcome.commitId).toBe(fake.head("api"));
    expect(fake.pushes).toHaveLength(1);
    expect(fake.pushes[0]).toMatchObject({ branch: "main", expectedHead: baseHead, baseCommit: baseHead, message: "Bulk update" });
    expect(fake.files("api")).toEqual({ "/a.txt": "bar baz", "/b.txt": "baz baz", "/c.txt": "bar bar" });
  });

  it("changes nothing when the push fails", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo", "/c.txt": "foo" });
    fake.fail("pushCommit", () => new AuthenticationError("403 Forbidden"));

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("skipped-error");
    expect(outcome.filesChanged).toBe(0);
    expect(outcome.error).toEqual({ code: "AUTHENTICATION", message: "403 Forbidden" });
    expect(fake.files("api")).toEqual({ "/a.txt": "foo", "/c.txt": "foo" });
  });

  it("retries transient push failures", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" });
    fake.fail("pushCommit", () => new TransientApiError("502 Bad Gateway", 502), { times: 2 });

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("applied");
    expect(fake.callsTo("pushCommit")).toHaveLength(3);
    expect(fake.files("api")).toEqual({ "/a.txt": "bar" });
  });

  it("recomputes changes when the head moved since the scan", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo", "/b.txt": "foo one" });
    fake.commitExternally("api", { "/b.txt": "foo two", "/new.txt": "untouched" });

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("applied");
    expect(fake.files("api")).toEqual({ "/a.txt": "bar", "/b.txt": "bar two", "/new.txt": "untouched" });
  });

  it("drops files removed or already fixed on the moved head", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo", "/b.txt": "foo" });
    fake.commitExternally("api", { "/a.txt": null, "/b.txt": "bar" });
    const movedHead = fake.head("api");

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("no-changes");
    expect(fake.pushes).toEqual([]);
    expect(fake.head("api")).toBe(movedHead);
  });

  it("retries when the branch moves during the push", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo", "/b.txt": "keep" });
    fake.onNextPush(() => {
      fake.commitExternally("api", { "/b.txt": "changed elsewhere" });
    });

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("applied");
    expect(fake.callsTo("pushCommit")).toHaveLength(2);
    expect(fake.files("api")).toEqual({ "/a.txt": "bar", "/b.txt": "changed elsewhere" });
  });

  it("gives up after repeated conflicts", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" });
    fake.fail("pushCommit", () => new ConflictError("TF401028: The reference has already been updated"));

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("skipped-error");
    expect(outcome.error?.code).toBe("COMMIT_APPLY");
    expect(fake.callsTo("pushCommit")).toHaveLength(3);
    expect(fake.files("api")).toEqual({ "/a.txt": "foo" });
  });

  it("reports a push that landed but timed out as applied at the new head", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" });
    const push = fake.pushCommit.bind(fake);
    let answered = false;
    fake.pushCommit = async (request) => {
      const result = await push(request);
      if (answered) return result;
      answered = true;
      throw new RequestTimeoutError("push exceeded 1000ms.");
    };

    const outcome = await applyChangePlan(ctx, plan);
    const head = fake.head("api");

    expect(outcome.status).toBe("applied");
    expect(outcome.commitId).toBe(head);
    expect(outcome.files).toEqual([{ path: "/a.txt", matchCount: 1 }]);
    expect(outcome.error).toEqual({
      code: "COMMIT_APPLY",
      message: `A push to main was retried without a response; ${head} already carries the replacements and is most likely that push.`,
    });
    expect(fake.pushes).toHaveLength(1);
    expect(fake.files("api")).toEqual({ "/a.txt": "bar" });
  });

  it("still reports no changes when someone else made the same edit", async () => {
    const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" });
    fake.onNextPush(() => {
      fake.commitExternally("api", { "/a.txt": "bar" });
    });

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("no-changes");
    expect(outcome.commitId).toBeUndefined();
    expect(outcome.error).toBeUndefined();
    expect(fake.pushes).toEqual([]);
  });

  it("pushes nothing once cancelled", async () => {
    const controller = new AbortController();
    const fake = new FakePlatform();
    const target = fake.addRepository({ project: "Platform", name: "api", files: { "/a.txt": "foo" } });
    const ctx = testContext(fake, testConfig(), { signal: controller.signal });
    const plan = buildChangePlan(await scanRepository(ctx, target));
    controller.abort();

    const outcome = await applyChangePlan(ctx, plan);

    expect(outcome.status).toBe("skipped-error");
    expect(outcome.error?.code).toBe("CANCELLED");
    expect(fake.mutatingCalls()).toEqual([]);
  });

  describe("pull request delivery", () => {
    const config = testConfig({
      delivery: { mode: "pull-request", branchName: "bulk-update-20260101", title: "Bulk update", description: "foo -> bar" },
    });

    it("commits on a new work branch and opens a pull request", async () => {
      const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" }, config);
      const mainHead = fake.head("api");

      const outcome = await applyChangePlan(ctx, plan);

      expect(outcome.status).toBe("applied");
      expect(outcome.pullRequestUrl).toBe("https://example.test/api/pull/1");
      expect(fake.pushes[0]).toMatchObject({ branch: "bulk-update-20260101", expectedHead: null, baseCommit: mainHead });
      expect(fake.head("api")).toBe(mainHead);
      expect(fake.files("api", "bulk-update-20260101")).toEqual({ "/a.txt": "bar" });
      expect(fake.pullRequestsOf("api")).toEqual([
        {
          sourceBranch: "bulk-update-20260101",
          targetBranch: "main",
          title: "Bulk update",
          description: "foo -> bar",
          id: "1",
          url: "https://example.test/api/pull/1",
        },
      ]);
    });

    it("is idempotent on a rerun against the existing work branch", async () => {
      const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" }, config);
      await applyChangePlan(ctx, plan);

      const again = await applyChangePlan(ctx, plan);

      expect(again.status).toBe("no-changes");
      expect(again.pullRequestUrl).toBe("https://example.test/api/pull/1");
      expect(fake.pushes).toHaveLength(1);
      expect(fake.callsTo("createPullRequest")).toHaveLength(1);
    });

    it("reports a pull request failure after a successful push", async () => {
      const { fake, ctx, plan } = await planFor({ "/a.txt": "foo" }, config);
      fake.fail("createPullRequest", () => new AuthenticationError("403"));

      const outcome = await applyChangePlan(ctx, plan);

      expect(outcome.status).toBe("applied");
      expect(outcome.commitId).toBe(fake.head("api", "bulk-update-20260101"));
      expect(outcome.error).toEqual({
        code: "AUTHENTICATION",
        message: "Commit pushed but the pull request could not be opened: 403",
      });
    });
  });
});
