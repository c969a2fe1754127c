import assert from "assert/strict";
import { ReviewApiError } from "./errors.js";
import { GitLabReviewHost, toMergeRequestMetadata } from "./gitlab.js";

type Route = (method: string, url: string) => Response | undefined;

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function mergeRequest(iid: number, source: string, target: string) {
  return {
    iid,
    web_url: `https://gitlab.example.test/group/app/-/merge_requests/${iid}`,
    title: `Subject of ${source}`,
    state: "opened",
    source_branch: source,
    target_branch: target,
  };
}

suite("GitLab merge requests", () => {
  test("maps an open merge request", () => {
    assert.deepStrictEqual(toMergeRequestMetadata(mergeRequest(12, "alice/0002", "alice/0001")), {
      id: 12,
      url: "https://gitlab.example.test/group/app/-/merge_requests/12",
      title: "Subject of alice/0002",
      sourceBranch: "alice/0002",
      targetBranch: "alice/0001",
      state: "open",
    });
  });

  test("treats merged and closed merge requests as closed", () => {
    assert.strictEqual(
      toMergeRequestMetadata({ ...mergeRequest(12, "alice/0002", "main"), state: "merged" })
        .state,
      "closed",
    );
  });

  test("rejects a payload without an iid", () => {
    assert.throws(() =>
      toMergeRequestMetadata({ ...mergeRequest(12, "alice/0002", "main"), iid: undefined }),
    );
  });
});

// The GitLab client sends every request through the global fetch
suite("GitLab review host", () => {
  const realFetch = globalThis.fetch;
  let route: Route;
  let requests: string[];
  let bodies: unknown[];
  let pushes: string[];
  let host: GitLabReviewHost;

  setup(() => {
    route = () => undefined;
    requests = [];
    bodies = [];
    pushes = [];
    globalThis.fetch = async (input: string | URL | Request, init?: RequestInit) => {
      const request = new Request(input, init);
      const url = decodeURIComponent(request.url);
      requests.push(`${request.method} ${url}`);
      if (request.method === "POST" || request.method === "PUT") {
        bodies.push(JSON.parse(await request.text()));
      }
      return route(request.method, url) ?? json({ message: "404 Not Found" }, 404);
    };
    host = new GitLabReviewHost(
      {
        host: "https://gitlab.example.test",
        token: "test-secret",
        projectPath: "group/app",
      },
      {
        forcePush: (remote, commitId, branch) => {
          pushes.push(`${remote} ${commitId}:${branch}`);
          return Promise.resolve({ kind: "ok" });
        },
      },
      "origin",
      1_000,
    );
  });

  teardown(() => {
    globalThis.fetch = realFetch;
  });

  test("searches branches anchored at the prefix and keeps only that namespace", async () => {
    route = (method, url) =>
      url.includes("/repository/branches?")
        ? json([
            { name: "alice/0001", commit: { id: "a".repeat(40) } },
            { name: "alice-old/0002", commit: { id: "b".repeat(40) } },
          ])
        : undefined;

    assert.deepStrictEqual(await host.findBranches("alice"), [
      { name: "alice/0001", commitId: "a".repeat(40) },
    ]);
    assert.strictEqual(requests.length, 1);
    assert.ok(
      requests[0].startsWith(
        "GET https://gitlab.example.test/api/v4/projects/group/app/repository/branches?",
      ),
    );
    assert.ok(requests[0].includes("search=^alice/"));
  });

  test("finds the open merge request for a branch", async () => {
    route = (method, url) =>
      url.includes("/merge_requests?")
        ? json([mergeRequest(12, "alice/0001", "main")])
        : undefined;

    const review = await host.findReview("alice/0001");

    assert.strictEqual(review?.id, 12);
    assert.ok(requests[0].includes("source_branch=alice/0001"));
    assert.ok(requests[0].includes("state=opened"));
  });

  test("pushes through git", async () => {
    assert.deepStrictEqual(await host.pushBranch("alice/0001", "c".repeat(40)), {
      kind: "ok",
    });
    assert.deepStrictEqual(pushes, [`origin ${"c".repeat(40)}:alice/0001`]);
    assert.deepStrictEqual(requests, []);
  });

  test("deletes a branch", async () => {
    route = (method) => (method === "DELETE" ? new Response(null, { status: 204 }) : undefined);

    assert.strictEqual(await host.deleteBranch("alice/0001"), "ok");
    assert.deepStrictEqual(requests, [
      "DELETE https://gitlab.example.test/api/v4/projects/group/app/repository/branches/alice/0001",
    ]);
  });

  test("treats a missing branch as already deleted", async () => {
    assert.strictEqual(await host.deleteBranch("alice/0001"), "not-found");
  });

  test("wraps other branch deletion failures", async () => {
    route = (method) =>
      method === "DELETE" ? json({ message: "403 Forbidden" }, 403) : undefined;

    await assert.rejects(host.deleteBranch("alice/0001"), ReviewApiError);
  });

  test("creates merge requests that remove their source branch", async () => {
    route = (method) =>
      method === "POST" ? json(mergeRequest(13, "alice/0002", "alice/0001"), 201) : undefined;

    const review = await host.createReview("alice/0002", "alice/0001", "Second", "Details");

    assert.strictEqual(review.id, 13);
    assert.deepStrictEqual(bodies, [
      {
        source_branch: "alice/0002",
        target_branch: "alice/0001",
        title: "Second",
        description: "Details",
        remove_source_branch: true,
      },
    ]);
  });

  test("updates and closes merge requests", async () => {
    route = (method, url) =>
      method === "PUT" && url.endsWith("/merge_requests/13")
        ? json(mergeRequest(13, "alice/0002", "main"))
        : undefined;

    await host.updateReview(13, { targetBranch: "main", title: "Second" });
    await host.closeReview(13);

    assert.deepStrictEqual(bodies, [
      { target_branch: "main", title: "Second" },
      { state_event: "close" },
    ]);
  });
});
