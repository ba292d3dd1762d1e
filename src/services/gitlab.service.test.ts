import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { GitLabService } from "./gitlab.service";
import { ItemService } from "./item.service";
import { PermissionService } from "./permission.service";
import { UpstreamError } from "../core/errors";
import { collect } from "../core/pagination";
import { GitLabStubServer, type StubReply } from "../test/gitlab-stub-server";

const rawIssue = (id: number, createdAt: string) => ({
  id,
  iid: id,
  project_id: 7,
  title: `Issue ${id}`,
  state: "opened",
  created_at: createdAt,
  web_url: `https://gitlab.example.com/team/app/-/issues/${id}`,
  author: { id: 42, username: "alice" },
});

const captureError = async (work: () => Promise<unknown>): Promise<unknown> => {
  try {
    await work();
  } catch (err) {
    return err;
  }
  return undefined;
};

describe("GitLabService against a local GitLab API", () => {
  let stub: GitLabStubServer;
  let gitlab: GitLabService;

  beforeEach(async () => {
    stub = new GitLabStubServer();
    const host = await stub.start();
    gitlab = new GitLabService({ host, token: "test-token", timeoutMs: 2000 });
  });

  afterEach(async () => {
    await stub.stop();
  });

  const itemService = (perPage: number) =>
    new ItemService(gitlab, { perPage, minYear: 2010, now: () => new Date("2024-06-01T12:00:00Z") });

  it("looks up a subgroup by its encoded full path", async () => {
    stub.on("GET", "/groups/team%2Fsub", () => ({ body: { id: 12, full_path: "team/sub" } }));

    await expect(gitlab.findGroup("team/sub")).resolves.toEqual({ kind: "group", id: 12, path: "team/sub" });
    expect(stub.paths()).toEqual(["GET /groups/team%2Fsub"]);
    expect(stub.requests[0]?.headers["private-token"]).toBe("test-token");
  });

  it("maps a 404 lookup to null", async () => {
    await expect(gitlab.findProject("team/missing")).resolves.toBeNull();
    expect(stub.paths()).toEqual(["GET /projects/team%2Fmissing"]);
  });

  it("keeps the 409 status of a failed add", async () => {
    stub.on("POST", "/groups/12/members", () => ({ status: 409, body: { message: "Member already exists" } }));

    const err = await captureError(() => gitlab.addMember({ kind: "group", id: 12, path: "team" }, 42, 30));

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({
      status: 409,
      message: "Failed to add group member: GitLab responded 409: Member already exists",
    });
  });

  it("edits the membership when the add conflicts", async () => {
    stub
      .on("GET", "/groups/team", () => ({ body: { id: 12, full_path: "team" } }))
      .on("GET", "/users", () => ({ body: [{ id: 42, username: "alice", name: "Alice Example" }] }))
      .on("POST", "/groups/12/members", () => ({ status: 409, body: { message: "Member already exists" } }))
      .on("PUT", "/groups/12/members/42", () => ({ body: { id: 42, username: "alice", access_level: 30 } }));

    const result = await new PermissionService(gitlab).setPermission({
      username: "alice",
      target: "team",
      role: "developer",
    });

    expect(result).toMatchObject({ action: "updated", accessLevel: 30, target: { kind: "group", id: 12 } });
    expect(stub.paths()).toEqual([
      "GET /groups/team",
      "GET /users",
      "GET /groups/12/members/42",
      "POST /groups/12/members",
      "PUT /groups/12/members/42",
    ]);
    expect(stub.requests[1]?.query.get("username")).toBe("alice");
    expect(stub.requests[4]?.body).toMatchObject({ access_level: 30 });
  });

  it("walks pages using the next page the API reports", async () => {
    stub.on("GET", "/issues", (request): StubReply =>
      request.query.get("page") === "1"
        ? {
            body: [rawIssue(1, "2023-02-01T00:00:00.000Z"), rawIssue(2, "2023-03-01T00:00:00.000Z")],
            headers: { "x-next-page": "2", "x-page": "1" },
          }
        : { body: [rawIssue(3, "2023-04-01T00:00:00.000Z")], headers: { "x-page": "2" } },
    );

    const items = await collect(itemService(2).listItems("issues", "2023"));

    expect(items.map((item) => item.id)).toEqual([1, 2, 3]);
    expect(items[0]).toMatchObject({ projectId: 7, author: "alice", url: "https://gitlab.example.com/team/app/-/issues/1" });
    expect(stub.requests.map((request) => request.query.get("page"))).toEqual(["1", "2"]);

    const first = stub.requests[0]?.query;
    expect(first?.get("scope")).toBe("all");
    expect(first?.get("per_page")).toBe("2");
    expect(first?.get("created_after")).toBe("2023-01-01T00:00:00.000Z");
    expect(first?.get("created_before")).toBe("2024-01-01T00:00:00.000Z");
  });

  it("fails the listing when a later page fails", async () => {
    stub.on("GET", "/issues", (request) =>
      request.query.get("page") === "1"
        ? { body: [rawIssue(1, "2023-02-01T00:00:00.000Z")], headers: { "x-next-page": "2" } }
        : { status: 503, body: { message: "503 Service Unavailable" } },
    );

    const err = await captureError(() => collect(itemService(1).listItems("issues", "2023")));

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({
      status: 503,
      message: "Failed to list issues: GitLab responded 503: 503 Service Unavailable",
    });
  });

  it("surfaces a rate limit after one request with its retry hint", async () => {
    stub.on("GET", "/merge_requests", () => ({
      status: 429,
      headers: { "retry-after": "30" },
      body: { message: "429 Too Many Requests" },
    }));

    const err = await captureError(() => collect(itemService(100).listItems("mr", "2023")));

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({
      status: 429,
      retryAfter: 30,
      message: "Failed to list merge requests: GitLab responded 429: 429 Too Many Requests",
    });
    expect(stub.requests).toHaveLength(1);
  });
});
