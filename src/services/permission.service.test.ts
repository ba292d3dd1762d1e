import { describe, it, expect } from "vitest";
import { PermissionService, parsePermissionRequest } from "./permission.service";
import { TargetNotFoundError, UpstreamError, UserNotFoundError } from "../core/errors";
import { ValidationError } from "../utils/validation";
import { FakeGitLab } from "../test/fake-gitlab";

const alice = { id: 42, username: "alice", name: "Alice Example" };

const createFake = () =>
  new FakeGitLab({
    users: [alice],
    groups: { "platform-team": 12 },
    projects: { "platform-team/api": 77 },
  });

describe("parsePermissionRequest", () => {
  it("trims fields and lower-cases the role", () => {
    expect(parsePermissionRequest({ username: " alice ", target: " platform-team ", role: "Maintainer" })).toEqual({
      username: "alice",
      target: "platform-team",
      role: "maintainer",
    });
  });

  it("reports every problem at once", () => {
    let caught: unknown;
    try {
      parsePermissionRequest({ username: "", role: 5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({
      message: "Invalid permission request: username cannot be empty; target is required; role must be a string",
      issues: ["username cannot be empty", "target is required", "role must be a string"],
    });
  });

  it("names the valid roles", () => {
    expect(() => parsePermissionRequest({ username: "alice", target: "platform-team", role: "admin" })).toThrow(
      "Invalid role: admin. Valid roles are: guest, reporter, developer, maintainer, owner",
    );
  });

  it("rejects a body that is not an object", () => {
    expect(() => parsePermissionRequest(["alice"])).toThrow(
      "Request body must be a JSON object with username, target and role",
    );
    expect(() => parsePermissionRequest(null)).toThrow(ValidationError);
  });
});

describe("PermissionService", () => {
  it("adds a new group member", async () => {
    const gitlab = createFake();
    const service = new PermissionService(gitlab);

    const result = await service.setPermission({ username: "alice", target: "platform-team", role: "developer" });

    expect(result).toEqual({
      target: { kind: "group", id: 12, path: "platform-team" },
      user: alice,
      appliedRole: "developer",
      accessLevel: 30,
      action: "created",
    });
    expect(gitlab.mutations).toEqual(["addMember group:12:42:30"]);
    expect(gitlab.memberAccess("group", 12, 42)).toBe(30);
  });

  it("is idempotent when the role is already applied", async () => {
    const gitlab = createFake();
    const service = new PermissionService(gitlab);
    const request = { username: "alice", target: "platform-team", role: "developer" };

    await service.setPermission(request);
    const second = await service.setPermission(request);

    expect(second.action).toBe("updated");
    expect(second.accessLevel).toBe(30);
    expect(gitlab.mutations).toEqual(["addMember group:12:42:30"]);
  });

  it("edits an existing member with a different level", async () => {
    const gitlab = createFake();
    gitlab.seedMember("project", 77, alice, 20);
    const service = new PermissionService(gitlab);

    const result = await service.setPermission({ username: "alice", target: "platform-team/api", role: "maintainer" });

    expect(result.target).toEqual({ kind: "project", id: 77, path: "platform-team/api" });
    expect(result.action).toBe("updated");
    expect(result.accessLevel).toBe(40);
    expect(gitlab.mutations).toEqual(["editMember project:77:42:40"]);
  });

  it("checks the group before the project", async () => {
    const gitlab = new FakeGitLab({ users: [alice], groups: { shared: 3 }, projects: { shared: 9 } });
    const result = await new PermissionService(gitlab).setPermission({
      username: "alice",
      target: "shared",
      role: "guest",
    });

    expect(result.target.kind).toBe("group");
    expect(gitlab.calls).not.toContain("findProject shared");
  });

  it("sends nothing for an invalid role", async () => {
    const gitlab = createFake();
    await expect(
      new PermissionService(gitlab).setPermission({ username: "alice", target: "platform-team", role: "superuser" }),
    ).rejects.toThrow(ValidationError);
    expect(gitlab.calls).toEqual([]);
  });

  it("fails with TargetNotFound when neither a group nor a project matches", async () => {
    const gitlab = createFake();
    const pending = new PermissionService(gitlab).setPermission({
      username: "alice",
      target: "nope/missing",
      role: "developer",
    });

    await expect(pending).rejects.toThrow(TargetNotFoundError);
    await expect(pending).rejects.toThrow("Target 'nope/missing' not found as group or project");
    expect(gitlab.calls).toEqual(["findGroup nope/missing", "findProject nope/missing"]);
    expect(gitlab.mutations).toEqual([]);
  });

  it("fails with UserNotFound for an unknown username", async () => {
    const gitlab = createFake();
    const pending = new PermissionService(gitlab).setPermission({
      username: "bob",
      target: "platform-team",
      role: "developer",
    });

    await expect(pending).rejects.toThrow(UserNotFoundError);
    await expect(pending).rejects.toThrow("User 'bob' not found");
    expect(gitlab.mutations).toEqual([]);
  });

  it("refuses the owner role on a project", async () => {
    const gitlab = createFake();
    await expect(
      new PermissionService(gitlab).setPermission({ username: "alice", target: "platform-team/api", role: "owner" }),
    ).rejects.toThrow("Owner role is not supported for projects");
    expect(gitlab.mutations).toEqual([]);
  });

  it("allows the owner role on a group", async () => {
    const gitlab = createFake();
    const result = await new PermissionService(gitlab).setPermission({
      username: "alice",
      target: "platform-team",
      role: "OWNER",
    });
    expect(result.appliedRole).toBe("owner");
    expect(result.accessLevel).toBe(50);
  });

  it("falls back to an edit when the add reports a conflict", async () => {
    // membership exists but the direct lookup does not report it
    class StaleLookup extends FakeGitLab {
      override async getMember(): Promise<null> {
        return null;
      }
    }
    const gitlab = new StaleLookup({ users: [alice], groups: { "platform-team": 12 } });
    gitlab.seedMember("group", 12, alice, 10);

    const result = await new PermissionService(gitlab).setPermission({
      username: "alice",
      target: "platform-team",
      role: "reporter",
    });

    expect(result.action).toBe("updated");
    expect(result.accessLevel).toBe(20);
    expect(gitlab.mutations).toEqual(["addMember group:12:42:20", "editMember group:12:42:20"]);
    expect(gitlab.memberAccess("group", 12, 42)).toBe(20);
  });

  it("propagates upstream failures", async () => {
    const gitlab = createFake();
    gitlab.failOn("findUserByUsername", new UpstreamError("Failed to look up user: GitLab responded 503", { status: 503 }));

    await expect(
      new PermissionService(gitlab).setPermission({ username: "alice", target: "platform-team", role: "developer" }),
    ).rejects.toThrow("Failed to look up user: GitLab responded 503");
    expect(gitlab.mutations).toEqual([]);
  });
});
