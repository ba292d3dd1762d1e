import { Gitlab } from "@gitbeaker/core";
import { logger } from "../core/logger";
import type { GitLabConfig } from "../models/config";
import type {
  GitLabGateway,
  GitLabUser,
  ItemPage,
  ItemPageRequest,
  Member,
  ResolvedTarget,
} from "../models/gitlab";
import { toUpstreamError, upstreamStatus } from "./gitlab-errors";
import { mapItemPage, mapMember, mapTarget, pickUser } from "./gitlab-mappers";
import { createGitLabRequester } from "./gitlab-requester";

const createClient = (config: Pick<GitLabConfig, "host" | "token" | "timeoutMs">) =>
  new Gitlab({
    host: config.host,
    token: config.token,
    queryTimeout: config.timeoutMs,
    // single attempt per call: rate limits surface to the caller with their Retry-After
    requesterFn: createGitLabRequester(config.timeoutMs),
  });

type GitLabClient = ReturnType<typeof createClient>;

export class GitLabService implements GitLabGateway {
  private api: GitLabClient | null = null;

  constructor(private readonly config: Pick<GitLabConfig, "host" | "token" | "timeoutMs">) {}

  private ensureInitialized(): GitLabClient {
    if (!this.api) {
      logger.debug("Initializing GitLab API", { host: this.config.host, timeoutMs: this.config.timeoutMs });
      this.api = createClient(this.config);
    }
    return this.api;
  }

  /** Runs a call, mapping 404 to null and anything else to UpstreamError. */
  private async findOrNull<T>(action: string, call: () => Promise<T>): Promise<T | null> {
    try {
      return await call();
    } catch (err) {
      if (upstreamStatus(err) === 404) {
        logger.debug(`Not found while trying to ${action}`);
        return null;
      }
      logger.error(`Failed to ${action}`, err);
      throw toUpstreamError(err, action);
    }
  }

  private async request<T>(action: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      logger.error(`Failed to ${action}`, err);
      throw toUpstreamError(err, action);
    }
  }

  async findUserByUsername(username: string): Promise<GitLabUser | null> {
    const api = this.ensureInitialized();
    const users: unknown = await this.request("look up user", () => api.Users.all({ username }));
    return pickUser(users, username);
  }

  async findGroup(path: string): Promise<ResolvedTarget | null> {
    const api = this.ensureInitialized();
    const group: unknown = await this.findOrNull("look up group", () => api.Groups.show(path));
    return group === null ? null : mapTarget("group", group, path);
  }

  async findProject(path: string): Promise<ResolvedTarget | null> {
    const api = this.ensureInitialized();
    const project: unknown = await this.findOrNull("look up project", () => api.Projects.show(path));
    return project === null ? null : mapTarget("project", project, path);
  }

  async getMember(target: ResolvedTarget, userId: number): Promise<Member | null> {
    const api = this.ensureInitialized();
    const member: unknown = await this.findOrNull(`read ${target.kind} membership`, () =>
      target.kind === "group"
        ? api.GroupMembers.show(target.id, userId)
        : api.ProjectMembers.show(target.id, userId),
    );
    return member === null ? null : mapMember(member);
  }

  async addMember(target: ResolvedTarget, userId: number, accessLevel: number): Promise<Member> {
    const api = this.ensureInitialized();
    logger.debug("Adding member", { target: target.path, userId, accessLevel });
    const member: unknown = await this.request(`add ${target.kind} member`, () =>
      target.kind === "group"
        ? api.GroupMembers.add(target.id, accessLevel, { userId })
        : api.ProjectMembers.add(target.id, accessLevel, { userId }),
    );
    return mapMember(member);
  }

  async editMember(target: ResolvedTarget, userId: number, accessLevel: number): Promise<Member> {
    const api = this.ensureInitialized();
    logger.debug("Editing member", { target: target.path, userId, accessLevel });
    const member: unknown = await this.request(`edit ${target.kind} member`, () =>
      target.kind === "group"
        ? api.GroupMembers.edit(target.id, userId, accessLevel)
        : api.ProjectMembers.edit(target.id, userId, accessLevel),
    );
    return mapMember(member);
  }

  async listItems(request: ItemPageRequest): Promise<ItemPage> {
    const api = this.ensureInitialized();
    const options = {
      scope: "all",
      createdAfter: request.range.start.toISOString(),
      createdBefore: request.range.end.toISOString(),
      perPage: request.perPage,
      page: request.page,
      maxPages: 1,
      showExpanded: true,
    } as const;

    const response: unknown =
      request.kind === "issue"
        ? await this.request("list issues", () => api.Issues.all(options))
        : await this.request("list merge requests", () => api.MergeRequests.all(options));

    const page = mapItemPage(response, request.page, request.perPage);
    logger.debug(`Received ${page.items.length} items on page ${request.page}`, { nextPage: page.nextPage });
    return page;
  }
}
