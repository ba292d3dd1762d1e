export const ROLES = ["guest", "reporter", "developer", "maintainer", "owner"] as const;

export type Role = (typeof ROLES)[number];

/** GitLab access levels for each role, as the members API expects them. */
export const ROLE_ACCESS_LEVELS: Record<Role, number> = {
  guest: 10,
  reporter: 20,
  developer: 30,
  maintainer: 40,
  owner: 50,
};

export type NamespaceKind = "group" | "project";

export interface ResolvedTarget {
  kind: NamespaceKind;
  id: number;
  path: string;
}

export interface GitLabUser {
  id: number;
  username: string;
  name: string;
}

export interface Member {
  id: number;
  username: string;
  accessLevel: number;
}

export interface PermissionRequest {
  username: string;
  target: string;
  role: Role;
}

export type MembershipAction = "created" | "updated";

export interface MembershipResult {
  target: ResolvedTarget;
  user: GitLabUser;
  appliedRole: Role;
  accessLevel: number;
  action: MembershipAction;
}

export type ItemKind = "issue" | "merge_request";

export interface ItemQuery {
  kind: ItemKind;
  year: number;
}

export interface ItemSummary {
  id: number;
  iid: number;
  projectId: number;
  title: string;
  state: string;
  createdAt: string;
  url: string;
  author: string | null;
}

/** Half-open creation window `[start, end)`. */
export interface DateRange {
  start: Date;
  end: Date;
}

export interface ItemPageRequest {
  kind: ItemKind;
  range: DateRange;
  page: number;
  perPage: number;
}

export interface ItemPage {
  items: ItemSummary[];
  nextPage: number | null;
}

/**
 * The slice of the GitLab API the façade talks to. `null` means the remote
 * answered "not found"; every other remote failure rejects with UpstreamError.
 */
export interface GitLabGateway {
  findUserByUsername(username: string): Promise<GitLabUser | null>;
  findGroup(path: string): Promise<ResolvedTarget | null>;
  findProject(path: string): Promise<ResolvedTarget | null>;
  getMember(target: ResolvedTarget, userId: number): Promise<Member | null>;
  addMember(target: ResolvedTarget, userId: number, accessLevel: number): Promise<Member>;
  editMember(target: ResolvedTarget, userId: number, accessLevel: number): Promise<Member>;
  listItems(request: ItemPageRequest): Promise<ItemPage>;
}
