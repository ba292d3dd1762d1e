import { UpstreamError } from "../core/errors";
import type { GitLabUser, ItemPage, ItemSummary, Member, NamespaceKind, ResolvedTarget } from "../models/gitlab";
import { isRecord } from "../utils/validation";

const unexpected = (what: string): UpstreamError =>
  new UpstreamError(`Unexpected response from GitLab: ${what}`);

const numberField = (raw: Record<string, unknown>, key: string): number | undefined => {
  const value = raw[key];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
};

const stringField = (raw: Record<string, unknown>, key: string): string | undefined => {
  const value = raw[key];
  return typeof value === "string" ? value : undefined;
};

export function mapUser(raw: unknown): GitLabUser | null {
  if (!isRecord(raw)) {
    return null;
  }
  const id = numberField(raw, "id");
  const username = stringField(raw, "username");
  if (id === undefined || username === undefined) {
    return null;
  }
  return { id, username, name: stringField(raw, "name") ?? username };
}

/** Picks the user whose username matches exactly, ignoring case like GitLab does. */
export function pickUser(raw: unknown, username: string): GitLabUser | null {
  if (!Array.isArray(raw)) {
    throw unexpected("user search did not return a list");
  }
  const wanted = username.toLowerCase();
  for (const entry of raw) {
    const user = mapUser(entry);
    if (user && user.username.toLowerCase() === wanted) {
      return user;
    }
  }
  return null;
}

export function mapTarget(kind: NamespaceKind, raw: unknown, requestedPath: string): ResolvedTarget {
  if (!isRecord(raw)) {
    throw unexpected(`${kind} lookup did not return an object`);
  }
  const id = numberField(raw, "id");
  if (id === undefined) {
    throw unexpected(`${kind} '${requestedPath}' has no id`);
  }
  const path = stringField(raw, kind === "group" ? "full_path" : "path_with_namespace");
  return { kind, id, path: path ?? requestedPath };
}

export function mapMember(raw: unknown): Member {
  if (!isRecord(raw)) {
    throw unexpected("member is not an object");
  }
  const id = numberField(raw, "id");
  const accessLevel = numberField(raw, "access_level");
  if (id === undefined || accessLevel === undefined) {
    throw unexpected("member without id or access_level");
  }
  return { id, username: stringField(raw, "username") ?? "", accessLevel };
}

export function mapItemSummary(raw: unknown): ItemSummary {
  if (!isRecord(raw)) {
    throw unexpected("item is not an object");
  }
  const id = numberField(raw, "id");
  const createdAt = stringField(raw, "created_at");
  if (id === undefined || createdAt === undefined) {
    throw unexpected("item without id or created_at");
  }
  const author = raw.author;
  return {
    id,
    iid: numberField(raw, "iid") ?? id,
    projectId: numberField(raw, "project_id") ?? 0,
    title: stringField(raw, "title") ?? "",
    state: stringField(raw, "state") ?? "",
    createdAt,
    url: stringField(raw, "web_url") ?? "",
    author: isRecord(author) ? stringField(author, "username") ?? null : null,
  };
}

/**
 * Reads one page of a list call made with `showExpanded`. When the platform
 * does not report the next page, a full page means there may be more.
 */
export function mapItemPage(raw: unknown, page: number, perPage: number): ItemPage {
  const data = isRecord(raw) ? raw.data : raw;
  if (!Array.isArray(data)) {
    throw unexpected("list call did not return an array");
  }
  const items = data.map(mapItemSummary);

  const info = isRecord(raw) && isRecord(raw.paginationInfo) ? raw.paginationInfo : undefined;
  let nextPage: number | null;
  if (info && "next" in info) {
    nextPage = typeof info.next === "number" && info.next > page ? info.next : null;
  } else {
    nextPage = items.length >= perPage ? page + 1 : null;
  }

  return { items, nextPage };
}
