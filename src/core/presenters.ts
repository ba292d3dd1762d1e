import type { ItemSummary, MembershipAction, MembershipResult, NamespaceKind, Role } from "../models/gitlab";

export interface MembershipResponse {
  resolved_target_id: number;
  resolved_target_kind: NamespaceKind;
  resolved_target_path: string;
  resolved_user_id: number;
  username: string;
  applied_role: Role;
  access_level: number;
  action: MembershipAction;
}

export interface ItemSummaryResponse {
  id: number;
  iid: number;
  project_id: number;
  title: string;
  state: string;
  created_at: string;
  url: string;
  author: string | null;
}

export const presentMembership = (result: MembershipResult): MembershipResponse => ({
  resolved_target_id: result.target.id,
  resolved_target_kind: result.target.kind,
  resolved_target_path: result.target.path,
  resolved_user_id: result.user.id,
  username: result.user.username,
  applied_role: result.appliedRole,
  access_level: result.accessLevel,
  action: result.action,
});

export const presentItem = (item: ItemSummary): ItemSummaryResponse => ({
  id: item.id,
  iid: item.iid,
  project_id: item.projectId,
  title: item.title,
  state: item.state,
  created_at: item.createdAt,
  url: item.url,
  author: item.author,
});
