import type { GitLabGateway, NamespaceKind, ResolvedTarget } from "../models/gitlab";

export type Resolution =
  | { status: "found"; target: ResolvedTarget }
  | { status: "missing"; kind: NamespaceKind };

export interface TargetResolver {
  kind: NamespaceKind;
  resolve(path: string): Promise<Resolution>;
}

const fromLookup = (
  kind: NamespaceKind,
  lookup: (path: string) => Promise<ResolvedTarget | null>,
): TargetResolver => ({
  kind,
  async resolve(path) {
    const target = await lookup(path);
    return target ? { status: "found", target } : { status: "missing", kind };
  },
});

export const groupResolver = (gateway: GitLabGateway): TargetResolver =>
  fromLookup("group", (path) => gateway.findGroup(path));

export const projectResolver = (gateway: GitLabGateway): TargetResolver =>
  fromLookup("project", (path) => gateway.findProject(path));

/** Groups win over projects when a path could name either. */
export const defaultResolvers = (gateway: GitLabGateway): TargetResolver[] => [
  groupResolver(gateway),
  projectResolver(gateway),
];

export type ChainResolution =
  | { status: "found"; target: ResolvedTarget }
  | { status: "missing"; tried: NamespaceKind[] };

/** Tries each resolver in order; the first hit wins and later ones are not called. */
export async function resolveTarget(path: string, resolvers: TargetResolver[]): Promise<ChainResolution> {
  const tried: NamespaceKind[] = [];
  for (const resolver of resolvers) {
    const result = await resolver.resolve(path);
    if (result.status === "found") {
      return result;
    }
    tried.push(result.kind);
  }
  return { status: "missing", tried };
}
