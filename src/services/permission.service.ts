import { logger } from "../core/logger";
import { TargetNotFoundError, UpstreamError, UserNotFoundError } from "../core/errors";
import { defaultResolvers, resolveTarget } from "../core/target-resolvers";
import type { TargetResolver } from "../core/target-resolvers";
import { ROLES, ROLE_ACCESS_LEVELS } from "../models/gitlab";
import type {
  GitLabGateway,
  GitLabUser,
  Member,
  MembershipResult,
  PermissionRequest,
  ResolvedTarget,
  Role,
} from "../models/gitlab";
import { ValidationError, ValidationHelper, isRecord } from "../utils/validation";

const isRole = (value: string): value is Role => ROLES.some((role) => role === value);

/**
 * Validates untrusted input (an HTTP body or CLI options) into a
 * PermissionRequest. Every problem is reported, not just the first.
 */
export function parsePermissionRequest(input: unknown): PermissionRequest {
  if (!isRecord(input)) {
    throw new ValidationError("Request body must be a JSON object with username, target and role");
  }

  const { username, target, role } = input;
  const validation = new ValidationHelper()
    .check(ValidationHelper.nonEmpty(username, "username"))
    .check(ValidationHelper.nonEmpty(target, "target"))
    .check(ValidationHelper.nonEmpty(role, "role"));

  const normalizedRole = typeof role === "string" ? role.trim().toLowerCase() : "";
  if (normalizedRole && !isRole(normalizedRole)) {
    validation.check(`Invalid role: ${String(role)}. Valid roles are: ${ROLES.join(", ")}`);
  }
  validation.throwIfInvalid("Invalid permission request");

  if (typeof username !== "string" || typeof target !== "string" || !isRole(normalizedRole)) {
    throw new ValidationError("Invalid permission request");
  }

  return {
    username: username.trim(),
    target: target.trim(),
    role: normalizedRole,
  };
}

export class PermissionService {
  private readonly resolvers: TargetResolver[];

  constructor(
    private readonly gateway: GitLabGateway,
    resolvers?: TargetResolver[],
  ) {
    this.resolvers = resolvers ?? defaultResolvers(gateway);
  }

  async setPermission(input: unknown): Promise<MembershipResult> {
    const request = parsePermissionRequest(input);
    const accessLevel = ROLE_ACCESS_LEVELS[request.role];

    logger.info("Setting permission", {
      username: request.username,
      target: request.target,
      role: request.role,
    });

    const resolution = await resolveTarget(request.target, this.resolvers);
    if (resolution.status === "missing") {
      logger.warn("Target not found", { target: request.target, tried: resolution.tried });
      throw new TargetNotFoundError(request.target, resolution.tried);
    }
    const target = resolution.target;
    logger.debug("Target resolved", target);

    if (target.kind === "project" && request.role === "owner") {
      throw new ValidationError("Owner role is not supported for projects");
    }

    const user = await this.gateway.findUserByUsername(request.username);
    if (!user) {
      logger.warn("User not found", { username: request.username });
      throw new UserNotFoundError(request.username);
    }
    logger.debug("User resolved", { id: user.id, username: user.username });

    const existing = await this.gateway.getMember(target, user.id);
    if (!existing) {
      return this.addMember(target, user, request.role, accessLevel);
    }

    if (existing.accessLevel === accessLevel) {
      logger.info("Membership already has the requested role", {
        target: target.path,
        username: user.username,
        role: request.role,
      });
      return this.toResult(target, user, request.role, existing, "updated");
    }

    const member = await this.gateway.editMember(target, user.id, accessLevel);
    logger.info("Membership updated", {
      target: target.path,
      username: user.username,
      from: existing.accessLevel,
      to: accessLevel,
    });
    return this.toResult(target, user, request.role, member, "updated");
  }

  private async addMember(
    target: ResolvedTarget,
    user: GitLabUser,
    role: Role,
    accessLevel: number,
  ): Promise<MembershipResult> {
    try {
      const member = await this.gateway.addMember(target, user.id, accessLevel);
      logger.info("Membership created", { target: target.path, username: user.username, role });
      return this.toResult(target, user, role, member, "created");
    } catch (err) {
      // 409: the user is already a member the direct lookup did not report
      if (err instanceof UpstreamError && err.status === 409) {
        logger.info("Member already exists, updating role instead", {
          target: target.path,
          username: user.username,
        });
        const member = await this.gateway.editMember(target, user.id, accessLevel);
        return this.toResult(target, user, role, member, "updated");
      }
      throw err;
    }
  }

  private toResult(
    target: ResolvedTarget,
    user: GitLabUser,
    role: Role,
    member: Member,
    action: MembershipResult["action"],
  ): MembershipResult {
    return {
      target,
      user,
      appliedRole: role,
      accessLevel: member.accessLevel,
      action,
    };
  }
}
