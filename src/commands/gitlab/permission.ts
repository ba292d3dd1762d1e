import { BaseCommand } from "../base-command";
import type { ParsedArgs } from "../../utils/cli-parser";
import type { CommandOutput } from "../../types/command-output";
import type { AppConfig } from "../../models/config";
import type { GitLabGateway, MembershipResult, PermissionRequest } from "../../models/gitlab";
import { configManager } from "../../core/config-manager";
import { logger } from "../../core/logger";
import { ServiceChain } from "../../core/service-chain";
import {
  withConfig,
  withGitLabService,
  withValidation,
  withTiming,
  withErrorBoundary,
  withOutput,
  withOutputError,
} from "../../core/service-chain-steps";
import type { GatewayFactory } from "../../core/service-chain-steps";
import { buildErrorOutput } from "../../core/command-output-helpers";
import { presentMembership } from "../../core/presenters";
import { PermissionService, parsePermissionRequest } from "../../services/permission.service";

type PermissionChainContext = {
  args: ParsedArgs;
  request?: PermissionRequest;
  config?: Readonly<AppConfig>;
  gitlab?: GitLabGateway;
  result?: MembershipResult;
  output?: CommandOutput;
};

export interface PermissionCommandDeps {
  loadConfig?: () => Promise<Readonly<AppConfig>>;
  createGateway?: GatewayFactory;
}

export class PermissionCommand extends BaseCommand {
  name = "permission";
  description = "Grant or change a user's role on a group or project";
  override category = "GitLab";

  constructor(private readonly deps: PermissionCommandDeps = {}) {
    super();
  }

  override async executeInternal(args: ParsedArgs): Promise<CommandOutput> {
    const context: PermissionChainContext = { args };

    const chain = new ServiceChain<PermissionChainContext>()
      .use(withOutputError((_ctx, error) => buildErrorOutput(error)))
      .use(
        withErrorBoundary((ctx, error) => {
          logger.error("permission command failed", {
            target: ctx.request?.target,
            error: error.message,
          });
        })
      )
      .use(
        withValidation((ctx) => {
          ctx.request = parsePermissionRequest({
            username: ctx.args.options.get("username"),
            target: ctx.args.options.get("target"),
            role: ctx.args.options.get("role"),
          });
        })
      )
      .use(withConfig(this.deps.loadConfig ?? (() => configManager.load())))
      .use(withGitLabService(this.deps.createGateway))
      .use(
        withTiming("permission", (_ctx, durationMs) => {
          logger.debug("permission durationMs", { durationMs });
        })
      )
      .use(async (ctx, next) => {
        if (!ctx.gitlab || !ctx.request) {
          throw new Error("Missing GitLab context for request");
        }
        ctx.result = await new PermissionService(ctx.gitlab).setPermission(ctx.request);
        await next();
      })
      .use(
        withOutput((ctx) => {
          if (!ctx.result) {
            return buildErrorOutput(new Error("No membership result"));
          }
          const { result } = ctx;
          return {
            success: true,
            data: presentMembership(result),
            message: `Set ${result.user.username}'s role to ${result.appliedRole} on ${result.target.kind} ${result.target.path} (${result.action})`,
            meta: { action: result.action },
          };
        })
      );

    await chain.run(context);

    return (
      context.output ?? {
        success: false,
        message: "Service chain did not produce output",
        error: new Error("Service chain did not produce output"),
      }
    );
  }

  override printHelp(): string {
    let help = super.printHelp();
    help += "Options:\n";
    help += "  --username <name>    GitLab username\n";
    help += "  --target <path>      Group or project path (groups are tried first)\n";
    help += "  --role <role>        guest, reporter, developer, maintainer or owner\n\n";
    help += "Example:\n";
    help += "  gitlab-facade permission --username alice --target platform-team --role developer\n";
    return help;
  }
}
