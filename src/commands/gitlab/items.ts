import { BaseCommand } from "../base-command";
import type { ParsedArgs } from "../../utils/cli-parser";
import type { CommandOutput } from "../../types/command-output";
import type { AppConfig } from "../../models/config";
import type { GitLabGateway, ItemQuery, ItemSummary } from "../../models/gitlab";
import { configManager } from "../../core/config-manager";
import { logger } from "../../core/logger";
import { collect } from "../../core/pagination";
import { presentItem } from "../../core/presenters";
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
import { ITEM_KIND_LABELS, ItemService, parseItemInput } from "../../services/item.service";

type ItemsChainContext = {
  args: ParsedArgs;
  input?: ItemQuery;
  config?: Readonly<AppConfig>;
  gitlab?: GitLabGateway;
  query?: ItemQuery;
  items?: ItemSummary[];
  output?: CommandOutput;
};

export interface ItemsCommandDeps {
  loadConfig?: () => Promise<Readonly<AppConfig>>;
  createGateway?: GatewayFactory;
  now?: () => Date;
}

export class ItemsCommand extends BaseCommand {
  name = "items";
  description = "List issues or merge requests created in a given year";
  override category = "GitLab";

  constructor(private readonly deps: ItemsCommandDeps = {}) {
    super();
  }

  override async executeInternal(args: ParsedArgs): Promise<CommandOutput> {
    const context: ItemsChainContext = { args };

    const chain = new ServiceChain<ItemsChainContext>()
      .use(withOutputError((_ctx, error) => buildErrorOutput(error)))
      .use(
        withErrorBoundary((ctx, error) => {
          logger.error("items command failed", {
            type: ctx.input?.kind,
            year: ctx.input?.year,
            error: error.message,
          });
        })
      )
      .use(
        withValidation((ctx) => {
          ctx.input = parseItemInput(ctx.args.options.get("type"), ctx.args.options.get("year"));
        })
      )
      .use(withConfig(this.deps.loadConfig ?? (() => configManager.load())))
      .use(withGitLabService(this.deps.createGateway))
      .use(
        withTiming("items", (_ctx, durationMs) => {
          logger.debug("items durationMs", { durationMs });
        })
      )
      .use(async (ctx, next) => {
        if (!ctx.gitlab || !ctx.config || !ctx.input) {
          throw new Error("Missing GitLab context for request");
        }
        const service = new ItemService(ctx.gitlab, {
          perPage: ctx.config.gitlab.perPage,
          minYear: ctx.config.items.minYear,
          now: this.deps.now,
        });
        // the year's bounds come from config, so they are checked only now
        ctx.query = service.parseQuery(ctx.input.kind, ctx.input.year);
        ctx.items = await collect(service.stream(ctx.query));
        await next();
      })
      .use(
        withOutput((ctx) => {
          if (!ctx.query || !ctx.items) {
            return buildErrorOutput(new Error("No items result"));
          }
          const { query, items } = ctx;
          return {
            success: true,
            data: items.map(presentItem),
            message: `Found ${items.length} ${ITEM_KIND_LABELS[query.kind]} from ${query.year}`,
            meta: {
              count: items.length,
            },
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
    help += "  --type <type>        issues or mr\n";
    help += "  --year <yyyy>        Creation year\n\n";
    help += "Example:\n";
    help += "  gitlab-facade items --type mr --year 2023\n";
    return help;
  }
}
