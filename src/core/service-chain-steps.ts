import type { AppConfig } from "../models/config";
import type { GitLabGateway } from "../models/gitlab";
import type { CommandOutput } from "../types/command-output";
import type { ServiceChainStep } from "./service-chain";
import { GitLabService } from "../services/gitlab.service";

export type GatewayFactory = (config: Readonly<AppConfig>) => GitLabGateway;

export const defaultGatewayFactory: GatewayFactory = (config) => new GitLabService(config.gitlab);

export const withConfig = <T extends { config?: Readonly<AppConfig> }>(
  loadConfig: () => Promise<Readonly<AppConfig>>
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    ctx.config = await loadConfig();
    await next();
  };
};

export const withGitLabService = <
  T extends { config?: Readonly<AppConfig>; gitlab?: GitLabGateway }
>(
  createService: GatewayFactory = defaultGatewayFactory
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    if (!ctx.config) {
      throw new Error("Missing config for GitLab service");
    }
    ctx.gitlab = createService(ctx.config);
    await next();
  };
};

export const withValidation = <T>(
  validate: (context: T) => Promise<void> | void
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    await validate(ctx);
    await next();
  };
};

export const withTiming = <T>(
  label: string,
  onComplete: (context: T, durationMs: number, label: string) => Promise<void> | void
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    const start = Date.now();
    await next();
    const durationMs = Date.now() - start;
    await onComplete(ctx, durationMs, label);
  };
};

export const withErrorBoundary = <T>(
  onError: (context: T, error: Error) => Promise<void> | void,
  options?: { rethrow?: boolean }
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    try {
      await next();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      await onError(ctx, error);
      if (options?.rethrow !== false) {
        throw error;
      }
    }
  };
};

export const withOutput = <T extends { output?: CommandOutput }>(
  buildOutput: (context: T) => CommandOutput
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    await next();
    ctx.output = buildOutput(ctx);
  };
};

export const withOutputError = <T extends { output?: CommandOutput }>(
  buildOutput: (context: T, error: Error) => CommandOutput,
  options?: { rethrow?: boolean }
): ServiceChainStep<T> => {
  return async (ctx, next) => {
    try {
      await next();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      ctx.output = buildOutput(ctx, error);
      if (options?.rethrow) {
        throw error;
      }
    }
  };
};
