import { describe, it, expect, vi } from "vitest";
import { ServiceChain } from "./service-chain";
import { withErrorBoundary, withGitLabService, withOutput, withOutputError, withTiming } from "./service-chain-steps";
import type { CommandOutput } from "../types/command-output";
import type { AppConfig } from "../models/config";
import type { GitLabGateway } from "../models/gitlab";
import { FakeGitLab } from "../test/fake-gitlab";
import { testConfig } from "../test/config";

type Context = { trail: string[]; output?: CommandOutput };

describe("ServiceChain", () => {
  it("runs steps around next() in order", async () => {
    const chain = new ServiceChain<Context>()
      .use(async (ctx, next) => {
        ctx.trail.push("a:before");
        await next();
        ctx.trail.push("a:after");
      })
      .use((ctx) => {
        ctx.trail.push("b");
      });

    const ctx = await chain.run({ trail: [] });
    expect(ctx.trail).toEqual(["a:before", "b", "a:after"]);
  });

  it("stops when a step does not call next()", async () => {
    const last = vi.fn();
    const chain = new ServiceChain<Context>().use(() => undefined).use(last);

    await chain.run({ trail: [] });
    expect(last).not.toHaveBeenCalled();
  });

  it("rejects a second call to next()", async () => {
    const chain = new ServiceChain<Context>().use(async (_ctx, next) => {
      await next();
      await next();
    });

    await expect(chain.run({ trail: [] })).rejects.toThrow("next() called multiple times");
  });

  it("turns a failure into output", async () => {
    const onError = vi.fn();
    const chain = new ServiceChain<Context>()
      .use(withOutputError((_ctx, error) => ({ success: false, message: error.message })))
      .use(withErrorBoundary(onError))
      .use(
        withOutput(() => ({ success: true })),
      )
      .use(() => {
        throw new Error("boom");
      });

    const ctx = await chain.run({ trail: [] });
    expect(ctx.output).toEqual({ success: false, message: "boom" });
    expect(onError).toHaveBeenCalledTimes(1);
  });

  it("can swallow an error at the boundary", async () => {
    const chain = new ServiceChain<Context>()
      .use(withErrorBoundary(() => undefined, { rethrow: false }))
      .use(() => {
        throw new Error("ignored");
      });

    await expect(chain.run({ trail: [] })).resolves.toEqual({ trail: [] });
  });

  it("reports the duration of the rest of the chain", async () => {
    const onComplete = vi.fn();
    await new ServiceChain<Context>().use(withTiming("step", onComplete)).run({ trail: [] });

    expect(onComplete).toHaveBeenCalledWith({ trail: [] }, expect.any(Number), "step");
  });

  it("creates the gateway from the loaded config", async () => {
    const fake = new FakeGitLab();
    const factory = vi.fn((_config: Readonly<AppConfig>): GitLabGateway => fake);
    type GatewayContext = { config?: Readonly<AppConfig>; gitlab?: GitLabGateway };

    const ctx = await new ServiceChain<GatewayContext>().use(withGitLabService(factory)).run({ config: testConfig });

    expect(factory).toHaveBeenCalledWith(testConfig);
    expect(ctx.gitlab).toBe(fake);
    await expect(new ServiceChain<GatewayContext>().use(withGitLabService(factory)).run({})).rejects.toThrow(
      "Missing config for GitLab service",
    );
  });
});
