import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { logger } from "../core/logger";
import { collect } from "../core/pagination";
import { presentItem, presentMembership } from "../core/presenters";
import type { ItemService } from "../services/item.service";
import type { PermissionService } from "../services/permission.service";
import { toErrorResponse } from "./error-response";

export interface FacadeServerDeps {
  permissions: PermissionService;
  items: ItemService;
  version: string;
}

type ItemsQuerystring = Record<string, string | string[] | undefined>;

/**
 * Fastify server exposing the permission and item routes.
 */
export class FacadeServer {
  private app: FastifyInstance;

  constructor(private readonly deps: FacadeServerDeps) {
    this.app = Fastify({ logger: false });
    this.setupHooks();
    this.setupRoutes();
  }

  get instance(): FastifyInstance {
    return this.app;
  }

  private setupHooks(): void {
    this.app.addHook("onResponse", async (request, reply) => {
      logger.info(`${request.method} ${request.url} ${reply.statusCode}`, {
        durationMs: Math.round(reply.elapsedTime),
      });
    });

    this.app.setErrorHandler(async (error, request, reply) => {
      const { statusCode, body } = toErrorResponse(error);
      if (statusCode >= 500) {
        logger.error(`${request.method} ${request.url} failed`, error);
      } else {
        logger.warn(`${request.method} ${request.url} rejected`, { code: body.code, message: body.message });
      }
      if (body.retry_after !== undefined) {
        reply.header("retry-after", String(body.retry_after));
      }
      return reply.status(statusCode).send(body);
    });

    this.app.setNotFoundHandler(async (request, reply) => {
      return reply.status(404).send({
        status: "error",
        code: "NotFound",
        message: `Route ${request.method} ${request.url} not found`,
      });
    });
  }

  private setupRoutes(): void {
    this.app.get("/", async () => {
      return {
        service: "GitLab façade",
        version: this.deps.version,
        endpoints: {
          "/health": "Health check endpoint",
          "/permission": "POST endpoint to grant or change a user's role on a group or project",
          "/items": "GET endpoint to list issues or merge requests created in a year (?type=issues|mr&year=YYYY)",
        },
      };
    });

    // Liveness only; never calls GitLab.
    this.app.get("/health", async () => {
      return {
        status: "ok",
        timestamp: new Date().toISOString(),
        version: this.deps.version,
      };
    });

    this.app.post("/permission", async (request) => {
      const result = await this.deps.permissions.setPermission(request.body);
      return presentMembership(result);
    });

    this.app.get<{ Querystring: ItemsQuerystring }>("/items", async (request) => {
      const items = await collect(this.deps.items.listItems(request.query.type, request.query.year));
      return items.map(presentItem);
    });
  }

  async start(port: number, host: string): Promise<string> {
    const address = await this.app.listen({ port, host });
    logger.info(`Listening on ${address}`);
    return address;
  }

  async stop(): Promise<void> {
    await this.app.close();
  }
}
