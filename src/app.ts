import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest, type FastifyServerOptions } from "fastify";
import { config } from "./config/index.js";
import { isKernelError } from "./engine/errors.js";
import { registerAccountRoutes } from "./routes/accounts.routes.js";
import { registerPoolRoutes } from "./routes/pools.routes.js";
import {
  InMemoryShareLedger,
  InMemoryVault,
  type BalanceTransfer,
  type ShareLedger,
} from "./services/custody.service.js";
import { PoolService, type PoolServiceDefaults } from "./services/pool.service.js";

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
  vault?: BalanceTransfer;
  shares?: ShareLedger;
  defaults?: PoolServiceDefaults;
}

function statusCodeOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });

  app.decorate(
    "pools",
    new PoolService({
      vault: options.vault ?? new InMemoryVault(),
      shares: options.shares ?? new InMemoryShareLedger(),
      log: app.log,
      defaults: options.defaults ?? { approximation: config.poolApproximation, policy: config.kernelPolicy },
    })
  );

  app.setErrorHandler((error: unknown, request: FastifyRequest, reply: FastifyReply) => {
    if (isKernelError(error)) {
      return reply.code(error.statusCode).send(error.toJSON());
    }
    const statusCode = statusCodeOf(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
      return reply.code(500).send({ error: "Internal Server Error" });
    }
    const message = error instanceof Error ? error.message : "Bad Request";
    return reply.code(statusCode).send({ error: message });
  });

  app.get("/health", async () => ({ status: "ok" }));

  await registerPoolRoutes(app);
  await registerAccountRoutes(app);
  return app;
}
