import type { PoolService } from "../services/pool.service.js";

declare module "fastify" {
  interface FastifyInstance {
    pools: PoolService;
  }
}
