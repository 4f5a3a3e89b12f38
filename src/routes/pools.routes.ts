import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import {
  burnSchema,
  burnSwapQuoteSchema,
  burnSwapSchema,
  mintSchema,
  poolCreateSchema,
  swapMintQuoteSchema,
  swapMintSchema,
  swapQuoteSchema,
  swapSchema,
  type BurnInput,
  type BurnSwapInput,
  type BurnSwapQuoteInput,
  type MintInput,
  type PoolCreateInput,
  type SwapInput,
  type SwapMintInput,
  type SwapMintQuoteInput,
  type SwapQuoteInput,
} from "../schemas/pool.schema.js";

type PoolParamsRoute<B> = FastifyRequest<{ Params: { id: string }; Body: B }>;

export async function registerPoolRoutes(app: FastifyInstance): Promise<void> {
  app.post("/api/pools", async (req: FastifyRequest<{ Body: PoolCreateInput }>, reply: FastifyReply) => {
    const parsed = poolCreateSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const pool = await app.pools.createPool(parsed.data);
    return reply.code(201).send(pool);
  });

  app.get("/api/pools", async (_req: FastifyRequest, reply: FastifyReply) => {
    const data = app.pools.listPools();
    return reply.send({ data, total: data.length });
  });

  app.get("/api/pools/:id", async (req: FastifyRequest<{ Params: { id: string } }>, reply: FastifyReply) => {
    return reply.send(app.pools.getPool(req.params.id));
  });

  app.post("/api/pools/:id/quote/swap", async (req: PoolParamsRoute<SwapQuoteInput>, reply: FastifyReply) => {
    const parsed = swapQuoteSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    return reply.send(app.pools.quoteSwap(req.params.id, parsed.data));
  });

  app.post(
    "/api/pools/:id/quote/swap-mint",
    async (req: PoolParamsRoute<SwapMintQuoteInput>, reply: FastifyReply) => {
      const parsed = swapMintQuoteSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
      }
      return reply.send(app.pools.quoteSwapMint(req.params.id, parsed.data));
    }
  );

  app.post(
    "/api/pools/:id/quote/burn-swap",
    async (req: PoolParamsRoute<BurnSwapQuoteInput>, reply: FastifyReply) => {
      const parsed = burnSwapQuoteSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
      }
      return reply.send(app.pools.quoteBurnSwap(req.params.id, parsed.data));
    }
  );

  app.post("/api/pools/:id/swap", async (req: PoolParamsRoute<SwapInput>, reply: FastifyReply) => {
    const parsed = swapSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const { account, ...request } = parsed.data;
    return reply.send(await app.pools.swap(req.params.id, account, request));
  });

  app.post("/api/pools/:id/mint", async (req: PoolParamsRoute<MintInput>, reply: FastifyReply) => {
    const parsed = mintSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const { account, ...request } = parsed.data;
    return reply.send(await app.pools.mint(req.params.id, account, request));
  });

  app.post("/api/pools/:id/burn", async (req: PoolParamsRoute<BurnInput>, reply: FastifyReply) => {
    const parsed = burnSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const { account, ...request } = parsed.data;
    return reply.send(await app.pools.burn(req.params.id, account, request));
  });

  app.post("/api/pools/:id/swap-mint", async (req: PoolParamsRoute<SwapMintInput>, reply: FastifyReply) => {
    const parsed = swapMintSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const { account, ...request } = parsed.data;
    return reply.send(await app.pools.swapMint(req.params.id, account, request));
  });

  app.post("/api/pools/:id/burn-swap", async (req: PoolParamsRoute<BurnSwapInput>, reply: FastifyReply) => {
    const parsed = burnSwapSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    const { account, ...request } = parsed.data;
    return reply.send(await app.pools.burnSwap(req.params.id, account, request));
  });
}
