import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { accountCreditSchema, type AccountCreditInput } from "../schemas/pool.schema.js";

export async function registerAccountRoutes(app: FastifyInstance): Promise<void> {
  /** Funds an account in the in-memory vault. */
  app.post(
    "/api/accounts/:account/credit",
    async (req: FastifyRequest<{ Params: { account: string }; Body: AccountCreditInput }>, reply: FastifyReply) => {
      const parsed = accountCreditSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
      }
      return reply.send(app.pools.credit(req.params.account, parsed.data.asset, parsed.data.amount));
    }
  );

  app.get("/api/accounts/:account", async (req: FastifyRequest<{ Params: { account: string } }>, reply: FastifyReply) => {
    return reply.send(app.pools.getAccount(req.params.account));
  });
}
