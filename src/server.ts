import dotenv from "dotenv";
dotenv.config();

import { buildApp } from "./app.js";
import { config } from "./config/index.js";

const fastify = await buildApp();

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info({ approximation: config.poolApproximation }, "Pool server started");
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

const shutdown = async () => {
  await fastify.close();
  process.exit(0);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

void start();
