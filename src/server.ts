import "dotenv/config";
import Fastify from "fastify";
import { env, getMaskedDatabaseLogInfo } from "./config/env";
import { logger } from "./logging/logger";
import { battleRoutes } from "./battle/http/routes";
import { createBattleService } from "./battle/service/createBattleService";

export async function buildServer() {
  const app = Fastify({ logger });

  app.get("/health", async () => ({ ok: true }));

  if (env.BATTLE_REPO === "pg") {
    const dbInfo = getMaskedDatabaseLogInfo(env.DATABASE_URL);
    app.log.info(
      `battle DB connectionString=${dbInfo.connectionString} (db=${dbInfo.db} host=${dbInfo.host} port=${dbInfo.port} user=${dbInfo.user})`
    );
  }

  const { battles, close } = createBattleService({ logger });

  await app.register(battleRoutes, { battles });

  app.addHook("onClose", async () => {
    battles.close();
    if (close) await close();
  });

  return app;
}

async function main() {
  const app = await buildServer();
  const port = env.PORT;

  await app.listen({ port, host: "127.0.0.1" });
  app.log.info(`listening on http://127.0.0.1:${port}`);
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ err }, "server failed to start");
    process.exit(1);
  });
}
