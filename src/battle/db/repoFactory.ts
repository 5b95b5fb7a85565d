import { Pool, type PoolConfig } from "pg";
import { env } from "../../config/env";
import { InMemoryBattleRepository } from "./__mocks__/inMemoryBattleRepository";
import { PgBattleRepository, type BattleRepository } from "./repository";

export type RepoType = "inmem" | "pg";

export function createRepositoryFromEnv(): {
  repo: BattleRepository;
  close?: () => Promise<void>;
} {
  if (env.BATTLE_REPO === "pg") {
    const pool = new Pool(getPgConfigFromEnv());
    return {
      repo: new PgBattleRepository(pool),
      close: () => pool.end(),
    };
  }

  return { repo: new InMemoryBattleRepository() };
}

function getPgConfigFromEnv(): PoolConfig {
  if (env.DATABASE_URL) {
    return {
      connectionString: env.DATABASE_URL,
    };
  }

  const { PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE } = process.env;
  if (!PGHOST || !PGPORT || !PGUSER || !PGPASSWORD || !PGDATABASE) {
    throw new Error("Missing Postgres env vars for BATTLE_REPO=pg (PGHOST, PGPORT, PGUSER, PGPASSWORD, PGDATABASE)");
  }

  const host = PGHOST === "localhost" ? "127.0.0.1" : PGHOST;
  const port = Number(PGPORT);
  if (!Number.isFinite(port)) {
    throw new Error(`Invalid PGPORT: "${PGPORT}"`);
  }

  return { host, port, user: PGUSER, password: PGPASSWORD, database: PGDATABASE };
}
