import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { BattleService } from "../service/battle.service";
import { BattleError, ValidationError } from "../domain/errors";
import { isRecord } from "../domain/validate";

type IdParams = { Params: { id: string } };

function sendError(req: FastifyRequest, reply: FastifyReply, e: unknown) {
  if (e instanceof BattleError) {
    return reply.status(e.statusCode).send({ ok: false, code: e.code, message: e.message });
  }
  req.log.error({ err: e }, "unhandled route error");
  return reply.status(500).send({ ok: false, code: "INTERNAL", message: "internal error" });
}

function optionalIntParam(query: unknown, key: string): number | undefined {
  if (!isRecord(query) || query[key] == null) return undefined;
  const n = Number(query[key]);
  if (!Number.isInteger(n)) throw new ValidationError(`invalid query param: ${key}`);
  return n;
}

export async function battleRoutes(app: FastifyInstance, opts: { battles: BattleService }) {
  const battles = opts.battles;

  app.post("/battles", async (req, reply) => {
    try {
      const result = await battles.createBattle(req.body);
      return reply.status(201).send({ ok: true, ...result });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<IdParams>("/battles/:id/state", async (req, reply) => {
    try {
      const state = battles.getState(req.params.id);
      return reply.send({ ok: true, battle_id: req.params.id, state });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<IdParams>("/battles/:id/events", async (req, reply) => {
    try {
      const { id } = req.params;
      const from = optionalIntParam(req.query, "from");
      const to = optionalIntParam(req.query, "to");
      const events = battles.getEvents(id, from, to);

      return reply.send({
        ok: true,
        battle_id: id,
        from: from ?? null,
        to: to ?? null,
        count: events.length,
        events,
      });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<IdParams>("/battles/:id/statistics", async (req, reply) => {
    try {
      const statistics = battles.getStatistics(req.params.id);
      return reply.send({ ok: true, battle_id: req.params.id, ...statistics });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.post<IdParams>("/battles/:id/actions", async (req, reply) => {
    try {
      const result = await battles.submitAction(req.params.id, req.body);
      return reply.status(200).send({ ok: true, ...result });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.delete<IdParams>("/battles/:id", async (req, reply) => {
    try {
      return reply.send({ ok: true, ...battles.endBattle(req.params.id) });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get("/records", async (req, reply) => {
    try {
      const records = await battles.listRecords(optionalIntParam(req.query, "limit"));
      return reply.send({ ok: true, count: records.length, records });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });

  app.get<IdParams>("/records/:id", async (req, reply) => {
    try {
      const record = await battles.getRecord(req.params.id);
      return reply.send({ ok: true, record });
    } catch (e) {
      return sendError(req, reply, e);
    }
  });
}
