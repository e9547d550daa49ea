/**
 * POST /eligibility/v1/turn
 *
 * One conversational turn. Model and retrieval failures are absorbed into
 * a NeedMoreInfo decision; only bad input, rate limiting and a turn that
 * outlives the route budget (or a client that hangs up) produce error.v1.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { TurnRequestSchema } from "../schemas/turn.js";
import type { EligibilityPipeline } from "../orchestrator/index.js";
import { getRequestId } from "../utils/request-id.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { linkAbort } from "../utils/abort.js";
import { log } from "../utils/telemetry.js";
import { ROUTE_TIMEOUT_MS } from "../config/timeouts.js";

export interface TurnRouteOptions {
  pipeline: EligibilityPipeline;
  /** Whole-turn budget; defaults to ROUTE_TIMEOUT_MS */
  timeoutMs?: number;
}

export default async function route(app: FastifyInstance, opts: TurnRouteOptions) {
  const timeoutMs = opts.timeoutMs ?? ROUTE_TIMEOUT_MS;

  app.post("/eligibility/v1/turn", async (req: FastifyRequest, reply: FastifyReply) => {
    const requestId = getRequestId(req);

    const parsed = TurnRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      log.warn({ request_id: requestId, errors: parsed.error.flatten() }, "Turn request validation failed");
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, requestId));
    }

    // Client disconnect cancels the turn; nothing from it is checkpointed
    const disconnect = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) disconnect.abort();
    };
    reply.raw.once("close", onClose);

    const { signal, dispose } = linkAbort(timeoutMs, disconnect.signal);
    try {
      const response = await opts.pipeline.runTurn(parsed.data, { requestId, abortSignal: signal });
      return reply.code(200).send(response);
    } finally {
      dispose();
      reply.raw.off("close", onClose);
    }
  });
}
