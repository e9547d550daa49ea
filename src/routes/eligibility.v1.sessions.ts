import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { EligibilityPipeline } from "../orchestrator/index.js";
import { getRequestId } from "../utils/request-id.js";
import { buildErrorV1, zodErrorToErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";

const SessionParams = z.object({
  sessionId: z.string().trim().min(1).max(200),
});

export interface SessionRouteOptions {
  pipeline: EligibilityPipeline;
}

export default async function route(app: FastifyInstance, opts: SessionRouteOptions) {
  app.get("/eligibility/v1/sessions/:sessionId", async (req, reply) => {
    const requestId = getRequestId(req);
    const params = SessionParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, requestId));
    }

    const state = await opts.pipeline.getSession(params.data.sessionId);
    if (!state) {
      return reply.code(404).send(buildErrorV1("NOT_FOUND", "Session not found", undefined, requestId));
    }

    return reply.send({
      session_id: params.data.sessionId,
      turn_count: state.turn_count,
      history: state.history,
      slots: state.slots,
      topics: state.topics,
      decision: state.decision,
      updated_at: state.updated_at,
    });
  });

  app.delete("/eligibility/v1/sessions/:sessionId", async (req, reply) => {
    const requestId = getRequestId(req);
    const params = SessionParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send(zodErrorToErrorV1(params.error, requestId));
    }

    await opts.pipeline.resetSession(params.data.sessionId);
    emit(TelemetryEvents.SessionReset, { request_id: requestId, session_id: params.data.sessionId });
    return reply.send({ session_id: params.data.sessionId, reset: true });
  });
}
