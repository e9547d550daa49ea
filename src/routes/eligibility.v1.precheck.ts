import type { FastifyInstance } from "fastify";
import { PrecheckRequestSchema } from "../schemas/turn.js";
import { computeEligibility } from "../rules/rule-engine.js";
import { getRequestId } from "../utils/request-id.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";

/**
 * POST /eligibility/v1/precheck: rule engine only, no model call.
 */
export default async function route(app: FastifyInstance) {
  app.post("/eligibility/v1/precheck", async (req, reply) => {
    const parsed = PrecheckRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, getRequestId(req)));
    }
    return reply.send(computeEligibility(parsed.data.donor));
  });
}
