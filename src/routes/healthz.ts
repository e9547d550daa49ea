import type { FastifyInstance } from "fastify";
import { SERVICE_VERSION } from "../version.js";
import type { LLMProviderT } from "../config/index.js";
import type { EligibilityPipeline } from "../orchestrator/index.js";
import { HTTP_CLIENT_TIMEOUT_MS, ROUTE_TIMEOUT_MS } from "../config/timeouts.js";

export const SERVICE_NAME = "donor-eligibility-service";

export interface HealthRouteOptions {
  pipeline: EligibilityPipeline;
  provider: LLMProviderT;
}

export default async function route(app: FastifyInstance, opts: HealthRouteOptions) {
  app.get("/healthz", async () => {
    const description = opts.pipeline.describe();
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      provider: opts.provider,
      models: description.models,
      retriever: description.retriever,
      checkpoint_store: description.checkpoint_store,
      timeouts: {
        route_ms: ROUTE_TIMEOUT_MS,
        http_client_ms: HTTP_CLIENT_TIMEOUT_MS,
      },
    };
  });
}
