import OpenAI from "openai";
import { Agent, setGlobalDispatcher } from "undici";
import { HTTP_CLIENT_TIMEOUT_MS } from "../../config/timeouts.js";
import { log } from "../../utils/telemetry.js";
import type { ChatModel, ChatPrompt, ChatResult, CallOpts } from "./types.js";
import { UpstreamTimeoutError, toUpstreamError } from "./errors.js";
import { linkAbort } from "../../utils/abort.js";

// Undici dispatcher timeouts
// - connectTimeout: 3s (fail fast on connection issues)
// - headers/body timeout: HTTP_CLIENT_TIMEOUT_MS (central config)
// The OpenAI SDK uses the fetch API, so the global dispatcher applies to it.
const undiciAgent = new Agent({
  connect: {
    timeout: 3000,
  },
  headersTimeout: HTTP_CLIENT_TIMEOUT_MS,
  bodyTimeout: HTTP_CLIENT_TIMEOUT_MS,
});

setGlobalDispatcher(undiciAgent);

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export interface OpenAIChatModelOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
}

// Clients are keyed by credentials so each stage reuses one connection pool
const clients = new Map<string, OpenAI>();

function getClient(apiKey: string, baseUrl: string | undefined): OpenAI {
  const key = `${baseUrl ?? "default"}::${apiKey}`;
  let client = clients.get(key);
  if (!client) {
    client = new OpenAI({
      apiKey,
      ...(baseUrl ? { baseURL: baseUrl } : {}),
      // Retries are handled by callers (one unconstrained retry)
      maxRetries: 0,
    });
    clients.set(key, client);
  }
  return client;
}

export class OpenAIChatModel implements ChatModel {
  readonly provider = "openai" as const;
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string | undefined;

  constructor(options: OpenAIChatModelOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
  }

  async complete(prompt: ChatPrompt, opts: CallOpts): Promise<ChatResult> {
    const start = Date.now();
    const client = getClient(this.apiKey, this.baseUrl);
    const abort = linkAbort(opts.timeoutMs, opts.abortSignal);

    try {
      const response = await client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          temperature: prompt.temperature ?? 0,
          ...(prompt.maxTokens !== undefined ? { max_tokens: prompt.maxTokens } : {}),
          ...(prompt.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
        },
        { signal: abort.signal },
      );

      const content = response.choices[0]?.message?.content?.trim() ?? "";
      return {
        content,
        model: response.model || this.model,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - start;
      const mapped = toUpstreamError(error, "openai", prompt.stage, elapsedMs, opts.requestId);
      if (mapped instanceof UpstreamTimeoutError) {
        log.warn({ request_id: opts.requestId, stage: prompt.stage, elapsed_ms: elapsedMs }, "OpenAI call timed out");
      } else {
        log.error({ request_id: opts.requestId, stage: prompt.stage, elapsed_ms: elapsedMs, error }, "OpenAI call failed");
      }
      throw mapped;
    } finally {
      abort.dispose();
    }
  }
}
