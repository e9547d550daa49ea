import Anthropic from "@anthropic-ai/sdk";
import { log } from "../../utils/telemetry.js";
import { linkAbort } from "../../utils/abort.js";
import type { ChatModel, ChatPrompt, ChatResult, CallOpts } from "./types.js";
import { StrictJsonUnsupportedError, UpstreamTimeoutError, toUpstreamError } from "./errors.js";

export const DEFAULT_ANTHROPIC_MODEL = "claude-3-5-haiku-latest";

export interface AnthropicChatModelOptions {
  apiKey: string;
  model?: string;
}

const clients = new Map<string, Anthropic>();

function getClient(apiKey: string): Anthropic {
  let client = clients.get(apiKey);
  if (!client) {
    client = new Anthropic({ apiKey, maxRetries: 0 });
    clients.set(apiKey, client);
  }
  return client;
}

/**
 * Anthropic Messages API adapter.
 *
 * Messages has no JSON-object response mode: a jsonMode request is refused
 * before any network call so the caller falls back to an unconstrained
 * prompt plus JSON recovery.
 */
export class AnthropicChatModel implements ChatModel {
  readonly provider = "anthropic" as const;
  readonly model: string;
  private readonly apiKey: string;

  constructor(options: AnthropicChatModelOptions) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
  }

  async complete(prompt: ChatPrompt, opts: CallOpts): Promise<ChatResult> {
    if (prompt.jsonMode) {
      throw new StrictJsonUnsupportedError("anthropic");
    }

    const start = Date.now();
    const abort = linkAbort(opts.timeoutMs, opts.abortSignal);

    try {
      const response = await getClient(this.apiKey).messages.create(
        {
          model: this.model,
          max_tokens: prompt.maxTokens ?? 1024,
          temperature: prompt.temperature ?? 0,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
        },
        { signal: abort.signal },
      );

      const content = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("")
        .trim();

      return {
        content,
        model: response.model || this.model,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - start;
      const mapped = toUpstreamError(error, "anthropic", prompt.stage, elapsedMs, opts.requestId);
      if (mapped instanceof UpstreamTimeoutError) {
        log.warn({ request_id: opts.requestId, stage: prompt.stage, elapsed_ms: elapsedMs }, "Anthropic call timed out");
      } else {
        log.error({ request_id: opts.requestId, stage: prompt.stage, elapsed_ms: elapsedMs, error }, "Anthropic call failed");
      }
      throw mapped;
    } finally {
      abort.dispose();
    }
  }
}
