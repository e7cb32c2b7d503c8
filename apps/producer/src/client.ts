import { Agent, fetch as undiciFetch } from "undici";
import type { AppEnv } from "../../common/src/env.js";
import { isCertificateError, normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";
import { withRetry, type Sleep } from "../../common/src/retry.js";
import { selectAuthor } from "../../common/src/sites.js";
import type { FailureReason, SiteConfig } from "../../common/src/types.js";
import type { PromptRenderer } from "./genkit.js";
import { parseModelJson } from "./response.js";
import {
  ChatCompletionSchema,
  type ChatCompletionRequest,
  type ModelObject,
} from "./schema.js";

const ERROR_BODY_LIMIT = 1000;

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
  insecure: boolean;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export type ChatTransport = (request: TransportRequest) => Promise<TransportResponse>;

export type GenerationResult =
  | { ok: true; raw: ModelObject }
  | { ok: false; failure: FailureReason };

export interface PostGenerator {
  generate(topic: string, site: SiteConfig): Promise<GenerationResult>;
}

export interface GenerationClientOptions {
  apiKey: string;
  model: string;
  apiUrl: string;
  maxOutputTokens: number;
  temperature: number;
  timeoutMs: number;
  retries: number;
  retryBackoffMs: number;
  insecureFallback: boolean;
  renderer: PromptRenderer;
  transport?: ChatTransport;
  sleep?: Sleep;
  now?: () => Date;
  random?: () => number;
}

let insecureAgent: Agent | null = null;

export const fetchTransport: ChatTransport = async (request) => {
  if (request.insecure && !insecureAgent) {
    insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
  }

  const response = await undiciFetch(request.url, {
    method: "POST",
    headers: request.headers,
    body: request.body,
    signal: AbortSignal.timeout(request.timeoutMs),
    ...(request.insecure && insecureAgent ? { dispatcher: insecureAgent } : {}),
  });

  return { status: response.status, body: await response.text() };
};

function isServerError(response: TransportResponse): boolean {
  return response.status >= 500 && response.status <= 599;
}

export class GenerationClient implements PostGenerator {
  private readonly transport: ChatTransport;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(private readonly options: GenerationClientOptions) {
    this.transport = options.transport ?? fetchTransport;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  static fromEnv(
    env: AppEnv,
    renderer: PromptRenderer,
    overrides: Partial<GenerationClientOptions> = {},
  ): GenerationClient {
    return new GenerationClient({
      apiKey: env.GPT_API_KEY ?? "",
      model: env.MODEL_NAME,
      apiUrl: env.MODEL_API_URL,
      maxOutputTokens: env.MODEL_MAX_OUTPUT_TOKENS,
      temperature: env.MODEL_TEMPERATURE,
      timeoutMs: env.MODEL_TIMEOUT_MS,
      retries: env.MODEL_RETRY_COUNT,
      retryBackoffMs: env.MODEL_RETRY_BACKOFF_MS,
      insecureFallback: env.MODEL_TLS_INSECURE_FALLBACK,
      renderer,
      ...overrides,
    });
  }

  async buildRequest(topic: string, site: SiteConfig): Promise<ChatCompletionRequest> {
    const author = selectAuthor(site, null, this.random);
    const messages = await this.options.renderer.render(site.promptName, {
      topic,
      year: this.now().getFullYear(),
      categories: site.allowedCategories.join(" | "),
      author: author.name,
    });

    return {
      model: this.options.model,
      messages,
      max_completion_tokens: this.options.maxOutputTokens,
      temperature: this.options.temperature,
    };
  }

  private send(body: string, insecure: boolean): Promise<TransportResponse> {
    return this.transport({
      url: this.options.apiUrl,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Content-Type": "application/json",
      },
      body,
      timeoutMs: this.options.timeoutMs,
      insecure,
    });
  }

  private sendWithRetry(body: string, insecure: boolean): Promise<TransportResponse> {
    return withRetry(
      insecure ? "model-completion:insecure" : "model-completion",
      {
        retries: this.options.retries,
        initialBackoffMs: this.options.retryBackoffMs,
        sleep: this.options.sleep,
      },
      () => this.send(body, insecure),
      isServerError,
    );
  }

  private async exchange(body: string): Promise<TransportResponse | FailureReason> {
    try {
      return await this.sendWithRetry(body, false);
    } catch (error) {
      if (!this.options.insecureFallback || !isCertificateError(error)) {
        return { kind: "transport", message: normalizeError(error) };
      }

      logger.warn("certificate verification failed, retrying once without verification", {
        url: this.options.apiUrl,
        message: normalizeError(error),
      });

      try {
        return await this.send(body, true);
      } catch (fallbackError) {
        return {
          kind: "transport",
          message: `certificate verification failed (${normalizeError(
            error,
          )}) and the insecure retry failed (${normalizeError(fallbackError)})`,
        };
      }
    }
  }

  async generate(topic: string, site: SiteConfig): Promise<GenerationResult> {
    let request: ChatCompletionRequest;
    try {
      request = await this.buildRequest(topic, site);
    } catch (error) {
      return { ok: false, failure: { kind: "transport", message: `prompt rendering failed: ${normalizeError(error)}` } };
    }

    logger.info("model request started", {
      site: site.id,
      topic,
      model: request.model,
      maxCompletionTokens: request.max_completion_tokens,
    });

    const exchanged = await this.exchange(JSON.stringify(request));
    if ("kind" in exchanged) {
      return { ok: false, failure: exchanged };
    }

    if (exchanged.status !== 200) {
      return {
        ok: false,
        failure: {
          kind: "api",
          status: exchanged.status,
          body: exchanged.body.slice(0, ERROR_BODY_LIMIT),
        },
      };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(exchanged.body);
    } catch (error) {
      return {
        ok: false,
        failure: { kind: "api", status: 200, body: `unreadable completion body: ${normalizeError(error)}` },
      };
    }

    const completion = ChatCompletionSchema.safeParse(payload);
    if (!completion.success) {
      return {
        ok: false,
        failure: {
          kind: "api",
          status: 200,
          body: `unexpected completion payload: ${exchanged.body.slice(0, ERROR_BODY_LIMIT)}`,
        },
      };
    }

    const content = completion.data.choices[0].message.content ?? "";
    const parsed = parseModelJson(content.trim());
    if (!parsed.ok) {
      return { ok: false, failure: parsed.failure };
    }

    logger.info("model response parsed", { site: site.id, topic, characters: content.length });
    return { ok: true, raw: parsed.value };
  }
}
