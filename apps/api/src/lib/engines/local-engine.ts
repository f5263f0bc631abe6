/**
 * LOCAL ENGINE - Ollama server over HTTP
 *
 * POST {url}/api/generate with stream disabled; the system and user prompts are
 * folded into one completion prompt. GET {url}/api/tags lists pulled models.
 */

import axios, { type AxiosInstance } from "axios";
import type { CallLimits } from "../../config/app-config";
import { NEGOTIATION_RULES } from "../../config/negotiation-rules";
import { EngineResponseError, EngineUnavailable, errorMessage } from "./errors";
import { withTransientRetry, type RetryPolicy } from "./retry";
import type { EngineInfo, GenerateOptions, SelfTestResult, TextGenerator } from "./types";

interface OllamaGenerateResponse {
  response?: unknown;
  error?: unknown;
}

interface OllamaTagsResponse {
  models?: Array<{ name?: unknown }>;
}

// Upstream statuses that mean "busy right now", worth one more try
const TRANSIENT_STATUSES = new Set([408, 429, 502, 503, 504]);

export interface LocalEngineOptions {
  url: string;
  model: string;
  limits: CallLimits;
  /** Injected in tests; defaults to an axios instance bound to `url` */
  http?: AxiosInstance;
  sleep?: RetryPolicy["sleep"];
}

export class LocalModelEngine implements TextGenerator {
  readonly engine = "local" as const;
  private readonly http: AxiosInstance;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly options: LocalEngineOptions) {
    this.http = options.http ?? axios.create({ baseURL: options.url });
    this.retryPolicy = {
      maxAttempts: options.limits.maxAttempts,
      backoffMs: options.limits.retryBackoffMs,
      sleep: options.sleep,
    };
  }

  describe(): EngineInfo {
    return { engine: this.engine, model: this.options.model, url: this.options.url };
  }

  async generate(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateOptions = {},
  ): Promise<string> {
    return withTransientRetry("local-engine", this.retryPolicy, () =>
      this.generateOnce(systemPrompt, userPrompt, options),
    );
  }

  private async generateOnce(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateOptions,
  ): Promise<string> {
    const startTime = Date.now();
    const { model, limits } = this.options;

    const payload = {
      model,
      prompt: `System: ${systemPrompt}\n\nUser: ${userPrompt}\n\nAssistant:`,
      stream: false,
      options: {
        temperature: options.temperature ?? 0.7,
        num_predict: Math.min(options.maxTokens ?? limits.maxTokens, limits.maxTokens),
      },
    };

    let data: OllamaGenerateResponse;
    try {
      const response = await this.http.post<OllamaGenerateResponse>("/api/generate", payload, {
        signal: AbortSignal.timeout(limits.timeoutMs),
      });
      data = response.data;
    } catch (error) {
      throw this.classify(error);
    }

    if (typeof data.response !== "string") {
      throw new EngineResponseError("Ollama returned a body without a text response", {
        engine: this.engine,
      });
    }

    const text = data.response.trim();
    console.log(
      `local-engine: ${model} answered in ${Date.now() - startTime}ms (${text.length} chars)`,
    );
    return text;
  }

  /** Names of the models pulled on the Ollama server; empty if it cannot be reached. */
  async listModels(): Promise<string[]> {
    try {
      return await this.fetchModelNames();
    } catch (error) {
      console.warn(`local-engine: Could not list models: ${errorMessage(error)}`);
      return [];
    }
  }

  private async fetchModelNames(): Promise<string[]> {
    try {
      const { data } = await this.http.get<OllamaTagsResponse>("/api/tags", {
        signal: AbortSignal.timeout(NEGOTIATION_RULES.selfTest.tagsTimeoutMs),
      });
      return (data.models ?? [])
        .map((m) => m.name)
        .filter((name): name is string => typeof name === "string");
    } catch (error) {
      throw this.classify(error);
    }
  }

  async selfTest(): Promise<SelfTestResult> {
    const { model, url } = this.options;
    const result = (success: boolean, message: string): SelfTestResult => ({
      success,
      message,
      engine: this.engine,
      model,
    });

    let available: string[];
    try {
      available = await this.fetchModelNames();
    } catch (error) {
      return result(false, errorMessage(error));
    }

    if (!available.includes(model)) {
      const list = available.length > 0 ? available.join(", ") : "none";
      return result(
        false,
        `Model '${model}' not found in Ollama at ${url}. Available models: ${list}. Run: ollama pull ${model}`,
      );
    }

    try {
      const reply = await this.generate(
        "You are a helpful assistant.",
        "Reply with the single word OK.",
        {
          temperature: NEGOTIATION_RULES.temperature.selfTest,
          maxTokens: NEGOTIATION_RULES.maxTokens.selfTest,
        },
      );
      return result(true, `Ollama at ${url} answered with ${model}: "${reply.slice(0, 40)}"`);
    } catch (error) {
      return result(false, errorMessage(error));
    }
  }

  // ─── Error Classification ─────────────────────────────────────────────────

  private classify(error: unknown): EngineUnavailable | EngineResponseError {
    const { url, limits } = this.options;
    const engine = this.engine;

    if (axios.isCancel(error)) {
      return new EngineUnavailable(`Ollama did not answer within ${limits.timeoutMs}ms`, {
        engine,
        transient: true,
        cause: error,
      });
    }

    if (!axios.isAxiosError(error)) {
      return new EngineUnavailable(`Ollama request failed: ${errorMessage(error)}`, {
        engine,
        cause: error,
      });
    }

    if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
      return new EngineUnavailable(`Ollama did not answer within ${limits.timeoutMs}ms`, {
        engine,
        transient: true,
        cause: error,
      });
    }

    const response = error.response;
    if (!response) {
      return new EngineUnavailable(
        `Cannot connect to Ollama at ${url} (${error.code ?? error.message}). Make sure Ollama is running with: ollama serve`,
        { engine, transient: error.code === "ECONNRESET", cause: error },
      );
    }

    const body: unknown = response.data;
    const detail =
      typeof body === "object" && body !== null && "error" in body && typeof body.error === "string"
        ? body.error
        : `status ${response.status}`;

    if (TRANSIENT_STATUSES.has(response.status)) {
      return new EngineUnavailable(`Ollama is busy: ${detail}`, {
        engine,
        transient: true,
        cause: error,
      });
    }

    return new EngineResponseError(`Ollama rejected the request: ${detail}`, {
      engine,
      status: response.status,
      cause: error,
    });
  }
}
