/**
 * HOSTED ENGINE - chat-completions provider through the Vercel AI SDK
 *
 * The SDK's own retry loop is disabled (maxRetries: 0) so that timeouts and
 * rate limits go through withTransientRetry like the local engine.
 */

import { APICallError, LoadAPIKeyError, generateText, type LanguageModel } from "ai";
import type { CallLimits, HostedProvider } from "../../config/app-config";
import { NEGOTIATION_RULES } from "../../config/negotiation-rules";
import { EngineResponseError, EngineUnavailable, errorMessage } from "./errors";
import { withTransientRetry, type RetryPolicy } from "./retry";
import type { EngineInfo, GenerateOptions, SelfTestResult, TextGenerator } from "./types";

export interface HostedEngineOptions {
  model: LanguageModel;
  provider: HostedProvider;
  modelId: string;
  limits: CallLimits;
  sleep?: RetryPolicy["sleep"];
}

function isAbort(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

export class HostedModelEngine implements TextGenerator {
  readonly engine = "hosted" as const;
  private readonly retryPolicy: RetryPolicy;

  constructor(private readonly options: HostedEngineOptions) {
    this.retryPolicy = {
      maxAttempts: options.limits.maxAttempts,
      backoffMs: options.limits.retryBackoffMs,
      sleep: options.sleep,
    };
  }

  describe(): EngineInfo {
    return { engine: this.engine, model: this.options.modelId, provider: this.options.provider };
  }

  async generate(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateOptions = {},
  ): Promise<string> {
    return withTransientRetry("hosted-engine", this.retryPolicy, () =>
      this.generateOnce(systemPrompt, userPrompt, options),
    );
  }

  private async generateOnce(
    systemPrompt: string,
    userPrompt: string,
    options: GenerateOptions,
  ): Promise<string> {
    const startTime = Date.now();
    const { model, modelId, provider, limits } = this.options;

    try {
      const result = await generateText({
        model,
        system: systemPrompt,
        prompt: userPrompt,
        temperature: options.temperature ?? 0.7,
        maxTokens: Math.min(options.maxTokens ?? limits.maxTokens, limits.maxTokens),
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(limits.timeoutMs),
      });

      const text = result.text.trim();
      console.log(
        `hosted-engine: ${provider}/${modelId} answered in ${Date.now() - startTime}ms ` +
          `(${result.usage.promptTokens} prompt + ${result.usage.completionTokens} completion tokens)`,
      );
      return text;
    } catch (error) {
      throw this.classify(error);
    }
  }

  async selfTest(): Promise<SelfTestResult> {
    const { modelId, provider } = this.options;
    try {
      const reply = await this.generate(
        "You are a helpful assistant.",
        "Reply with the single word OK.",
        {
          temperature: NEGOTIATION_RULES.temperature.selfTest,
          maxTokens: NEGOTIATION_RULES.maxTokens.selfTest,
        },
      );
      return {
        success: true,
        message: `${provider} answered with ${modelId}: "${reply.slice(0, 40)}"`,
        engine: this.engine,
        model: modelId,
      };
    } catch (error) {
      return { success: false, message: errorMessage(error), engine: this.engine, model: modelId };
    }
  }

  // ─── Error Classification ─────────────────────────────────────────────────

  private classify(error: unknown): EngineUnavailable | EngineResponseError {
    const { provider, limits } = this.options;
    const engine = this.engine;

    if (isAbort(error)) {
      return new EngineUnavailable(`${provider} did not answer within ${limits.timeoutMs}ms`, {
        engine,
        transient: true,
        cause: error,
      });
    }

    if (LoadAPIKeyError.isInstance(error)) {
      return new EngineUnavailable(`${provider} API key is missing: ${error.message}`, {
        engine,
        cause: error,
      });
    }

    if (APICallError.isInstance(error)) {
      const status = error.statusCode;

      if (status === 401 || status === 403) {
        return new EngineUnavailable(
          `${provider} rejected the credentials (status ${status}). Check the API key`,
          { engine, cause: error },
        );
      }
      if (status === 429 && error.responseBody?.includes("insufficient_quota")) {
        return new EngineResponseError(`${provider} quota exhausted: ${error.message}`, {
          engine,
          status,
          cause: error,
        });
      }
      if (error.isRetryable) {
        return new EngineUnavailable(`${provider} is busy: ${error.message}`, {
          engine,
          transient: true,
          cause: error,
        });
      }
      if (status === undefined) {
        return new EngineUnavailable(`Cannot reach ${provider}: ${error.message}`, {
          engine,
          cause: error,
        });
      }
      return new EngineResponseError(`${provider} rejected the request: ${error.message}`, {
        engine,
        status,
        cause: error,
      });
    }

    return new EngineResponseError(`${provider} call failed: ${errorMessage(error)}`, {
      engine,
      cause: error,
    });
  }
}
