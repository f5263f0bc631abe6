import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { EngineConfig, HostedEngineConfig } from "../../config/app-config";
import { HostedModelEngine } from "./hosted-engine";
import { LocalModelEngine } from "./local-engine";
import type { TextGenerator } from "./types";

export { EngineResponseError, EngineUnavailable, errorMessage } from "./errors";
export { HostedModelEngine } from "./hosted-engine";
export { LocalModelEngine } from "./local-engine";
export { withTransientRetry } from "./retry";
export type { RetryPolicy } from "./retry";
export type { EngineInfo, GenerateOptions, SelfTestResult, TextGenerator } from "./types";

function hostedLanguageModel(config: HostedEngineConfig): LanguageModel {
  switch (config.provider) {
    case "openai":
      return createOpenAI({ apiKey: config.apiKey })(config.model);
    case "anthropic":
      return createAnthropic({ apiKey: config.apiKey })(config.model);
  }
}

/** Builds the single engine this process will use. */
export function createTextGenerator(config: EngineConfig): TextGenerator {
  if (config.engine === "local") {
    console.log(`engines: Using Ollama at ${config.url} with ${config.model}`);
    return new LocalModelEngine({ url: config.url, model: config.model, limits: config.limits });
  }

  console.log(`engines: Using ${config.provider} with ${config.model}`);
  return new HostedModelEngine({
    model: hostedLanguageModel(config),
    provider: config.provider,
    modelId: config.model,
    limits: config.limits,
  });
}
