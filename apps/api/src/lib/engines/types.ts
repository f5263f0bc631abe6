import type { EngineName } from "../../config/app-config";

export interface GenerateOptions {
  temperature?: number;
  /** Defaults to LLM_MAX_TOKENS and is capped by it */
  maxTokens?: number;
}

export interface SelfTestResult {
  success: boolean;
  message: string;
  engine: EngineName;
  model: string;
}

export interface EngineInfo {
  engine: EngineName;
  model: string;
  provider?: string;
  url?: string;
}

/**
 * One text-completion backend. Implementations are stateless between calls.
 *
 * generate() rejects with EngineUnavailable or EngineResponseError;
 * selfTest() never rejects.
 */
export interface TextGenerator {
  readonly engine: EngineName;
  generate(systemPrompt: string, userPrompt: string, options?: GenerateOptions): Promise<string>;
  selfTest(): Promise<SelfTestResult>;
  describe(): EngineInfo;
}
