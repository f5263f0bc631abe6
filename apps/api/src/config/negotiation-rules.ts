/**
 * Negotiation pipeline constants
 * Centralized location for sampling knobs and output limits
 */

export const NEGOTIATION_RULES = {
  /**
   * Sampling temperature per model call
   */
  temperature: {
    proposals: 0.65,
    strictRegeneration: 0.6, // second attempt after a parse failure
    vendorSimulation: 0.5,
    strategyDebate: 0.7,
    selfTest: 0,
  },

  /**
   * Output length (tokens) per model call
   */
  maxTokens: {
    proposals: 1200,
    vendorSimulation: 500,
    strategyDebate: 600,
    selfTest: 10,
  },

  /**
   * Proposal drafting
   */
  proposals: {
    maxMessageWords: 140,
  },

  /**
   * Pre-flight diagnostics
   */
  selfTest: {
    tagsTimeoutMs: 5000,
  },
} as const;
