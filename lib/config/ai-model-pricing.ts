/**
 * AI Model Pricing Configuration
 *
 * Prices are in USD per 1000 tokens and only feed the cost figures in the
 * AI usage log entries.
 */

export interface ModelPricing {
  inputTokenPrice: number; // Price per 1000 input tokens
  outputTokenPrice: number; // Price per 1000 output tokens
}

export const AI_MODEL_PRICING: Record<string, ModelPricing> = {
  'gpt-4o-mini': {
    inputTokenPrice: 0.00015,
    outputTokenPrice: 0.0006,
  },
  'gpt-4o': {
    inputTokenPrice: 0.0025,
    outputTokenPrice: 0.01,
  },
  'gpt-4.1-mini': {
    inputTokenPrice: 0.0004,
    outputTokenPrice: 0.0016,
  },
  'gpt-4.1': {
    inputTokenPrice: 0.002,
    outputTokenPrice: 0.008,
  },
  // Embeddings are billed on input only
  'voyage-3': {
    inputTokenPrice: 0.00006,
    outputTokenPrice: 0,
  },
  'text-embedding-3-small': {
    inputTokenPrice: 0.00002,
    outputTokenPrice: 0,
  },
};

const DEFAULT_PRICING: ModelPricing = {
  inputTokenPrice: 0.01,
  outputTokenPrice: 0.03,
};

/**
 * Get pricing for a specific model. Azure deployment names often embed the
 * model name, so a partial match is tried after the exact one; keys are
 * ordered so that more specific names match first.
 */
export function getModelPricing(model: string): ModelPricing {
  const exact = AI_MODEL_PRICING[model];
  if (exact) {
    return exact;
  }

  const lowerModel = model.toLowerCase();
  for (const [key, pricing] of Object.entries(AI_MODEL_PRICING)) {
    if (lowerModel.includes(key.toLowerCase())) {
      return pricing;
    }
  }

  return DEFAULT_PRICING;
}

export function calculateTokenCost(
  model: string,
  inputTokens: number,
  outputTokens: number,
): { inputCost: number; outputCost: number; totalCost: number } {
  const pricing = getModelPricing(model);

  const inputCost = (inputTokens / 1000) * pricing.inputTokenPrice;
  const outputCost = (outputTokens / 1000) * pricing.outputTokenPrice;

  return {
    inputCost: Math.round(inputCost * 10000) / 10000, // Round to 4 decimal places
    outputCost: Math.round(outputCost * 10000) / 10000,
    totalCost: Math.round((inputCost + outputCost) * 10000) / 10000,
  };
}
