/**
 * Inference Module
 *
 * @module
 */

export * from "./openai-inference-service.js";
export * from "../interfaces/IInferenceService.js";

import type { IInferenceService } from "../interfaces/IInferenceService.js";
import type { InferenceConfig } from "../../utils/validation.js";
import { OpenAIInferenceService } from "./openai-inference-service.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("inference");

/**
 * Builds the configured inference service, or null when inference is
 * disabled or no API key is available.
 */
export function createInferenceService(config: InferenceConfig): IInferenceService | null {
  if (!config.enabled) {
    return null;
  }
  if (!config.apiKey) {
    logger.info("OPENAI_API_KEY not set, running without inference");
    return null;
  }
  return new OpenAIInferenceService(config);
}
