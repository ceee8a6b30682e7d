/**
 * OpenAI Inference Service
 *
 * IInferenceService on the OpenAI chat completions API in JSON mode. Each
 * answer is parsed and validated with the request's zod schema. A call that
 * times out is aborted and tried again.
 *
 * @module
 */

import OpenAI from "openai";
import { z } from "zod";
import type {
  IInferenceService,
  InferFieldsRequest,
  InferFieldsResponse,
  InferSkeletonRequest,
  InferSkeletonResponse,
  ClassifyRequest,
  ClassifyResponse,
  MapTypeRequest,
  MapTypeResponse,
} from "../interfaces/IInferenceService.js";
import {
  InferFieldsResponseSchema,
  InferSkeletonResponseSchema,
  ClassifyResponseSchema,
  MapTypeResponseSchema,
} from "../interfaces/IInferenceService.js";
import { TransientInferenceError, ErrorCode, isMigrationError } from "../errors.js";
import type { InferenceConfig } from "../../utils/validation.js";
import { retry, timeout } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("inference");

const SYSTEM_PROMPT =
  "You are a static analysis assistant for a code migration tool. " +
  "You must answer with a single JSON object matching the requested shape and nothing else.";

/**
 * Minimal slice of the OpenAI client the service calls, so tests can pass
 * a stand-in.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: OpenAI.RequestOptions
      ): PromiseLike<OpenAI.ChatCompletion>;
    };
  };
}

export class OpenAIInferenceService implements IInferenceService {
  readonly model: string;
  private readonly client: ChatCompletionClient;
  private readonly config: InferenceConfig;

  constructor(config: InferenceConfig, client?: ChatCompletionClient) {
    this.config = config;
    this.model = config.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 0,
      });
  }

  async inferFields(request: InferFieldsRequest): Promise<InferFieldsResponse> {
    const prompt = [
      `File: ${request.filePath} (${request.language})`,
      `Structural skeleton:\n${JSON.stringify(request.skeleton)}`,
      `Fields to determine:\n${request.fields.map((field) => `- ${field}`).join("\n")}`,
      "Field meanings: class:<Name>:kind is a short tag such as plain, singleton, abstract, interface, dataclass; " +
        "decorator:<@name> is a one-line description of what the decorator does; " +
        "import:<module> is the project-relative path of the imported file.",
      'Respond as {"fields": {"<field>": "<value or null>"}} using null for anything you cannot determine.',
    ].join("\n\n");
    return this.complete("inferFields", prompt, InferFieldsResponseSchema);
  }

  async inferSkeleton(request: InferSkeletonRequest): Promise<InferSkeletonResponse> {
    const prompt = [
      `File: ${request.filePath} (${request.language})`,
      "List the top-level functions, classes (with methods, attributes and a kind tag), enums and imported modules of this file.",
      'Respond as {"functions": [...], "classes": [...], "enums": [...], "imports": ["module", ...]}. ' +
        "Functions carry name, return_type, arguments [{name, type}], decorators, is_static, is_async, docstring. " +
        "Classes carry name, type, superclasses, methods, attributes [{name, type, visibility}], docstring. " +
        "Enums carry name, values, docstring.",
      `Source:\n${request.content}`,
    ].join("\n\n");
    return this.complete("inferSkeleton", prompt, InferSkeletonResponseSchema);
  }

  async classify(request: ClassifyRequest): Promise<ClassifyResponse> {
    const prompt = [
      `File: ${request.filePath} (${request.language})`,
      `Signals: ${request.signals.length > 0 ? request.signals.join(", ") : "none"}`,
      `Declarations: ${JSON.stringify(request.summary)}`,
      'Classify the file as one of ui, logic, data, config, unknown. Respond as {"type": "...", "reason": "..."}.',
    ].join("\n\n");
    return this.complete("classify", prompt, ClassifyResponseSchema);
  }

  async mapType(request: MapTypeRequest): Promise<MapTypeResponse> {
    const target = request.targetFramework
      ? `${request.targetLanguage} (${request.targetFramework})`
      : request.targetLanguage;
    const prompt = [
      `Source language: ${request.sourceLanguage}`,
      `Target: ${target}`,
      `Type used in ${request.filePath}: ${request.typeName}`,
      'Give the closest equivalent type in the target. Respond as {"target_type": "..."} or {"target_type": null}.',
    ].join("\n\n");
    return this.complete("mapType", prompt, MapTypeResponseSchema);
  }

  /**
   * One validated completion. Timeouts and client failures are retried with
   * backoff up to `maxAttempts`; answers that do not validate are not.
   */
  private async complete<S extends z.ZodTypeAny>(operation: string, prompt: string, schema: S): Promise<z.infer<S>> {
    const startTime = Date.now();

    try {
      const answer = await retry((attempt) => this.attempt(operation, prompt, schema, attempt), {
        maxAttempts: this.config.maxAttempts,
        initialDelayMs: this.config.retryDelayMs,
        retryIf: isRetryableInference,
        onRetry: (error, attempt, delayMs) => {
          logger.debug({ operation, attempt, delayMs, err: error }, "retrying inference call");
        },
      });
      logger.debug({ operation, durationMs: Date.now() - startTime }, "inference completed");
      return answer;
    } catch (error) {
      if (isMigrationError(error)) {
        logger.warn({ operation, code: error.code }, error.message);
      }
      throw error;
    }
  }

  private async attempt<S extends z.ZodTypeAny>(
    operation: string,
    prompt: string,
    schema: S,
    attempt: number
  ): Promise<z.infer<S>> {
    const context = { model: this.model, operation };
    const controller = new AbortController();

    let response: OpenAI.ChatCompletion;
    try {
      response = await timeout(
        Promise.resolve(
          this.client.chat.completions.create(
            {
              model: this.model,
              max_tokens: this.config.maxTokens,
              temperature: this.config.temperature,
              response_format: { type: "json_object" },
              messages: [
                { role: "system", content: SYSTEM_PROMPT },
                { role: "user", content: prompt },
              ],
            },
            { timeout: this.config.timeoutMs, signal: controller.signal }
          )
        ),
        this.config.timeoutMs,
        () => {
          controller.abort();
          return new TransientInferenceError(
            `Inference timed out after ${this.config.timeoutMs}ms`,
            ErrorCode.INFERENCE_TIMEOUT,
            { ...context, attempt }
          );
        }
      );
    } catch (error) {
      if (isMigrationError(error)) throw error;
      logger.debug({ operation, attempt, err: error }, "inference call failed");
      throw new TransientInferenceError(
        error instanceof Error ? error.message : "Inference call failed",
        ErrorCode.INFERENCE_FAILED,
        { ...context, attempt }
      );
    }

    const text = response.choices[0]?.message?.content ?? "";
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (parseError) {
      throw new TransientInferenceError("Inference answer is not JSON", ErrorCode.INFERENCE_INVALID_RESPONSE, {
        ...context,
        preview: text.slice(0, 200),
        cause: String(parseError),
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new TransientInferenceError("Inference answer does not match the expected shape", ErrorCode.INFERENCE_INVALID_RESPONSE, {
        ...context,
        issues: parsed.error.errors.map((issue) => issue.message),
      });
    }
    return parsed.data;
  }
}

function isRetryableInference(error: unknown): boolean {
  return (
    error instanceof TransientInferenceError &&
    (error.code === ErrorCode.INFERENCE_TIMEOUT || error.code === ErrorCode.INFERENCE_FAILED)
  );
}
