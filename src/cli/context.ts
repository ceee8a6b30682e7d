/**
 * Wiring shared by the CLI commands: configuration, store, parser,
 * inference and the orchestrator built on them.
 */

import { loadConfig } from "../core/config.js";
import { createGraphStore } from "../core/graph/index.js";
import { createSyntaxParser } from "../core/parser/index.js";
import { createInferenceService } from "../core/inference/index.js";
import { PipelineOrchestrator } from "../core/pipeline/index.js";
import type { IGraphStore } from "../core/interfaces/IGraphStore.js";
import type { ISyntaxParser } from "../core/interfaces/ISyntaxParser.js";
import type { PipelineConfig } from "../utils/validation.js";

export interface CliContext {
  config: PipelineConfig;
  store: IGraphStore;
  parser: ISyntaxParser;
  orchestrator: PipelineOrchestrator;
  close(): Promise<void>;
}

export async function openContext(projectRoot: string = process.cwd()): Promise<CliContext> {
  const config = loadConfig({ projectRoot });
  const store = createGraphStore(config.store);
  await store.initialize();

  let parser: ISyntaxParser;
  try {
    parser = await createSyntaxParser();
  } catch (error) {
    await store.close();
    throw error;
  }

  const orchestrator = new PipelineOrchestrator({
    store,
    parser,
    inference: createInferenceService(config.inference),
    config,
  });

  return {
    config,
    store,
    parser,
    orchestrator,
    async close() {
      await parser.close();
      await store.close();
    },
  };
}
