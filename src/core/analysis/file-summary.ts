/**
 * Per-file view of the extracted entities
 *
 * @module
 */

import type { IGraphReader } from "../interfaces/IGraphStore.js";
import { isLive, readNodes, type TypedNode } from "../graph/graph-access.js";
import {
  ClassSchema,
  EnumSchema,
  ExtensionSchema,
  FileSchema,
  FunctionSchema,
  type ClassEntity,
  type EnumEntity,
  type ExtensionEntity,
  type FileEntity,
  type FunctionEntity,
} from "../../types/entities.js";

export interface FileSummary {
  file: FileEntity;
  functions: FunctionEntity[];
  classes: ClassEntity[];
  enums: EnumEntity[];
  extensions: ExtensionEntity[];
}

function live<T>(nodes: TypedNode<T>[]): T[] {
  return nodes.filter(isLive).map((node) => node.entity);
}

/**
 * Live files of a project with their live entities, in discovery order.
 */
export async function loadFileSummaries(reader: IGraphReader, projectId: string): Promise<FileSummary[]> {
  const [files, functions, classes, enums, extensions] = await Promise.all([
    readNodes(reader, projectId, "File", FileSchema),
    readNodes(reader, projectId, "Function", FunctionSchema),
    readNodes(reader, projectId, "Class", ClassSchema),
    readNodes(reader, projectId, "Enum", EnumSchema),
    readNodes(reader, projectId, "Extension", ExtensionSchema),
  ]);

  const summaries = new Map<string, FileSummary>();
  for (const file of live(files)) {
    summaries.set(file.path, { file, functions: [], classes: [], enums: [], extensions: [] });
  }
  for (const fn of live(functions)) summaries.get(fn.file_path)?.functions.push(fn);
  for (const cls of live(classes)) summaries.get(cls.file_path)?.classes.push(cls);
  for (const declared of live(enums)) summaries.get(declared.file_path)?.enums.push(declared);
  for (const extension of live(extensions)) summaries.get(extension.file_path)?.extensions.push(extension);

  return [...summaries.values()].sort((a, b) => a.file.discovery_index - b.file.discovery_index);
}
