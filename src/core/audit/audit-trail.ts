/**
 * Audit Trail
 *
 * Reports and Feedback hang off the Project node. Keys are derived from
 * the anomaly (kind + subject), so re-running a stage rewrites the same
 * entry instead of adding a copy. The latest occurrence's message and
 * details replace the earlier ones; `created_at` keeps the first sighting
 * and `updated_at` the latest. A Feedback resolution survives rewrites.
 *
 * @module
 */

import type { IGraphReader, IGraphWriter, NodeRef } from "../interfaces/IGraphStore.js";
import { keys, nodeRef, projectRef, readNodes } from "../graph/graph-access.js";
import {
  FeedbackSchema,
  ReportSchema,
  type FeedbackEntity,
  type PropertyBag,
  type ReportEntity,
} from "../../types/entities.js";
import type { NodeLabel } from "../graph/schema.js";

type AuditWriter = IGraphReader & IGraphWriter;

export interface ReportInput {
  /** Report type, e.g. MalformedInputError or DependencyCycle */
  kind: string;
  /** What the report is about; together with kind it forms the key */
  subject: string;
  message: string;
  details?: PropertyBag;
}

export interface FeedbackInput {
  kind: string;
  subject: string;
  issue: string;
  suggestion?: string | null;
  component?: string | null;
  details?: PropertyBag;
}

async function exists(reader: IGraphReader, projectId: string, label: NodeLabel, key: string): Promise<boolean> {
  const { rows } = await reader.query({ kind: "nodes", projectId, label, where: { id: key } });
  return rows.length > 0;
}

export async function writeReport(
  tx: AuditWriter,
  projectId: string,
  input: ReportInput,
  now: Date = new Date()
): Promise<NodeRef> {
  const key = keys.report(input.kind, input.subject);
  const ref = nodeRef(projectId, "Report", key);
  const properties: PropertyBag = {
    id: key,
    type: input.kind,
    subject: input.subject,
    message: input.message,
    details: input.details ?? {},
    updated_at: now.toISOString(),
  };
  if (!(await exists(tx, projectId, "Report", key))) {
    properties.created_at = now.toISOString();
  }
  await tx.upsertNode(ref, properties);
  await tx.upsertEdge("REPORTED_IN", projectRef(projectId), ref);
  return ref;
}

export async function writeFeedback(
  tx: AuditWriter,
  projectId: string,
  input: FeedbackInput,
  now: Date = new Date()
): Promise<NodeRef> {
  const key = keys.feedback(input.kind, input.subject);
  const ref = nodeRef(projectId, "Feedback", key);
  const properties: PropertyBag = {
    id: key,
    kind: input.kind,
    subject: input.subject,
    issue: input.issue,
    suggestion: input.suggestion ?? null,
    component: input.component ?? null,
    details: input.details ?? {},
    updated_at: now.toISOString(),
  };
  if (!(await exists(tx, projectId, "Feedback", key))) {
    properties.created_at = now.toISOString();
    properties.resolution = null;
  }
  await tx.upsertNode(ref, properties);
  await tx.upsertEdge("FEEDBACK_FOR", projectRef(projectId), ref);
  return ref;
}

function byCreation<T extends { created_at: string; id: string }>(a: T, b: T): number {
  return a.created_at.localeCompare(b.created_at) || a.id.localeCompare(b.id);
}

export async function listReports(reader: IGraphReader, projectId: string, kind?: string): Promise<ReportEntity[]> {
  const nodes = await readNodes(reader, projectId, "Report", ReportSchema);
  return nodes
    .map((node) => node.entity)
    .filter((report) => kind === undefined || report.type === kind)
    .sort(byCreation);
}

export async function listFeedback(reader: IGraphReader, projectId: string, kind?: string): Promise<FeedbackEntity[]> {
  const nodes = await readNodes(reader, projectId, "Feedback", FeedbackSchema);
  return nodes
    .map((node) => node.entity)
    .filter((feedback) => kind === undefined || feedback.kind === kind)
    .sort(byCreation);
}
