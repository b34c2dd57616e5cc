import { randomUUID } from 'crypto';

/**
 * Generate a short run ID for tracing one packing slip through the pipeline.
 * Uses first 8 chars of a UUID for brevity in logs.
 */
export function generateRunId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context object passed through the pipeline.
 * Every stage receives this and includes it in log calls.
 */
export interface RunContext {
  runId: string;
  documentId?: string;
  service: string;
}

export function createRunContext(service: string, documentId?: string): RunContext {
  return {
    runId: generateRunId(),
    documentId,
    service,
  };
}
