import { Artifact, ToolResult } from './types';

export const ARTIFACT_REF_FIELD = 'chart_url';
export const ARTIFACT_KIND_FIELD = 'chart_type';
const DEFAULT_ARTIFACT_KIND = 'chart';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Tool servers often answer with JSON inside a string; hand that on as structure. */
export function normalizePayload(raw: unknown): unknown {
  if (typeof raw !== 'string') {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

export function extractArtifact(payload: unknown): Artifact | undefined {
  if (!isRecord(payload)) {
    return undefined;
  }
  const ref = payload[ARTIFACT_REF_FIELD];
  if (typeof ref !== 'string' || ref.length === 0) {
    return undefined;
  }
  const kind = payload[ARTIFACT_KIND_FIELD];
  return { kind: typeof kind === 'string' && kind.length > 0 ? kind : DEFAULT_ARTIFACT_KIND, ref };
}

/** Body of the tool-result message the model sees. */
export function formatForModel(result: ToolResult): string {
  if (result.success) {
    return JSON.stringify(result.payload ?? null, null, 2);
  }
  return JSON.stringify({ error: result.error, tool: result.name });
}
