import { ToolErrorReason } from '../../utils/errors';

export const TOOL_PROVIDER = Symbol('TOOL_PROVIDER');

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON schema of the arguments object. */
  parameters: Record<string, unknown>;
}

export interface ToolProvider {
  listTools(): Promise<ToolDefinition[]>;
  /** Resolves to the raw tool output, rejects on any failure. */
  call(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface Artifact {
  kind: string;
  ref: string;
}

export type ToolResult =
  | { id: string; name: string; success: true; payload: unknown; artifact?: Artifact }
  | { id: string; name: string; success: false; reason: ToolErrorReason; error: string };
