import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment } from '../../config/configuration';
import { errorMessage, ToolInvocationError } from '../../utils/errors';
import { withTimeout } from '../../utils/with-timeout';
import { extractArtifact, normalizePayload } from './tool-result';
import { TOOL_PROVIDER, ToolCall, ToolDefinition, ToolProvider, ToolResult } from './types';

@Injectable()
export class ToolGatewayService {
  private readonly logger = new Logger(ToolGatewayService.name);
  private readonly defaultTimeoutMs: number;
  private registry: Map<string, ToolDefinition> | null = null;

  constructor(
    @Inject(TOOL_PROVIDER) private readonly provider: ToolProvider,
    configService: ConfigService<Environment, true>,
  ) {
    this.defaultTimeoutMs = configService.get('TOOL_TIMEOUT_MS', { infer: true });
  }

  /**
   * Tool catalogue offered to the model. Cached after the first successful listing;
   * a failed listing yields an empty catalogue and is retried on the next call.
   */
  async catalogue(): Promise<ToolDefinition[]> {
    if (this.registry) {
      return [...this.registry.values()];
    }
    try {
      const tools = await this.provider.listTools();
      this.registry = new Map(tools.map((tool) => [tool.name, tool]));
      this.logger.log(`tool catalogue loaded: ${tools.length} tools`);
      return tools;
    } catch (error) {
      this.logger.error(`failed to list tools: ${errorMessage(error)}`);
      return [];
    }
  }

  async invoke(call: ToolCall, timeoutMs = this.defaultTimeoutMs): Promise<ToolResult> {
    const registry = this.registry ?? new Map((await this.catalogue()).map((tool) => [tool.name, tool]));
    if (!registry.has(call.name)) {
      this.logger.warn(`tool ${call.name} is not registered`);
      return { id: call.id, name: call.name, success: false, reason: 'not_found', error: 'not found' };
    }

    try {
      const raw = await withTimeout(
        (signal) => this.provider.call(call.name, call.arguments, signal),
        timeoutMs,
        () => new ToolInvocationError('timeout', call.name),
      );
      const payload = normalizePayload(raw);
      const artifact = extractArtifact(payload);
      return artifact
        ? { id: call.id, name: call.name, success: true, payload, artifact }
        : { id: call.id, name: call.name, success: true, payload };
    } catch (error) {
      return this.toFailure(call, error, timeoutMs);
    }
  }

  /** Fans out every call at once and waits for all; result i answers call i. */
  async invokeBatch(calls: ToolCall[], timeoutMs = this.defaultTimeoutMs): Promise<ToolResult[]> {
    return Promise.all(calls.map((call) => this.invoke(call, timeoutMs)));
  }

  private toFailure(call: ToolCall, error: unknown, timeoutMs: number): ToolResult {
    if (error instanceof ToolInvocationError && error.reason === 'timeout') {
      this.logger.warn(`tool ${call.name} (${call.id}) timed out after ${timeoutMs}ms`);
      return { id: call.id, name: call.name, success: false, reason: 'timeout', error: 'timeout' };
    }
    if (error instanceof ToolInvocationError && error.reason === 'not_found') {
      return { id: call.id, name: call.name, success: false, reason: 'not_found', error: 'not found' };
    }
    const message = errorMessage(error);
    this.logger.warn(`tool ${call.name} (${call.id}) failed: ${message}`);
    return { id: call.id, name: call.name, success: false, reason: 'execution_failure', error: message };
  }
}
