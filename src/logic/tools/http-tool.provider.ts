import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { Environment } from '../../config/configuration';
import { ToolInvocationError } from '../../utils/errors';
import { isRecord } from './tool-result';
import { ToolDefinition, ToolProvider } from './types';

const catalogueSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().default(''),
      parameters: z.record(z.unknown()).default({ type: 'object', properties: {} }),
    }),
  ),
});

/**
 * Talks to the tool server: `GET /tools` for the catalogue and
 * `POST /tools/:name` with `{ arguments }` for a call.
 */
@Injectable()
export class HttpToolProvider implements ToolProvider {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string> = {
    'Content-Type': 'application/json',
    Accept: 'application/json',
  };

  constructor(configService: ConfigService<Environment, true>) {
    this.baseUrl = configService.get('TOOL_SERVER_URL', { infer: true }).replace(/\/+$/, '');
  }

  async listTools(): Promise<ToolDefinition[]> {
    const resp = await fetch(`${this.baseUrl}/tools`, { headers: this.headers });
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`Tool server error ${resp.status}: ${text}`);
    }
    return catalogueSchema.parse(await resp.json()).tools;
  }

  async call(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const resp = await fetch(`${this.baseUrl}/tools/${encodeURIComponent(name)}`, {
      method: 'POST',
      headers: this.headers,
      body: JSON.stringify({ arguments: args }),
      signal,
    });
    if (resp.status === 404) {
      throw new ToolInvocationError('not_found', name);
    }
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`Tool ${name} failed with ${resp.status}: ${text}`);
    }
    const body: unknown = await resp.json();
    return isRecord(body) && 'result' in body ? body.result : body;
  }
}
