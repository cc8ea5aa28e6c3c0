import { z } from 'zod';
import { BridgeError, RemoteError, UnknownToolError } from '../errors';
import { createLogger } from '../logger';
import { responseError, JsonRpcParams, MCPResponse } from '../protocol';
import type { ToolDescriptor, ToolParameter } from '../types';

const log = createLogger('catalog');

/** Anything that can issue a JSON-RPC call and hand back the reply. */
export interface ToolCaller {
  call(method: string, params?: JsonRpcParams): Promise<MCPResponse>;
}

const propertySchema = z
  .object({
    type: z.union([z.string(), z.array(z.string())]).optional(),
    description: z.string().optional(),
  })
  .passthrough();

const inputSchemaSchema = z
  .object({
    properties: z.record(propertySchema).optional(),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

const toolSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    inputSchema: inputSchemaSchema.optional(),
  })
  .passthrough();

const toolListSchema = z
  .object({
    tools: z.array(toolSchema),
  })
  .passthrough();

type RawTool = z.infer<typeof toolSchema>;

function describeParameters(inputSchema: z.infer<typeof inputSchemaSchema> | undefined): Record<string, ToolParameter> {
  const required = new Set(inputSchema?.required ?? []);
  const parameters: Record<string, ToolParameter> = {};
  for (const [name, property] of Object.entries(inputSchema?.properties ?? {})) {
    const type = property.type ?? 'string';
    parameters[name] = {
      type: Array.isArray(type) ? type.join('|') : type,
      description: property.description ?? '',
      required: required.has(name),
    };
  }
  return parameters;
}

function toDescriptor(tool: RawTool): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: tool.inputSchema ?? {},
    parameters: describeParameters(tool.inputSchema),
  };
}

/**
 * Tools the attached server advertised in its last `tools/list` reply.
 */
export class ToolCatalog {
  private tools = new Map<string, ToolDescriptor>();

  constructor(private readonly caller: ToolCaller) {}

  get size(): number {
    return this.tools.size;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  get(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  /** Forget every cached tool, e.g. once the server that listed them is gone. */
  clear(): void {
    this.tools = new Map();
  }

  /** Replace the cache with the server's current listing. A failed refresh keeps the old one. */
  async refresh(): Promise<ToolDescriptor[]> {
    const response = await this.caller.call('tools/list', {});
    const error = responseError(response);
    if (error) {
      throw new RemoteError('tools/list', error);
    }

    const parsed = toolListSchema.safeParse(response.result);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new BridgeError(`Invalid tools/list result: ${issues.join('; ')}`, 'invalid_tool_list');
    }

    const next = new Map<string, ToolDescriptor>();
    for (const tool of parsed.data.tools) {
      if (next.has(tool.name)) {
        log.warn(`Duplicate tool ${tool.name} in listing; keeping the last one`);
      }
      next.set(tool.name, toDescriptor(tool));
    }
    this.tools = next;

    log.info(`📋 Cached ${next.size} tools: ${[...next.keys()].join(', ')}`);
    return this.list();
  }

  /** Call a cached tool and return the reply's `result`. */
  async invoke(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    if (!this.tools.has(name)) {
      throw new UnknownToolError(name);
    }
    const response = await this.caller.call('tools/call', { name, arguments: args });
    const error = responseError(response);
    if (error) {
      throw new RemoteError(`tools/call ${name}`, error);
    }
    return response.result;
  }
}
