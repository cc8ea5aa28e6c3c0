import { describe, it, expect, vi, afterAll } from 'vitest';
import { RemoteError, UnknownToolError } from '../errors';
import { ProcessSupervisor } from '../process/ProcessSupervisor';
import type { JsonRpcParams, MCPResponse } from '../protocol';
import { stubSpec } from '../testing/stub';
import { StdioTransport } from '../transport/StdioTransport';
import { ToolCaller, ToolCatalog } from './ToolCatalog';

function fakeCaller(replies: Record<string, MCPResponse>) {
  const call = vi.fn(async (method: string, _params?: JsonRpcParams): Promise<MCPResponse> => {
    const reply = replies[method];
    if (!reply) throw new Error(`unexpected call to ${method}`);
    return reply;
  });
  const caller: ToolCaller = { call };
  return { caller, call };
}

const searchTool = {
  name: 'search',
  description: 'Search the index',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'Search terms' },
      limit: { type: ['integer', 'null'] },
      filter: { description: 'Optional filter' },
    },
    required: ['query'],
  },
};

describe('ToolCatalog', () => {
  it('caches descriptors with parameters derived from the input schema', async () => {
    const { caller, call } = fakeCaller({
      'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [searchTool, { name: 'ping' }] } },
    });
    const catalog = new ToolCatalog(caller);

    const tools = await catalog.refresh();

    expect(call).toHaveBeenCalledWith('tools/list', {});
    expect(tools.map((t) => t.name)).toEqual(['search', 'ping']);
    expect(catalog.size).toBe(2);
    expect(catalog.get('search')).toEqual({
      name: 'search',
      description: 'Search the index',
      inputSchema: searchTool.inputSchema,
      parameters: {
        query: { type: 'string', description: 'Search terms', required: true },
        limit: { type: 'integer|null', description: '', required: false },
        filter: { type: 'string', description: 'Optional filter', required: false },
      },
    });
    expect(catalog.get('ping')).toEqual({ name: 'ping', description: '', inputSchema: {}, parameters: {} });
  });

  it('replaces the whole cache on refresh', async () => {
    const replies: Record<string, MCPResponse> = {
      'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [{ name: 'old' }] } },
    };
    const catalog = new ToolCatalog(fakeCaller(replies).caller);
    await catalog.refresh();

    replies['tools/list'] = { jsonrpc: '2.0', id: 2, result: { tools: [{ name: 'new' }] } };
    await catalog.refresh();

    expect(catalog.list().map((t) => t.name)).toEqual(['new']);
    expect(catalog.get('old')).toBeUndefined();
  });

  it('keeps the previous cache when the listing is an error', async () => {
    const replies: Record<string, MCPResponse> = {
      'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [{ name: 'kept' }] } },
    };
    const catalog = new ToolCatalog(fakeCaller(replies).caller);
    await catalog.refresh();

    replies['tools/list'] = { jsonrpc: '2.0', id: 2, error: { code: -32603, message: 'internal' } };

    await expect(catalog.refresh()).rejects.toBeInstanceOf(RemoteError);
    expect(catalog.list().map((t) => t.name)).toEqual(['kept']);
  });

  it('rejects a listing of the wrong shape', async () => {
    const catalog = new ToolCatalog(
      fakeCaller({ 'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [{ description: 'no name' }] } } }).caller,
    );

    await expect(catalog.refresh()).rejects.toMatchObject({
      code: 'invalid_tool_list',
      message: 'Invalid tools/list result: tools.0.name: Required',
    });
    expect(catalog.size).toBe(0);
  });

  it('invokes a cached tool and returns its result', async () => {
    const { caller, call } = fakeCaller({
      'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [searchTool] } },
      'tools/call': { jsonrpc: '2.0', id: 2, result: { content: [{ type: 'text', text: 'found' }] } },
    });
    const catalog = new ToolCatalog(caller);
    await catalog.refresh();

    const result = await catalog.invoke('search', { query: 'relay' });

    expect(call).toHaveBeenLastCalledWith('tools/call', { name: 'search', arguments: { query: 'relay' } });
    expect(result).toEqual({ content: [{ type: 'text', text: 'found' }] });
  });

  it('refuses tools that are not cached without calling the server', async () => {
    const { caller, call } = fakeCaller({});
    const catalog = new ToolCatalog(caller);

    await expect(catalog.invoke('nope')).rejects.toBeInstanceOf(UnknownToolError);
    expect(call).not.toHaveBeenCalled();
  });

  it('raises the JSON-RPC error of a failed call', async () => {
    const catalog = new ToolCatalog(
      fakeCaller({
        'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [searchTool] } },
        'tools/call': { jsonrpc: '2.0', id: 2, error: { code: -32602, message: 'bad arguments' } },
      }).caller,
    );
    await catalog.refresh();

    await expect(catalog.invoke('search')).rejects.toMatchObject({
      code: 'remote_error',
      message: 'tools/call search failed: bad arguments (code -32602)',
      error: { code: -32602, message: 'bad arguments' },
    });
  });

  it('raises errors with a string code or a bare value', async () => {
    const replies: Record<string, MCPResponse> = {
      'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [searchTool] } },
      'tools/call': { jsonrpc: '2.0', id: 2, error: { code: 'E_TOOL' } },
    };
    const catalog = new ToolCatalog(fakeCaller(replies).caller);
    await catalog.refresh();

    await expect(catalog.invoke('search')).rejects.toThrow('tools/call search failed: unknown error (code E_TOOL)');

    replies['tools/call'] = { jsonrpc: '2.0', id: 3, error: 'quota exceeded' };
    await expect(catalog.invoke('search')).rejects.toMatchObject({
      message: 'tools/call search failed: "quota exceeded"',
      error: { message: '"quota exceeded"' },
    });
  });

  it('treats a null error member as no error', async () => {
    const catalog = new ToolCatalog(
      fakeCaller({
        'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [searchTool] } },
        'tools/call': { jsonrpc: '2.0', id: 2, result: { ok: true }, error: null },
      }).caller,
    );
    await catalog.refresh();

    expect(await catalog.invoke('search')).toEqual({ ok: true });
  });

  it('forgets every tool on clear', async () => {
    const { caller } = fakeCaller({ 'tools/list': { jsonrpc: '2.0', id: 1, result: { tools: [searchTool] } } });
    const catalog = new ToolCatalog(caller);
    await catalog.refresh();

    catalog.clear();

    expect(catalog.size).toBe(0);
    await expect(catalog.invoke('search')).rejects.toBeInstanceOf(UnknownToolError);
  });
});

describe('ToolCatalog against a live server', () => {
  const supervisor = new ProcessSupervisor({ pollIntervalMs: 20 });

  afterAll(async () => {
    await supervisor.stopAll();
  });

  it('lists exactly the one echo tool and calls it', async () => {
    const managed = await supervisor.start(stubSpec(), { name: 'stub' });
    await supervisor.awaitReady(managed, 5_000);
    const transport = new StdioTransport(managed);
    const catalog = new ToolCatalog({ call: (method, params) => transport.request(method, params) });

    const tools = await catalog.refresh();

    expect(tools).toEqual([{ name: 'echo', description: '', inputSchema: {}, parameters: {} }]);
    expect(await catalog.invoke('echo', { text: 'hi' })).toEqual({
      content: [{ type: 'text', text: '{"text":"hi"}' }],
    });
  });
});
