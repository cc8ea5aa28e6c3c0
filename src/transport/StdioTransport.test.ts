import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TransportError } from '../errors';
import { ManagedProcess, ProcessSupervisor } from '../process/ProcessSupervisor';
import { stubSpec } from '../testing/stub';
import { StdioTransport } from './StdioTransport';

const supervisor = new ProcessSupervisor({ pollIntervalMs: 20, terminationGraceMs: 500 });

async function startStub(): Promise<ManagedProcess> {
  const managed = await supervisor.start(stubSpec(), { name: 'stub' });
  await supervisor.awaitReady(managed, 5_000);
  return managed;
}

afterEach(async () => {
  await supervisor.stopAll();
});

describe('StdioTransport (sequential)', () => {
  let managed: ManagedProcess;
  let transport: StdioTransport;

  beforeEach(async () => {
    managed = await startStub();
    transport = new StdioTransport(managed);
  });

  it('numbers requests from 1 and returns the reply to each', async () => {
    expect(await transport.request('echo', { value: 'a' })).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: { received: { value: 'a' }, id: 1 },
    });
    expect(await transport.request('echo', { value: 'b' })).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { received: { value: 'b' }, id: 2 },
    });
  });

  it('gives every concurrent caller its own reply', async () => {
    const responses = await Promise.all([1, 2, 3, 4, 5].map((n) => transport.request('echo', { n })));

    responses.forEach((response, index) => {
      expect(response.result).toEqual({ received: { n: index + 1 }, id: response.id });
    });
    expect(new Set(responses.map((r) => r.id)).size).toBe(5);
  });

  it('skips notifications and blank lines while waiting for a reply', async () => {
    const response = await transport.request('stub/notifications');

    expect(response).toEqual({ jsonrpc: '2.0', id: 1, result: { ok: true } });
  });

  it('writes notifications without an id', async () => {
    await transport.notify('notifications/initialized');

    const response = await transport.request('stub/received');
    expect(response.result).toEqual({ notifications: ['notifications/initialized'] });
  });

  it('passes JSON-RPC errors through as responses', async () => {
    const response = await transport.request('no/such/method');

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: -32601, message: 'Method not found: no/such/method' },
    });
  });

  it('rejects a line that is not JSON and keeps working', async () => {
    await expect(transport.request('stub/garbage')).rejects.toMatchObject({ kind: 'malformed', code: 'transport_malformed' });

    const response = await transport.request('echo', { after: 'garbage' });
    expect(response.result).toEqual({ received: { after: 'garbage' }, id: 2 });
  });

  it('never hands a late reply to the next caller after a timeout', async () => {
    await expect(transport.request('echo', { delayMs: 300 }, 100)).rejects.toMatchObject({
      kind: 'timeout',
      message: 'No reply to #1 (echo) within 100ms',
    });

    const response = await transport.request('echo', { n: 2 });
    expect(response).toEqual({ jsonrpc: '2.0', id: 2, result: { received: { n: 2 }, id: 2 } });
  });

  it('waits out notifications before a late reply so it cannot reach the next caller', async () => {
    await expect(
      transport.request('echo', { tag: 'slow', notifyAfterMs: 150, delayMs: 300 }, 100),
    ).rejects.toMatchObject({ kind: 'timeout' });

    const response = await transport.request('echo', { tag: 'fast', delayMs: 200 }, 2_000);

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 2,
      result: { received: { tag: 'fast', delayMs: 200 }, id: 2 },
    });
  });

  it('returns replies that bend JSON-RPC as the child wrote them', async () => {
    const response = await transport.request('stub/odd-error');

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 1,
      error: { code: 'E_TOOL', message: 'bad', calls: 1 },
    });
  });

  it('tracks requests while they await a reply', async () => {
    const call = await transport.send('echo', { delayMs: 100 });

    expect(transport.pendingRequests).toEqual([{ id: 1, method: 'echo', submittedAt: call.submittedAt }]);
    await call.response;
    expect(transport.pendingRequests).toEqual([]);
  });

  it('reports end of output as no-response, then refuses new requests', async () => {
    await expect(transport.request('stub/exit')).rejects.toMatchObject({ kind: 'no-response' });

    await expect(transport.request('echo')).rejects.toMatchObject({ kind: 'closed' });
  });

  it('refuses requests once the process is stopped', async () => {
    await supervisor.stop(managed);

    const attempt = transport.request('echo');
    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toMatchObject({ kind: 'closed' });
  });

  describe('forward', () => {
    it('restores the caller id on the reply', async () => {
      const response = await transport.forward({ jsonrpc: '2.0', id: 'client-7', method: 'echo', params: { x: 1 } });

      expect(response).toEqual({ jsonrpc: '2.0', id: 'client-7', result: { received: { x: 1 }, id: 1 } });
    });

    it('keeps a null caller id', async () => {
      const response = await transport.forward({ id: null, method: 'echo' });

      expect(response).toEqual({ jsonrpc: '2.0', id: null, result: { received: null, id: 1 } });
    });

    it('returns null for notifications', async () => {
      expect(await transport.forward({ method: 'notifications/initialized' })).toBeNull();

      const response = await transport.request('stub/received');
      expect(response.result).toEqual({ notifications: ['notifications/initialized'] });
    });
  });
});

describe('StdioTransport (by-id)', () => {
  let transport: StdioTransport;

  beforeEach(async () => {
    transport = new StdioTransport(await startStub(), { correlation: 'by-id' });
  });

  it('matches replies that arrive out of order', async () => {
    const slow = transport.request('echo', { n: 1, delayMs: 200 });
    const fast = transport.request('echo', { n: 2, delayMs: 10 });

    const order: number[] = [];
    void slow.then(() => order.push(1));
    void fast.then(() => order.push(2));
    const [slowReply, fastReply] = await Promise.all([slow, fast]);

    expect(order).toEqual([2, 1]);
    expect(slowReply).toEqual({ jsonrpc: '2.0', id: 1, result: { received: { n: 1, delayMs: 200 }, id: 1 } });
    expect(fastReply).toEqual({ jsonrpc: '2.0', id: 2, result: { received: { n: 2, delayMs: 10 }, id: 2 } });
  });

  it('drops unparseable lines and times out the request', async () => {
    await expect(transport.request('stub/garbage', undefined, 200)).rejects.toMatchObject({ kind: 'timeout' });

    const response = await transport.request('echo', { ok: true });
    expect(response.result).toEqual({ received: { ok: true }, id: 2 });
  });

  it('rejects every pending request when the output ends', async () => {
    const [silent, exit] = await Promise.allSettled([
      transport.request('stub/silent'),
      transport.request('stub/exit'),
    ]);

    expect(silent).toMatchObject({ status: 'rejected', reason: { kind: 'no-response' } });
    expect(exit).toMatchObject({ status: 'rejected', reason: { kind: 'no-response' } });
    expect(transport.pendingRequests).toEqual([]);
  });
});
