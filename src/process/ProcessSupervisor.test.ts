import { describe, it, expect, afterEach } from 'vitest';
import { StartFailure } from '../errors';
import { stubSpec } from '../testing/stub';
import { ProcessSupervisor } from './ProcessSupervisor';

describe('ProcessSupervisor', () => {
  const supervisor = new ProcessSupervisor({ pollIntervalMs: 20, terminationGraceMs: 300 });

  afterEach(async () => {
    await supervisor.stopAll();
  });

  describe('start', () => {
    it('spawns the command with the merged environment', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_BANNER: '' }), { name: 'stub' });

      expect(managed.running).toBe(true);
      expect(managed.pid).toBeGreaterThan(0);
      expect(managed.id).toMatch(/^stub-[0-9a-f-]{36}$/);
      expect(managed.state).toBe('starting');
      expect(supervisor.processCount).toBe(1);
    });

    it('applies overrides over the server environment', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_BANNER: 'from server env' }), {
        envOverrides: { STUB_BANNER: 'override wins', STUB_BANNER_STREAM: 'stdout' },
      });

      expect(await managed.stdout.next(5_000)).toBe('override wins');
    });

    it('reports a missing executable as StartFailure', async () => {
      const start = supervisor.start({ command: 'definitely-not-a-real-binary-xyz', args: [], env: {} });

      await expect(start).rejects.toBeInstanceOf(StartFailure);
      await expect(start).rejects.toMatchObject({ code: 'start_failure', command: 'definitely-not-a-real-binary-xyz' });
      expect(supervisor.processCount).toBe(0);
    });
  });

  describe('awaitReady', () => {
    it('is ready as soon as a success indicator appears on stderr', async () => {
      const managed = await supervisor.start(stubSpec());
      const started = Date.now();

      const result = await supervisor.awaitReady(managed, 10_000);

      expect(result).toEqual({ status: 'ready', reason: 'indicator', line: 'MCP stub server ready' });
      expect(managed.state).toBe('ready');
      expect(Date.now() - started).toBeLessThan(5_000);
    });

    it('watches stdout as well', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_BANNER: 'listening on stdio', STUB_BANNER_STREAM: 'stdout' }));

      const result = await supervisor.awaitReady(managed, 10_000);

      expect(result).toEqual({ status: 'ready', reason: 'indicator', line: 'listening on stdio' });
    });

    it('fails on an error indicator before the timeout', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_BANNER: 'Error: missing API key' }));

      const result = await supervisor.awaitReady(managed, 10_000);

      expect(result).toEqual({ status: 'failed', line: 'Error: missing API key' });
      expect(managed.state).toBe('failed');
    });

    it('reports an exit during startup with the output seen', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_BANNER: 'booting', STUB_EXIT_CODE: '3' }));

      const result = await supervisor.awaitReady(managed, 10_000);

      expect(result).toEqual({ status: 'exited', code: 3, signal: null, output: ['booting'] });
    });

    it('assumes ready after the timeout when the process stays silent', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_BANNER: '' }));
      const started = Date.now();

      const result = await supervisor.awaitReady(managed, 300);

      expect(result).toEqual({ status: 'ready', reason: 'timeout' });
      expect(Date.now() - started).toBeGreaterThanOrEqual(290);
    });

    it('reports the timeout when configured not to assume readiness', async () => {
      const strict = new ProcessSupervisor({ pollIntervalMs: 20, assumeReadyOnTimeout: false });
      const managed = await strict.start(stubSpec({ STUB_BANNER: '' }));

      try {
        expect(await strict.awaitReady(managed, 200)).toEqual({ status: 'timeout' });
        expect(managed.state).toBe('starting');
      } finally {
        await strict.stop(managed);
      }
    });
  });

  describe('stop', () => {
    it('terminates the process and releases its pipes', async () => {
      const managed = await supervisor.start(stubSpec());
      let released = 0;
      managed.on('released', () => released++);

      await supervisor.stop(managed);

      expect(managed.running).toBe(false);
      expect(managed.exitSignal === 'SIGTERM' || managed.exitCode === 0).toBe(true);
      expect(released).toBe(1);
      expect(supervisor.processCount).toBe(0);
    });

    it('is idempotent under concurrent and repeated calls', async () => {
      const managed = await supervisor.start(stubSpec());
      let released = 0;
      managed.on('released', () => released++);

      await Promise.all([supervisor.stop(managed), supervisor.stop(managed)]);
      await supervisor.stop(managed);

      expect(released).toBe(1);
    });

    it('escalates to SIGKILL when SIGTERM is ignored', async () => {
      const managed = await supervisor.start(stubSpec({ STUB_IGNORE_SIGTERM: '1' }));
      await supervisor.awaitReady(managed, 5_000);

      await supervisor.stop(managed);

      expect(managed.exitSignal).toBe('SIGKILL');
      expect(managed.running).toBe(false);
    });
  });
});
