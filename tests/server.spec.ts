import { afterEach, describe, expect, it } from '@jest/globals';
import net from 'node:net';
import { loadConfig, withOverrides } from '../src/config.js';
import { BindError, ConfigError } from '../src/errors.js';
import { Supervisor, type SupervisorOptions } from '../src/server.js';
import type { Application, StateChange, SupervisorConfig } from '../src/types.js';
import { deferred, freePort, request, startRequest, waitFor } from './helpers/http.js';

function testConfig(overrides: Partial<SupervisorConfig> = {}): SupervisorConfig {
  return withOverrides(loadConfig({}), {
    port: 0,
    bindAddress: '127.0.0.1',
    gracePeriodMs: 1000,
    ...overrides,
  });
}

const hello: Application = {
  handle: () => ({ status: 200, headers: { 'content-type': 'text/plain' }, body: 'hello' }),
};

describe('Supervisor', () => {
  const supervisors: Supervisor[] = [];

  function create(options: Partial<SupervisorOptions> = {}): Supervisor {
    const supervisor = new Supervisor({ config: testConfig(), application: hello, ...options });
    supervisors.push(supervisor);
    return supervisor;
  }

  async function startOn(options: Partial<SupervisorOptions> = {}): Promise<{ supervisor: Supervisor; port: number }> {
    const supervisor = create(options);
    const { port } = await supervisor.start();
    return { supervisor, port };
  }

  afterEach(async () => {
    await Promise.all(supervisors.splice(0).map((supervisor) => supervisor.shutdown('test teardown')));
  });

  describe('start', () => {
    it('binds exactly the configured port and no other', async () => {
      const port = await freePort();
      const { supervisor } = await startOn({ config: testConfig({ port }) });
      expect(supervisor.address()).toEqual({ address: '127.0.0.1', port });

      const response = await request(port);
      expect(response.status).toBe(200);
      expect(response.body).toBe('hello');

      let other = await freePort();
      while (other === port) other = await freePort();
      await expect(request(other)).rejects.toMatchObject({ code: 'ECONNREFUSED' });
    });

    it('walks the lifecycle states in order', async () => {
      const supervisor = create();
      const changes: StateChange[] = [];
      supervisor.on('state', (change: StateChange) => changes.push(change));

      await supervisor.start();
      await supervisor.shutdown('done');

      expect(changes.map((change) => change.to)).toEqual(['binding', 'running', 'draining', 'stopped']);
    });

    it('fails with BindError when the port is taken', async () => {
      const blocker = net.createServer();
      await new Promise<void>((resolve) => blocker.listen({ host: '127.0.0.1', port: 0 }, () => resolve()));
      const address = blocker.address();
      const port = address !== null && typeof address === 'object' ? address.port : 0;

      try {
        const supervisor = create({ config: testConfig({ port }) });
        const started = supervisor.start();
        await expect(started).rejects.toBeInstanceOf(BindError);
        await expect(started).rejects.toMatchObject({ code: 'BIND_FAILED', port, address: '127.0.0.1' });
        expect(supervisor.getState()).toBe('failed');
        expect(supervisor.address()).toBeNull();
        await expect(supervisor.shutdown()).resolves.toEqual({
          reason: 'requested',
          state: 'failed',
          forced: false,
          cancelled: 0,
        });
      } finally {
        await new Promise<void>((resolve) => blocker.close(() => resolve()));
      }
    });

    it('cannot be started twice', async () => {
      const { supervisor } = await startOn();
      await expect(supervisor.start()).rejects.toThrow("Cannot start supervisor in state 'running'");
    });
  });

  describe('request handling', () => {
    it('passes method, path, query, headers and body to the application', async () => {
      const { port } = await startOn({
        application: (req) => ({
          status: 201,
          headers: { 'content-type': 'application/json', 'set-cookie': ['a=1', 'b=2'] },
          body: JSON.stringify({
            method: req.method,
            path: req.path,
            query: req.query,
            header: req.headers['x-test'],
            body: req.body.toString('utf8'),
          }),
        }),
      });

      const response = await request(port, {
        method: 'POST',
        path: '/echo?x=1&x=2&y=z',
        headers: { 'x-test': 'yes' },
        body: 'hi',
      });

      expect(response.status).toBe(201);
      expect(response.headers['set-cookie']).toEqual(['a=1', 'b=2']);
      expect(JSON.parse(response.body)).toEqual({
        method: 'POST',
        path: '/echo',
        query: { x: ['1', '2'], y: 'z' },
        header: 'yes',
        body: 'hi',
      });
    });

    it('answers a raising handler with a generic 500 and keeps serving', async () => {
      const { supervisor, port } = await startOn({
        application: (req) => {
          if (req.path === '/fail') throw new Error('boom');
          return { status: 200, body: 'fine' };
        },
      });

      const failed = await request(port, { path: '/fail' });
      expect(failed.status).toBe(500);
      expect(JSON.parse(failed.body)).toEqual({ error: 'Internal Server Error' });

      const next = await request(port, { path: '/ok' });
      expect(next.status).toBe(200);
      expect(next.body).toBe('fine');

      expect(supervisor.getMetrics().requests).toMatchObject({ total: 2, succeeded: 1, failed: 1 });
    });

    it('treats a malformed response as a handler failure', async () => {
      const { port } = await startOn({
        application: { handle: async () => ({ status: 42 }) },
      });

      const response = await request(port);
      expect(response.status).toBe(500);
      expect(JSON.parse(response.body)).toEqual({ error: 'Internal Server Error' });
    });

    it('answers 500 without partial headers when a response header cannot be sent', async () => {
      const { supervisor, port } = await startOn({
        application: () => ({
          status: 200,
          headers: { 'set-cookie': 'session=test-session', 'bad name': 'v' },
          body: 'never sent',
        }),
      });

      const response = await request(port);
      expect(response.status).toBe(500);
      expect(JSON.parse(response.body)).toEqual({ error: 'Internal Server Error' });
      expect(response.headers['set-cookie']).toBeUndefined();
      expect(supervisor.getMetrics().requests).toMatchObject({ total: 1, succeeded: 0, failed: 1 });
    });

    it('keeps at most `threads` requests in the handling phase', async () => {
      const gates = [deferred(), deferred(), deferred()];
      let running = 0;
      let peak = 0;
      let calls = 0;
      const { supervisor, port } = await startOn({
        config: testConfig({ threads: 2 }),
        application: async () => {
          const gate = gates[calls++];
          running++;
          peak = Math.max(peak, running);
          await gate.promise;
          running--;
          return { status: 200, body: 'done' };
        },
      });

      const responses = [request(port), request(port), request(port)];
      await waitFor(() => calls === 2);
      await waitFor(() => supervisor.getMetrics().requests.queued === 1);
      expect(running).toBe(2);

      gates[0].resolve();
      await waitFor(() => calls === 3);
      gates[1].resolve();
      gates[2].resolve();

      const results = await Promise.all(responses);
      expect(results.map((result) => result.status)).toEqual([200, 200, 200]);
      expect(peak).toBe(2);
    });

    it('answers 503 when a unit outlives the worker timeout and recovers', async () => {
      const { supervisor, port } = await startOn({
        config: testConfig({ workerTimeoutMs: 50 }),
        application: async (req) => {
          if (req.path === '/hang') {
            await new Promise((resolve) => req.signal.addEventListener('abort', resolve));
          }
          return { status: 200, body: req.path };
        },
      });

      const hung = await request(port, { path: '/hang' });
      expect(hung.status).toBe(503);
      expect(JSON.parse(hung.body)).toEqual({ error: 'Service Unavailable' });

      const next = await request(port, { path: '/quick' });
      expect(next.status).toBe(200);
      expect(next.body).toBe('/quick');

      const metrics = supervisor.getMetrics();
      expect(metrics.requests.timedOut).toBe(1);
      expect(metrics.restarts.total).toBe(1);
      expect(metrics.workers.total).toBe(1);
    });

    it('refuses bodies over the limit with 413', async () => {
      const { port } = await startOn({ config: testConfig({ maxBodyBytes: 4 }) });
      const response = await request(port, { method: 'POST', body: 'far too long' });
      expect(response.status).toBe(413);
      expect(JSON.parse(response.body)).toEqual({ error: 'Payload Too Large' });
    });

    it('answers 400 when the body cannot be decoded', async () => {
      const { supervisor, port } = await startOn();
      const response = await request(port, {
        method: 'POST',
        headers: { 'content-encoding': 'gzip' },
        body: 'not gzip data',
      });
      expect(response.status).toBe(400);
      expect(JSON.parse(response.body)).toEqual({ error: 'Bad Request' });
      expect(supervisor.getMetrics().requests.total).toBe(0);
    });

    it('keeps the status of other client errors raised while reading the body', async () => {
      const { port } = await startOn();
      const response = await request(port, {
        method: 'POST',
        headers: { 'content-encoding': 'bogus' },
        body: 'data',
      });
      expect(response.status).toBe(415);
      expect(JSON.parse(response.body)).toEqual({ error: 'Unsupported Media Type' });
    });

    it('adds CORS headers when enabled', async () => {
      const { port } = await startOn({ config: testConfig({ corsEnabled: true }) });
      const response = await request(port, { headers: { origin: 'http://example.test' } });
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('does not advertise the framework', async () => {
      const { port } = await startOn();
      const response = await request(port);
      expect(response.headers['x-powered-by']).toBeUndefined();
    });
  });

  describe('status routes', () => {
    it('reports health and metrics outside the pool', async () => {
      const { port } = await startOn();
      await request(port);

      const health = await request(port, { path: '/_supervisor/health' });
      expect(health.status).toBe(200);
      expect(JSON.parse(health.body)).toEqual({ status: 'ok', state: 'running', ready: true, workers: 1 });

      const metrics = JSON.parse((await request(port, { path: '/_supervisor/metrics' })).body);
      expect(metrics.state).toBe('running');
      expect(metrics.requests).toEqual({
        total: 1,
        succeeded: 1,
        failed: 0,
        timedOut: 0,
        cancelled: 0,
        rejected: 0,
        open: 0,
        inFlight: 0,
        queued: 0,
      });
      expect(metrics.workers.byState).toEqual({ ready: 1, working: 0, stopped: 0 });
    });

    it('leaves those paths to the application when disabled', async () => {
      const { port } = await startOn({ config: testConfig({ statusRoutes: false }) });
      const response = await request(port, { path: '/_supervisor/health' });
      expect(response.body).toBe('hello');
    });

    it('reports a failed application init without stopping', async () => {
      const { supervisor, port } = await startOn({
        application: {
          handle: () => ({ status: 200, body: 'still serving' }),
          init: async () => {
            throw new Error('model unavailable');
          },
        },
      });

      await waitFor(() => supervisor.getHealth().initError !== undefined);
      expect(supervisor.getHealth()).toEqual({
        status: 'ok',
        state: 'running',
        ready: false,
        initError: 'model unavailable',
        workers: 1,
      });
      expect((await request(port)).body).toBe('still serving');
    });

    it('marks the application ready once init completes', async () => {
      const gate = deferred();
      const { supervisor } = await startOn({
        application: { handle: hello.handle, init: () => gate.promise },
      });

      expect(supervisor.getHealth().ready).toBe(false);
      gate.resolve();
      await waitFor(() => supervisor.getHealth().ready);
    });
  });

  describe('shutdown', () => {
    it('is idempotent', async () => {
      const { supervisor } = await startOn();

      const first = supervisor.shutdown('first');
      const second = supervisor.shutdown('second');
      expect(second).toBe(first);

      const result = await first;
      expect(result).toEqual({ reason: 'first', state: 'stopped', forced: false, cancelled: 0 });
      await expect(supervisor.shutdown('third')).resolves.toBe(result);
      expect(supervisor.getState()).toBe('stopped');
      expect(supervisor.address()).toBeNull();
    });

    it('stops straight away when never started', async () => {
      const supervisor = create();
      await expect(supervisor.shutdown()).resolves.toEqual({
        reason: 'requested',
        state: 'stopped',
        forced: false,
        cancelled: 0,
      });
      await expect(supervisor.start()).rejects.toThrow("Cannot start supervisor in state 'stopped'");
    });

    it('refuses new connections while letting in-flight requests finish', async () => {
      const gate = deferred();
      let started = false;
      const { supervisor, port } = await startOn({
        application: async () => {
          started = true;
          await gate.promise;
          return { status: 200, body: 'complete response' };
        },
      });

      const inFlight = request(port);
      await waitFor(() => started);

      const stopping = supervisor.shutdown('test');
      expect(supervisor.getState()).toBe('draining');
      expect(supervisor.getHealth().status).toBe('draining');
      await expect(request(port)).rejects.toMatchObject({ code: 'ECONNREFUSED' });

      gate.resolve();
      const response = await inFlight;
      expect(response.status).toBe(200);
      expect(response.body).toBe('complete response');
      expect(response.headers.connection).toBe('close');

      await expect(stopping).resolves.toEqual({ reason: 'test', state: 'stopped', forced: false, cancelled: 0 });
    });

    it('lets a request still uploading its body finish once draining starts', async () => {
      const { supervisor, port } = await startOn({
        application: (req) => ({ status: 200, body: req.body.toString('utf8') }),
      });

      const { req, response } = startRequest(port, { method: 'POST', headers: { 'content-length': '10' } });
      req.write('hello');
      await waitFor(() => supervisor.getMetrics().requests.open === 1);

      const stopping = supervisor.shutdown('test');
      expect(supervisor.getState()).toBe('draining');
      req.end('world');

      const answer = await response;
      expect(answer.status).toBe(200);
      expect(answer.body).toBe('helloworld');
      expect(answer.headers.connection).toBe('close');
      await expect(stopping).resolves.toEqual({ reason: 'test', state: 'stopped', forced: false, cancelled: 0 });
    });

    /**
     * Begin a request's headers on a raw connection, start the drain, then
     * complete the headers. Resolves with the status line, header lines and
     * body once the server closes the connection.
     */
    async function completeAfterDrainStarts(
      supervisor: Supervisor,
      port: number,
      path: string,
    ): Promise<{ lines: string[]; body: string }> {
      const socket = net.connect({ host: '127.0.0.1', port });
      const received = new Promise<string>((resolve, reject) => {
        const chunks: Buffer[] = [];
        socket.on('data', (chunk: Buffer) => chunks.push(chunk));
        socket.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')));
        socket.on('error', reject);
      });
      await new Promise<void>((resolve) => socket.once('connect', () => resolve()));

      // Headers begun before the drain keep the connection out of the idle set
      socket.write(`GET ${path} HTTP/1.1\r\nHost: 127.0.0.1\r\n`);
      await new Promise((resolve) => setTimeout(resolve, 50));
      const stopping = supervisor.shutdown('test');
      socket.write('\r\n');

      const [head, body] = (await received).split('\r\n\r\n');
      await expect(stopping).resolves.toMatchObject({ state: 'stopped', forced: false });
      return { lines: head.split('\r\n'), body };
    }

    it('refuses a request completed on an open connection after draining starts', async () => {
      const { supervisor, port } = await startOn();

      const { lines, body } = await completeAfterDrainStarts(supervisor, port, '/late');
      expect(lines[0]).toBe('HTTP/1.1 503 Service Unavailable');
      expect(lines).toContain('Connection: close');
      expect(body).toBe('{"error":"Service Unavailable"}');
      expect(supervisor.getMetrics().requests).toMatchObject({ total: 0, rejected: 1 });
    });

    it('still answers the health route while draining', async () => {
      const { supervisor, port } = await startOn();

      const { lines, body } = await completeAfterDrainStarts(supervisor, port, '/_supervisor/health');
      expect(lines[0]).toBe('HTTP/1.1 503 Service Unavailable');
      expect(lines).toContain('Connection: close');
      expect(JSON.parse(body)).toEqual({ status: 'draining', state: 'draining', ready: true, workers: 1 });
      expect(supervisor.getMetrics().requests.rejected).toBe(0);
    });

    it('cancels stragglers once the grace period elapses', async () => {
      const seen: { signal?: AbortSignal } = {};
      const { supervisor, port } = await startOn({
        config: testConfig({ gracePeriodMs: 50 }),
        application: async (req) => {
          seen.signal = req.signal;
          await new Promise((resolve) => req.signal.addEventListener('abort', resolve));
          return { status: 200, body: 'too late' };
        },
      });

      const straggler = request(port).catch((error: unknown) => error);
      await waitFor(() => seen.signal !== undefined);

      const result = await supervisor.shutdown('test');
      expect(result).toEqual({ reason: 'test', state: 'stopped', forced: true, cancelled: 1 });
      expect(seen.signal?.aborted).toBe(true);
      await straggler;
    });
  });

  describe('reload', () => {
    it('applies the new thread count and keeps the bound port', async () => {
      const { supervisor, port } = await startOn({
        configLoader: () => testConfig({ threads: 3, port: 1, workerTimeoutMs: 5000 }),
      });

      const config = supervisor.reload();
      expect(config.threads).toBe(3);
      expect(config.workerTimeoutMs).toBe(5000);
      expect(config.port).toBe(0);
      expect(supervisor.getMetrics().workers.total).toBe(3);
      expect(supervisor.address()?.port).toBe(port);
      expect((await request(port)).status).toBe(200);
    });

    it('propagates configuration errors and keeps the current config', async () => {
      const { supervisor } = await startOn({
        configLoader: () => loadConfig({ THREADS: 'many' }),
      });
      const before = supervisor.getConfig();

      expect(() => supervisor.reload()).toThrow(ConfigError);
      expect(supervisor.getConfig()).toBe(before);
    });

    it('is a no-op before the supervisor runs', () => {
      const supervisor = create({ configLoader: () => testConfig({ threads: 4 }) });
      expect(supervisor.reload().threads).toBe(1);
    });
  });
});
