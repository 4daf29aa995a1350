/**
 * App Supervisor
 *
 * Owns the single HTTP listener, hands every request to a fixed worker pool
 * that invokes the injected application, and drives the lifecycle
 * INIT → BINDING → RUNNING → DRAINING → STOPPED (or BINDING → FAILED).
 */

import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import http from 'node:http';
import type { Socket } from 'node:net';
import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';

import { loadConfig, withOverrides } from './config.js';
import {
  BindError,
  DrainTimeoutError,
  HandlerError,
  PoolClosedError,
  UnitCancelledError,
  WorkerTimeoutError,
} from './errors.js';
import { requestErrorStatus, sendAppResponse, sendError, toAppRequest, validateAppResponse } from './http/adapter.js';
import { toApplication } from './app/loader.js';
import { createLogger, describeError } from './utils/logger.js';
import { WorkerPool, type WorkerPoolEvents } from './workers/pool.js';
import type {
  AppHandler,
  AppResponse,
  Application,
  BoundAddress,
  HealthResponse,
  RequestCounters,
  RequestUnit,
  ShutdownResult,
  StateChange,
  SupervisorConfig,
  SupervisorMetrics,
  SupervisorState,
  WorkerState,
} from './types.js';

const log = createLogger('supervisor');

export const STATUS_PREFIX = '/_supervisor';

/** Settles true when `promise` resolves within `ms`, false otherwise. */
function within(promise: Promise<void>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = () => {
      clearTimeout(timer);
      resolve(true);
    };
    void promise.then(done, done);
  });
}

function nextTick(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

export interface SupervisorOptions {
  config: SupervisorConfig;
  application: Application | AppHandler;
  /** Source of fresh configuration for reload() */
  configLoader?: () => SupervisorConfig;
}

// Settings bound into the listener or the middleware stack at construction
const RESTART_ONLY_FIELDS: Array<keyof SupervisorConfig> = [
  'port',
  'bindAddress',
  'backlog',
  'maxBodyBytes',
  'appModule',
  'corsEnabled',
  'statusRoutes',
];

// ============================================================================
// SUPERVISOR CLASS
// ============================================================================

export class Supervisor extends EventEmitter {
  private app: express.Application;
  private server: http.Server;
  private pool: WorkerPool;
  private config: SupervisorConfig;
  private readonly application: Application;
  private readonly configLoader: () => SupervisorConfig;
  private state: SupervisorState = 'init';
  private sockets = new Set<Socket>();
  /** Settle when the response of an accepted request is closed */
  private responses = new Set<Promise<void>>();
  private counters: RequestCounters = {
    total: 0,
    succeeded: 0,
    failed: 0,
    timedOut: 0,
    cancelled: 0,
    rejected: 0,
  };
  private startTime = Date.now();
  private ready = false;
  private initError: string | null = null;
  private boundAddress: BoundAddress | null = null;
  private shutdownPromise: Promise<ShutdownResult> | null = null;

  constructor(options: SupervisorOptions) {
    super();
    this.config = options.config;
    this.application = toApplication(options.application);
    this.configLoader = options.configLoader ?? (() => loadConfig());
    this.pool = new WorkerPool({
      size: this.config.threads,
      timeoutMs: this.config.workerTimeoutMs,
    });
    this.app = express();
    this.server = http.createServer(this.app);
    this.server.keepAliveTimeout = this.config.keepAliveMs;

    // Status routes come first so they answer while draining and skip the body limit
    this.setupRoutes();
    this.setupMiddleware();
    this.setupDispatch();
    this.setupConnectionTracking();
    this.setupPoolEvents();
  }

  // ============================================================================
  // ROUTES
  // ============================================================================

  private setupRoutes(): void {
    this.app.disable('x-powered-by');
    if (!this.config.statusRoutes) return;

    this.app.get(`${STATUS_PREFIX}/health`, this.handleHealth.bind(this));
    this.app.get(`${STATUS_PREFIX}/metrics`, this.handleMetrics.bind(this));
  }

  private handleHealth(_req: Request, res: Response): void {
    this.closeAfterResponseIfDraining(res);
    const health = this.getHealth();
    res.status(health.status === 'ok' ? 200 : 503).json(health);
  }

  private handleMetrics(_req: Request, res: Response): void {
    this.closeAfterResponseIfDraining(res);
    res.json(this.getMetrics());
  }

  // ============================================================================
  // MIDDLEWARE
  // ============================================================================

  private setupMiddleware(): void {
    this.app.use(this.drainGuard.bind(this));
    if (this.config.corsEnabled) {
      this.app.use(cors());
    }
    this.app.use(express.raw({ type: () => true, limit: this.config.maxBodyBytes }));
  }

  /**
   * Accepted requests are tracked from here, before their body is read, so a
   * drain waits for uploads in progress. Requests arriving on already-open
   * connections once draining has begun are refused.
   */
  private drainGuard(_req: Request, res: Response, next: NextFunction): void {
    if (this.state === 'running') {
      this.trackResponse(res);
      next();
      return;
    }
    this.counters.rejected++;
    sendError(res, 503, 'Service Unavailable', { Connection: 'close' });
  }

  private closeAfterResponseIfDraining(res: Response): void {
    if (this.state !== 'running') {
      res.setHeader('Connection', 'close');
    }
  }

  // ============================================================================
  // DISPATCH
  // ============================================================================

  private setupDispatch(): void {
    this.app.use(this.handleConnection.bind(this));

    const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
      this.closeAfterResponseIfDraining(res);
      const status = requestErrorStatus(err);
      if (status !== null) {
        sendError(res, status, http.STATUS_CODES[status] ?? 'Bad Request');
        return;
      }
      log.error(`Request ${req.method} ${req.path} failed before dispatch`, describeError(err));
      sendError(res, 500, 'Internal Server Error');
    };
    this.app.use(errorHandler);
  }

  /**
   * Hand one request to the pool; the unit's outcome always becomes a response
   */
  private handleConnection(req: Request, res: Response): void {
    const unit: RequestUnit = {
      id: uuidv4(),
      method: req.method,
      path: req.path,
      acceptedAt: Date.now(),
    };
    this.counters.total++;

    void this.pool
      .run(unit, (signal) => this.invoke(req, unit, signal))
      .then((response) => {
        this.closeAfterResponseIfDraining(res);
        sendAppResponse(res, response);
        this.counters.succeeded++;
      })
      .catch((error: unknown) => this.handleUnitFailure(res, unit, error));
  }

  private trackResponse(res: Response): void {
    const closed = new Promise<void>((resolve) => {
      res.once('close', () => resolve());
    });
    this.responses.add(closed);
    void closed.then(() => this.responses.delete(closed));
  }

  /** Resolves once every accepted request's response has closed */
  private responsesClosed(): Promise<void> {
    return Promise.all(Array.from(this.responses)).then(() => undefined);
  }

  private async invoke(req: Request, unit: RequestUnit, signal: AbortSignal): Promise<AppResponse> {
    let result: unknown;
    try {
      result = await this.application.handle(toAppRequest(req, unit, signal));
    } catch (error) {
      throw new HandlerError(unit.id, `Application raised while handling ${unit.method} ${unit.path}`, error);
    }

    try {
      return validateAppResponse(result);
    } catch (error) {
      throw new HandlerError(unit.id, `Application returned a malformed response for ${unit.method} ${unit.path}`, error);
    }
  }

  private handleUnitFailure(res: Response, unit: RequestUnit, error: unknown): void {
    this.closeAfterResponseIfDraining(res);

    if (error instanceof WorkerTimeoutError) {
      this.counters.timedOut++;
      sendError(res, 503, 'Service Unavailable');
      return;
    }
    if (error instanceof UnitCancelledError || error instanceof PoolClosedError) {
      this.counters.cancelled++;
      log.warn(`Unit ${unit.id.slice(0, 8)} cancelled`, { method: unit.method, path: unit.path });
      sendError(res, 503, 'Service Unavailable');
      return;
    }

    this.counters.failed++;
    log.error(error instanceof Error ? error.message : 'Unit failed', {
      unitId: unit.id,
      ...describeError(error instanceof HandlerError ? error.cause : error),
    });
    sendError(res, 500, 'Internal Server Error');
  }

  // ============================================================================
  // CONNECTIONS & POOL EVENTS
  // ============================================================================

  private setupConnectionTracking(): void {
    this.server.on('connection', (socket: Socket) => {
      this.sockets.add(socket);
      socket.once('close', () => {
        this.sockets.delete(socket);
      });
    });

    this.server.on('error', (error) => {
      // Bind errors are reported by start()
      if (this.state !== 'binding') {
        log.error('Listener error', describeError(error));
      }
    });
  }

  private setupPoolEvents(): void {
    this.pool.on('worker:restart', ({ previousId, slotId, restartCount }: WorkerPoolEvents['worker:restart']) => {
      log.info(`Slot ${previousId} replaced by slot ${slotId}`, { restartCount });
    });
  }

  private transition(to: SupervisorState): void {
    const change: StateChange = { from: this.state, to };
    this.state = to;
    log.debug(`State ${change.from} -> ${change.to}`);
    this.emit('state', change);
  }

  // ============================================================================
  // START
  // ============================================================================

  async start(): Promise<BoundAddress> {
    if (this.state !== 'init') {
      throw new Error(`Cannot start supervisor in state '${this.state}'`);
    }
    this.transition('binding');

    const { port, bindAddress, backlog } = this.config;
    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (error: Error) => {
          this.server.off('listening', onListening);
          reject(error);
        };
        const onListening = () => {
          this.server.off('error', onError);
          resolve();
        };
        this.server.once('error', onError);
        this.server.once('listening', onListening);
        this.server.listen({ port, host: bindAddress, backlog });
      });
    } catch (error) {
      this.pool.close();
      const bindError = new BindError(bindAddress, port, error);
      log.error(bindError.message, describeError(error));
      this.transition('failed');
      throw bindError;
    }

    const info = this.server.address();
    this.boundAddress =
      info !== null && typeof info === 'object'
        ? { address: info.address, port: info.port }
        : { address: bindAddress, port };
    this.transition('running');

    log.info(`Listening on http://${this.boundAddress.address}:${this.boundAddress.port}`, {
      pid: process.pid,
      threads: this.config.threads,
      gracePeriodMs: this.config.gracePeriodMs,
      workerTimeoutMs: this.config.workerTimeoutMs,
    });

    this.startApplicationInit();
    return this.boundAddress;
  }

  /**
   * Run the application's init() in the background; failures are reported
   * through health, the listener keeps serving
   */
  private startApplicationInit(): void {
    const init = this.application.init;
    if (!init) {
      this.ready = true;
      return;
    }

    log.info('Application init started');
    void Promise.resolve()
      .then(() => init())
      .then(
        () => {
          this.ready = true;
          log.info('Application init completed');
        },
        (error: unknown) => {
          this.initError = error instanceof Error ? error.message : String(error);
          log.error('Application init failed', describeError(error));
        },
      );
  }

  // ============================================================================
  // SHUTDOWN & RELOAD
  // ============================================================================

  /**
   * Stop accepting, drain in-flight units within the grace period, then
   * release the listener. Every call returns the same result.
   */
  shutdown(reason = 'requested'): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown(reason);
    }
    return this.shutdownPromise;
  }

  private async performShutdown(reason: string): Promise<ShutdownResult> {
    if (this.state === 'binding') {
      await new Promise<void>((resolve) => this.once('state', () => resolve()));
    }

    if (this.state === 'init') {
      this.pool.close();
      this.transition('stopped');
      return { reason, state: this.state, forced: false, cancelled: 0 };
    }
    if (this.state === 'failed') {
      return { reason, state: this.state, forced: false, cancelled: 0 };
    }

    const { gracePeriodMs } = this.config;
    const deadline = Date.now() + gracePeriodMs;
    this.transition('draining');
    log.info(`Draining (${reason})`, {
      inFlight: this.pool.getActiveCount(),
      queued: this.pool.getQueuedCount(),
      gracePeriodMs,
    });

    const closed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
    this.server.closeIdleConnections();

    let forced = false;
    let cancelled = 0;
    if (!(await within(this.responsesClosed(), gracePeriodMs))) {
      forced = true;
      const timeout = new DrainTimeoutError(gracePeriodMs, this.responses.size);
      log.warn(timeout.message, { reason });
      cancelled = this.pool.cancelAll('grace period elapsed');
      // Let cancelled units write their 503 before sockets are torn down
      await nextTick();
    }
    this.pool.close();

    this.server.closeIdleConnections();
    const remaining = forced ? 0 : Math.max(deadline - Date.now(), 0);
    if (!(await within(closed, remaining))) {
      this.server.closeAllConnections();
      await closed;
    }

    this.transition('stopped');
    log.info('Stopped', { reason, forced, cancelled });
    return { reason, state: this.state, forced, cancelled };
  }

  /**
   * Re-read configuration and apply what can change without rebinding.
   * Accepted connections are unaffected.
   */
  reload(): SupervisorConfig {
    if (this.state !== 'running') {
      log.warn(`Reload ignored in state '${this.state}'`);
      return this.config;
    }

    const next = this.configLoader();
    const ignored = RESTART_ONLY_FIELDS.filter((field) => next[field] !== this.config[field]);
    if (ignored.length > 0) {
      log.warn('Changes need a restart and were ignored', { fields: ignored });
    }

    this.config = withOverrides(this.config, {
      threads: next.threads,
      gracePeriodMs: next.gracePeriodMs,
      workerTimeoutMs: next.workerTimeoutMs,
      keepAliveMs: next.keepAliveMs,
    });
    this.pool.resize(this.config.threads);
    this.pool.setTimeoutMs(this.config.workerTimeoutMs);
    this.server.keepAliveTimeout = this.config.keepAliveMs;

    log.info('Configuration reloaded', {
      threads: this.config.threads,
      gracePeriodMs: this.config.gracePeriodMs,
      workerTimeoutMs: this.config.workerTimeoutMs,
    });
    return this.config;
  }

  // ============================================================================
  // INTROSPECTION
  // ============================================================================

  getState(): SupervisorState {
    return this.state;
  }

  getConfig(): SupervisorConfig {
    return this.config;
  }

  address(): BoundAddress | null {
    return this.state === 'running' || this.state === 'draining' ? this.boundAddress : null;
  }

  getHealth(): HealthResponse {
    const health: HealthResponse = {
      status: this.state === 'running' ? 'ok' : this.state === 'draining' ? 'draining' : 'down',
      state: this.state,
      ready: this.ready,
      workers: this.pool.getWorkerCount(),
    };
    if (this.initError !== null) {
      health.initError = this.initError;
    }
    return health;
  }

  getMetrics(): SupervisorMetrics {
    const byState: Record<WorkerState, number> = {
      ready: 0,
      working: 0,
      stopped: 0,
    };
    for (const worker of this.pool.getWorkers()) {
      byState[worker.state]++;
    }

    return {
      uptime: Date.now() - this.startTime,
      state: this.state,
      connections: this.sockets.size,
      workers: {
        ...this.pool.getHealthStats(),
        byState,
      },
      requests: {
        ...this.counters,
        open: this.responses.size,
        inFlight: this.pool.getActiveCount(),
        queued: this.pool.getQueuedCount(),
      },
      restarts: this.pool.getRestartStats(),
    };
  }
}
