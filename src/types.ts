/**
 * App Supervisor - Type Definitions
 *
 * Core types for configuration, the application contract, and worker slots.
 */

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface SupervisorConfig {
  /** TCP port to bind (0 picks an ephemeral port) */
  readonly port: number;
  /** Interface address to bind */
  readonly bindAddress: string;
  /** Number of worker slots handling requests concurrently */
  readonly threads: number;
  /** How long shutdown waits for in-flight units */
  readonly gracePeriodMs: number;
  /** Per-unit limit before the slot is recycled; 0 disables */
  readonly workerTimeoutMs: number;
  /** Idle keep-alive timeout for client connections */
  readonly keepAliveMs: number;
  /** Pending connection queue length passed to listen() */
  readonly backlog: number;
  /** Largest request body accepted */
  readonly maxBodyBytes: number;
  /** `module:export` reference of the application, null for the status app */
  readonly appModule: string | null;
  readonly corsEnabled: boolean;
  /** Serve /_supervisor/health and /_supervisor/metrics */
  readonly statusRoutes: boolean;
}

// ============================================================================
// APPLICATION CONTRACT
// ============================================================================

export type HeaderValue = string | string[];

export interface AppRequest {
  /** Request handling unit ID */
  id: string;
  method: string;
  /** Path without the query string */
  path: string;
  query: Record<string, string | string[]>;
  /** Header names are lower-cased */
  headers: Record<string, HeaderValue>;
  body: Buffer;
  remoteAddress: string | null;
  /** Aborted when the unit times out or is cancelled */
  signal: AbortSignal;
}

export interface AppResponse {
  status: number;
  headers?: Record<string, HeaderValue>;
  body?: string | Buffer | Uint8Array;
}

export type AppHandler = (request: AppRequest) => AppResponse | Promise<AppResponse>;

export interface Application {
  handle: AppHandler;
  /** Background initialization started once the socket is bound */
  init?: () => Promise<void>;
}

// ============================================================================
// LIFECYCLE
// ============================================================================

export type SupervisorState = 'init' | 'binding' | 'running' | 'draining' | 'stopped' | 'failed';

export interface StateChange {
  from: SupervisorState;
  to: SupervisorState;
}

export interface ShutdownResult {
  reason: string;
  state: SupervisorState;
  /** True when the grace period ran out */
  forced: boolean;
  /** Units aborted after the grace period */
  cancelled: number;
}

export interface BoundAddress {
  address: string;
  port: number;
}

// ============================================================================
// WORKER SLOT TYPES
// ============================================================================

export type WorkerState = 'ready' | 'working' | 'stopped';
export type WorkerHealth = 'healthy' | 'degraded' | 'unhealthy';

export interface RequestUnit {
  /** Unique unit ID */
  id: string;
  method: string;
  path: string;
  /** When the unit was accepted */
  acceptedAt: number;
}

export interface WorkerSlot {
  /** Slot ID, stable until the slot is recycled */
  id: number;
  state: WorkerState;
  /** Unit currently being handled */
  currentUnit: RequestUnit | null;
  /** When the current unit started */
  busySince: number | null;
  /** Units completed by this slot */
  handled: number;
  /** How many recycled slots preceded this one */
  restartCount: number;
  createdAt: number;
}

export interface WorkerHealthStats {
  total: number;
  healthy: number;
  degraded: number;
  unhealthy: number;
}

// ============================================================================
// API RESPONSE TYPES
// ============================================================================

export interface RequestCounters {
  total: number;
  succeeded: number;
  failed: number;
  timedOut: number;
  cancelled: number;
  /** Requests refused while draining */
  rejected: number;
}

export interface HealthResponse {
  status: 'ok' | 'draining' | 'down';
  state: SupervisorState;
  /** Application init finished */
  ready: boolean;
  initError?: string;
  workers: number;
}

export interface SupervisorMetrics {
  uptime: number;
  state: SupervisorState;
  /** Open client connections */
  connections: number;
  workers: WorkerHealthStats & {
    byState: Record<WorkerState, number>;
  };
  requests: RequestCounters & {
    /** Accepted requests whose response has not closed yet, uploads included */
    open: number;
    inFlight: number;
    queued: number;
  };
  restarts: {
    total: number;
    lastHour: number;
  };
}

export interface ErrorResponse {
  error: string;
}
