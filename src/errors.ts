/**
 * Supervisor error taxonomy.
 *
 * Only BindError and ConfigError leave the supervisor; everything raised while
 * handling a request is turned into a response where it happens.
 */

export class SupervisorError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends SupervisorError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG_INVALID', message, { cause });
  }
}

export class BindError extends SupervisorError {
  readonly address: string;
  readonly port: number;

  constructor(address: string, port: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('BIND_FAILED', `Cannot bind ${address}:${port}: ${reason}`, { cause });
    this.address = address;
    this.port = port;
  }
}

export class HandlerError extends SupervisorError {
  readonly unitId: string;

  constructor(unitId: string, message: string, cause?: unknown) {
    super('HANDLER_FAILED', message, { cause });
    this.unitId = unitId;
  }
}

export class DrainTimeoutError extends SupervisorError {
  readonly outstanding: number;

  constructor(gracePeriodMs: number, outstanding: number) {
    super('DRAIN_TIMEOUT', `Grace period of ${gracePeriodMs}ms elapsed with ${outstanding} unit(s) outstanding`);
    this.outstanding = outstanding;
  }
}

export class WorkerTimeoutError extends SupervisorError {
  readonly unitId: string;

  constructor(unitId: string, timeoutMs: number) {
    super('WORKER_TIMEOUT', `Unit ${unitId} exceeded the worker timeout of ${timeoutMs}ms`);
    this.unitId = unitId;
  }
}

export class UnitCancelledError extends SupervisorError {
  readonly unitId: string;

  constructor(unitId: string, reason: string) {
    super('UNIT_CANCELLED', `Unit ${unitId} cancelled: ${reason}`);
    this.unitId = unitId;
  }
}

export class PoolClosedError extends SupervisorError {
  constructor() {
    super('POOL_CLOSED', 'Worker pool is closed');
  }
}
