/**
 * Conversion between Express exchanges and the application contract.
 */

import type { Request, Response } from 'express';
import http from 'node:http';
import type { AppRequest, AppResponse, ErrorResponse, HeaderValue, RequestUnit } from '../types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isHeaderValue(value: unknown): value is HeaderValue {
  return typeof value === 'string' || (Array.isArray(value) && value.every(v => typeof v === 'string'));
}

function acceptedByNode(name: string, value: HeaderValue): boolean {
  try {
    for (const item of Array.isArray(value) ? value : [value]) {
      http.validateHeaderValue(name, item);
    }
    return true;
  } catch {
    return false;
  }
}

function parseQuery(originalUrl: string): Record<string, string | string[]> {
  const query: Record<string, string | string[]> = {};
  const params = new URL(originalUrl, 'http://localhost').searchParams;
  for (const key of new Set(params.keys())) {
    const values = params.getAll(key);
    query[key] = values.length === 1 ? values[0] : values;
  }
  return query;
}

export function toAppRequest(req: Request, unit: RequestUnit, signal: AbortSignal): AppRequest {
  const headers: Record<string, HeaderValue> = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value !== undefined) headers[name] = value;
  }

  return {
    id: unit.id,
    method: req.method,
    path: req.path,
    query: parseQuery(req.originalUrl),
    headers,
    body: Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0),
    remoteAddress: req.socket.remoteAddress ?? null,
    signal,
  };
}

/**
 * Check what the application returned. Throws a TypeError naming the first
 * problem found.
 */
export function validateAppResponse(value: unknown): AppResponse {
  if (!isRecord(value)) {
    throw new TypeError(`Application returned ${value === null ? 'null' : typeof value} instead of a response object`);
  }

  const { status, headers, body } = value;
  if (typeof status !== 'number' || !Number.isInteger(status) || status < 100 || status > 599) {
    throw new TypeError(`Invalid response status: ${String(status)}`);
  }

  const response: AppResponse = { status };

  if (headers !== undefined) {
    if (!isRecord(headers)) {
      throw new TypeError('Response headers must be an object');
    }
    const checked: Record<string, HeaderValue> = {};
    for (const [name, headerValue] of Object.entries(headers)) {
      try {
        http.validateHeaderName(name);
      } catch {
        throw new TypeError(`Invalid response header name '${name}'`);
      }
      if (!isHeaderValue(headerValue) || !acceptedByNode(name, headerValue)) {
        throw new TypeError(`Invalid value for response header '${name}'`);
      }
      checked[name] = headerValue;
    }
    response.headers = checked;
  }

  if (body !== undefined) {
    if (typeof body !== 'string' && !(body instanceof Uint8Array)) {
      throw new TypeError(`Response body must be a string or bytes, got ${typeof body}`);
    }
    response.body = body;
  }

  return response;
}

export function sendAppResponse(res: Response, response: AppResponse): void {
  if (res.headersSent || res.writableEnded) return;

  res.status(response.status);
  for (const [name, value] of Object.entries(response.headers ?? {})) {
    res.setHeader(name, value);
  }
  if (response.body === undefined) {
    res.end();
  } else {
    res.end(response.body);
  }
}

/**
 * Client-side status of an error raised by the middleware stack (body
 * parsing), or null when the error is the server's own.
 */
export function requestErrorStatus(error: unknown): number | null {
  const status = typeof error === 'object' && error !== null && 'status' in error ? error.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function sendError(res: Response, status: number, error: string, headers: Record<string, string> = {}): void {
  if (res.headersSent || res.writableEnded) return;
  res.set(headers).status(status).json({ error } satisfies ErrorResponse);
}
