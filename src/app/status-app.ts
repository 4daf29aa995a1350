import type { Application } from '../types.js';

/**
 * Application served when no APP_MODULE is configured. Answers every request
 * with a small JSON status document.
 */
export function createStatusApp(): Application {
  return {
    handle: (request) => ({
      status: 200,
      headers: { 'content-type': 'application/json; charset=utf-8' },
      body: JSON.stringify({ status: 'ok', method: request.method, path: request.path }),
    }),
  };
}
