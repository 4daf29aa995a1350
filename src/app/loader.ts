/**
 * Application loading
 *
 * Resolves a `module:export` reference (`legacy.server:app`,
 * `./build/app.js:handler`) into an Application.
 */

import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { ConfigError } from '../errors.js';
import type { AppHandler, Application } from '../types.js';

const DEFAULT_EXPORT = 'app';
const MODULE_EXTENSIONS = ['.js', '.mjs', '.cjs'];
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export interface AppReference {
  modulePath: string;
  exportName: string;
}

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface LoadOptions {
  cwd?: string;
  importer?: ModuleImporter;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

function isHandler(value: unknown): value is AppHandler {
  return typeof value === 'function';
}

function isInit(value: unknown): value is () => Promise<void> {
  return typeof value === 'function';
}

export function parseAppReference(reference: string): AppReference {
  const trimmed = reference.trim();
  const separator = trimmed.lastIndexOf(':');
  const rawModule = separator === -1 ? trimmed : trimmed.slice(0, separator);
  const exportName = separator === -1 ? DEFAULT_EXPORT : trimmed.slice(separator + 1);

  if (rawModule === '') {
    throw new ConfigError(`Invalid APP_MODULE '${reference}': missing module`);
  }
  if (!IDENTIFIER.test(exportName)) {
    throw new ConfigError(`Invalid APP_MODULE '${reference}': '${exportName}' is not an export name`);
  }

  const isPath = rawModule.includes('/') || MODULE_EXTENSIONS.includes(path.extname(rawModule));
  let modulePath = isPath ? rawModule : rawModule.split('.').join('/');
  if (!MODULE_EXTENSIONS.includes(path.extname(modulePath))) {
    modulePath += '.js';
  }

  return { modulePath, exportName };
}

/**
 * Wrap a handler function or `{ handle, init? }` object as a frozen
 * Application that calls back into the original.
 */
export function toApplication(value: unknown, name = 'application'): Application {
  if (isHandler(value)) {
    return Object.freeze({ handle: value });
  }

  if (isRecord(value)) {
    const { handle, init } = value;
    if (isHandler(handle)) {
      return Object.freeze({
        handle: handle.bind(value),
        init: isInit(init) ? init.bind(value) : undefined,
      });
    }
  }

  throw new ConfigError(`${name} is neither a handler function nor an object with a handle() method`);
}

export async function loadApplication(reference: string, options: LoadOptions = {}): Promise<Application> {
  const { modulePath, exportName } = parseAppReference(reference);
  const cwd = options.cwd ?? process.cwd();
  const importer: ModuleImporter = options.importer ?? ((specifier) => import(specifier));
  const specifier = pathToFileURL(path.resolve(cwd, modulePath)).href;

  let loaded: unknown;
  try {
    loaded = await importer(specifier);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot load application module '${modulePath}': ${reason}`, error);
  }

  if (!isRecord(loaded)) {
    throw new ConfigError(`Module '${modulePath}' did not evaluate to an object`);
  }

  // CommonJS modules come back wrapped in a namespace under `default`
  const fallback = loaded.default;
  const candidate = loaded[exportName] ?? (isRecord(fallback) ? fallback[exportName] : undefined);
  if (candidate === undefined) {
    throw new ConfigError(`Module '${modulePath}' has no export '${exportName}'`);
  }

  return toApplication(candidate, `Export '${exportName}' of '${modulePath}'`);
}
