/**
 * Global installation of the absence sentinel
 *
 * Opt-in convenience for scripts and REPL sessions: binds `absent` and
 * `isAbsent` on a namespace (globalThis by default) so code can use them
 * without an import. Libraries should import from @absential/types instead.
 */

import { Cell, OperationValidityError, absent, isAbsent, type Absential } from '@absential/types';

import { loadConfig } from './env.js';
import { getLogger } from './logger/index.js';

export interface InstallOptions {
  /** Name for the sentinel; null skips it (default: ABSENCE_SENTINEL_NAME) */
  readonly sentinelName?: Absential<string | null>;
  /** Name for the predicate; null skips it (default: ABSENCE_PREDICATE_NAME) */
  readonly predicateName?: Absential<string | null>;
  /** Namespace to bind into (default: globalThis) */
  readonly target?: object;
}

interface ResolvedNames {
  sentinelName: string | null;
  predicateName: string | null;
}

function resolveNames({ sentinelName = absent, predicateName = absent }: InstallOptions): ResolvedNames {
  return {
    sentinelName: Cell.fromAbsential(sentinelName).extractOrCompute(() => loadConfig().sentinelName),
    predicateName: Cell.fromAbsential(predicateName).extractOrCompute(
      () => loadConfig().predicateName
    ),
  };
}

function bind(target: object, name: string, value: unknown): void {
  const logger = getLogger();
  const previous: unknown = Reflect.get(target, name);
  if (previous !== undefined && previous !== value) {
    logger.warn({ name }, 'Replacing existing global binding');
  }
  if (!Reflect.set(target, name, value)) {
    throw new OperationValidityError('install');
  }
  logger.trace({ name }, 'Bound absence global');
}

function unbind(target: object, name: string, value: unknown): void {
  if (Reflect.get(target, name) !== value) return;
  if (!Reflect.deleteProperty(target, name)) {
    throw new OperationValidityError('uninstall');
  }
  getLogger().trace({ name }, 'Removed absence global');
}

/**
 * Bind the sentinel and predicate on `target`. Afterwards the bindings are
 * the very objects exported as `absent` and `isAbsent`. The environment is
 * only validated for names left unspecified.
 *
 * @example
 * install(); // globalThis.Absent, globalThis.isAbsent
 * install({ sentinelName: null }); // predicate only
 */
export function install(options: InstallOptions = {}): void {
  const { target = globalThis } = options;
  const { sentinelName, predicateName } = resolveNames(options);

  if (sentinelName !== null) bind(target, sentinelName, absent);
  if (predicateName !== null) bind(target, predicateName, isAbsent);
}

/**
 * Remove bindings made by {@link install}. Names bound to anything other
 * than the sentinel or predicate are left alone.
 */
export function uninstall(options: InstallOptions = {}): void {
  const { target = globalThis } = options;
  const { sentinelName, predicateName } = resolveNames(options);

  if (sentinelName !== null) unbind(target, sentinelName, absent);
  if (predicateName !== null) unbind(target, predicateName, isAbsent);
}
