/**
 * Condition Waiter
 *
 * Blocks until a handle's observed state satisfies a predicate or a time
 * budget runs out. Polling refreshes the handle every `interval`; the watch
 * strategy applies change events as they arrive and falls back to polling
 * when the stream ends or fails.
 *
 * Sleeps are clipped to the remaining budget and one last check happens at the
 * deadline. A check still in flight at `timeout + interval` is abandoned, so a
 * wait that never succeeds takes at least `timeout` and at most `timeout + interval`
 * however slow the API server is.
 */

import type { KubernetesObject } from '@kubernetes/client-node';
import { ConditionTimeoutError, WaitCancelledError } from '../errors.js';
import type { ClusterClient, WatchEvent } from '../kubernetes/cluster-client.js';
import { isNotFoundError } from '../kubernetes/errors.js';
import { getComponentLogger, type KubetestLogger } from '../logging/index.js';
import type { ResourceHandle } from '../resources/handle.js';
import {
  getReadinessEvaluator,
  type ReadinessEvaluator,
  type ReadinessPredicate,
  safeEvaluate,
} from '../resources/readiness.js';
import { abortable, anySignal, deadline as deadlineSignal, sleep } from '../utils/index.js';

export type TimeoutPolicy = 'fail' | 'return-last-state';

export type WaitStrategy = 'poll' | 'watch';

export interface WaitOptions {
  /** Delay between polls in milliseconds */
  interval?: number | undefined;
  /** Total budget in milliseconds */
  timeout?: number | undefined;
  onTimeout?: TimeoutPolicy | undefined;
  strategy?: WaitStrategy | undefined;
  /** Aborting rejects the wait with `WaitCancelledError` */
  signal?: AbortSignal | undefined;
  /** Appears in logs and timeout messages */
  description?: string | undefined;
}

export interface WaitResult<T extends KubernetesObject = KubernetesObject> {
  satisfied: boolean;
  /** Last observed state; undefined if the object was never seen */
  observed: T | undefined;
  attempts: number;
  /** Milliseconds spent waiting */
  elapsed: number;
  reason?: string | undefined;
}

export interface WaiterDefaults {
  interval: number;
  timeout: number;
  onTimeout: TimeoutPolicy;
  strategy: WaitStrategy;
}

export const DEFAULT_WAITER_OPTIONS: WaiterDefaults = {
  interval: 1000,
  timeout: 60000,
  onTimeout: 'fail',
  strategy: 'poll',
};

/**
 * `once`: every condition held in some check. `simultaneous`: all held in the same check.
 */
export type ConditionPolicy = 'once' | 'simultaneous';

export interface NamedCondition<T extends KubernetesObject = KubernetesObject> {
  name: string;
  predicate: ReadinessPredicate<T>;
}

export interface ConditionsWaitOptions extends WaitOptions {
  policy?: ConditionPolicy | undefined;
}

export interface ReadyWaitOptions<T extends KubernetesObject> extends WaitOptions {
  evaluator?: ReadinessEvaluator<T> | undefined;
}

interface Observation {
  satisfied: boolean;
  reason?: string | undefined;
}

/**
 * What a wait checks on each tick
 */
interface Probe {
  /** Refresh from the cluster and evaluate */
  poll(): Promise<Observation>;
  /** Evaluate a delivered watch event */
  onEvent(event: WatchEvent): Observation;
}

export class ConditionWaiter {
  private readonly logger: KubetestLogger;
  private readonly defaults: WaiterDefaults;

  constructor(
    private readonly client: ClusterClient,
    defaults: Partial<WaiterDefaults> = {},
    logger: KubetestLogger = getComponentLogger('condition-waiter')
  ) {
    this.defaults = { ...DEFAULT_WAITER_OPTIONS, ...defaults };
    this.logger = logger;
  }

  /**
   * Wait until `predicate` holds for the handle's observed state
   *
   * @throws ConditionTimeoutError when the budget runs out under the `fail` policy
   * @throws WaitCancelledError when the signal aborts
   */
  async waitUntil<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    predicate: ReadinessPredicate<T>,
    options: WaitOptions = {}
  ): Promise<WaitResult<T>> {
    const probe = this.stateProbe(handle, () => ({ satisfied: handle.isReady(predicate) }));
    return this.run(handle, probe, options);
  }

  /**
   * Wait until the kind's readiness evaluator (or the one given) reports ready
   */
  async waitUntilReady<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    options: ReadyWaitOptions<T> = {}
  ): Promise<WaitResult<T>> {
    const evaluator: ReadinessEvaluator<T> = options.evaluator ?? getReadinessEvaluator(handle.kind);
    const probe = this.stateProbe(handle, () => {
      const status = handle.evaluate(evaluator);
      return { satisfied: status.ready, reason: status.message ?? status.reason };
    });
    return this.run(handle, probe, { description: 'readiness', ...options });
  }

  /**
   * Wait until several named conditions hold, under the `once` (default) or `simultaneous` policy
   */
  async waitForConditions<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    conditions: ReadonlyArray<NamedCondition<T>>,
    options: ConditionsWaitOptions = {}
  ): Promise<WaitResult<T>> {
    const policy = options.policy ?? 'once';
    const held = new Set<string>();

    const probe = this.stateProbe(handle, () => {
      const current = conditions.filter((condition) => handle.isReady(condition.predicate)).map((c) => c.name);
      if (policy === 'simultaneous') {
        held.clear();
      }
      for (const name of current) {
        held.add(name);
      }
      const pending = conditions.filter((condition) => !held.has(condition.name)).map((c) => c.name);
      return {
        satisfied: pending.length === 0,
        reason: pending.length > 0 ? `pending conditions: ${pending.join(', ')}` : undefined,
      };
    });

    const description = `conditions [${conditions.map((c) => c.name).join(', ')}] (${policy})`;
    return this.run(handle, probe, { description, ...options });
  }

  /**
   * Wait until the object no longer exists
   */
  async waitForDeletion<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    options: WaitOptions = {}
  ): Promise<WaitResult<T>> {
    const probe: Probe = {
      poll: async () => {
        try {
          await handle.refresh();
          return { satisfied: false, reason: 'object still exists' };
        } catch (error) {
          if (isNotFoundError(error)) {
            return { satisfied: true };
          }
          throw error;
        }
      },
      onEvent: (event) => {
        if (event.type === 'DELETED') {
          return { satisfied: true };
        }
        handle.observe(event.object);
        return { satisfied: false, reason: 'object still exists' };
      },
    };
    return this.run(handle, probe, { description: 'deletion', ...options });
  }

  private stateProbe<T extends KubernetesObject>(handle: ResourceHandle<T>, check: () => Observation): Probe {
    return {
      poll: async () => {
        try {
          await handle.refresh();
        } catch (error) {
          if (isNotFoundError(error)) {
            return { satisfied: false, reason: 'NotFound' };
          }
          throw error;
        }
        return check();
      },
      onEvent: (event) => {
        if (event.type === 'DELETED') {
          return { satisfied: false, reason: 'object was deleted' };
        }
        handle.observe(event.object);
        return check();
      },
    };
  }

  private async run<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    probe: Probe,
    options: WaitOptions
  ): Promise<WaitResult<T>> {
    const interval = Math.max(0, options.interval ?? this.defaults.interval);
    const timeout = Math.max(0, options.timeout ?? this.defaults.timeout);
    const onTimeout = options.onTimeout ?? this.defaults.onTimeout;
    const strategy = options.strategy ?? this.defaults.strategy;
    const signal = options.signal;
    const target = options.description ? `${handle.identity} ${options.description}` : handle.identity;

    const start = Date.now();
    const deadline = start + timeout;
    const state: { attempts: number; reason: string | undefined } = { attempts: 0, reason: undefined };

    this.logger.debug('Waiting for condition', { target, timeout, interval, strategy });

    const finish = (satisfied: boolean): WaitResult<T> => {
      const elapsed = Date.now() - start;
      this.logger.debug(satisfied ? 'Condition met' : 'Condition timed out', {
        target,
        attempts: state.attempts,
        elapsed,
      });
      if (!satisfied && onTimeout === 'fail') {
        throw new ConditionTimeoutError(target, timeout, state.attempts, handle.observed, state.reason);
      }
      return { satisfied, observed: handle.observed, attempts: state.attempts, elapsed, reason: state.reason };
    };

    const check = (observation: Observation): boolean => {
      state.attempts++;
      state.reason = observation.reason;
      this.logger.trace('Checked condition', { target, attempt: state.attempts, ...observation });
      return observation.satisfied;
    };

    // a check still running at deadline + interval is abandoned and counts as the final one
    const cutoff = deadline + interval;
    const poll = async (): Promise<'satisfied' | 'unsatisfied' | 'cut-off'> => {
      const bound = deadlineSignal(cutoff - Date.now(), () => new Error(`check exceeded the ${timeout}ms wait budget`));
      try {
        return check(await abortable(probe.poll(), anySignal(signal, bound.signal))) ? 'satisfied' : 'unsatisfied';
      } catch (error) {
        if (bound.signal.aborted && !signal?.aborted) {
          check({ satisfied: false, reason: 'check did not complete before the deadline' });
          return 'cut-off';
        }
        throw error;
      } finally {
        bound.clear();
      }
    };

    try {
      if (signal?.aborted) {
        throw new WaitCancelledError(target, signal.reason);
      }

      let pollNow = true;
      if (strategy === 'watch') {
        const first = await poll();
        if (first !== 'unsatisfied') {
          return finish(first === 'satisfied');
        }
        if (await this.watchUntil(handle, target, probe, check, deadline, signal)) {
          return finish(true);
        }
        this.logger.debug('Watch ended, falling back to polling', { target });
        pollNow = false;
      }

      for (;;) {
        if (pollNow) {
          const outcome = await poll();
          if (outcome !== 'unsatisfied') {
            return finish(outcome === 'satisfied');
          }
        }
        pollNow = true;
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          return finish(false);
        }
        await sleep(Math.min(interval, remaining), signal);
      }
    } catch (error) {
      if (signal?.aborted && !(error instanceof ConditionTimeoutError)) {
        throw error instanceof WaitCancelledError ? error : new WaitCancelledError(target, error);
      }
      throw error;
    }
  }

  /**
   * Apply watch events until satisfied, the deadline passes or the stream ends.
   * Returns false when the caller should fall back to polling.
   */
  private async watchUntil<T extends KubernetesObject>(
    handle: ResourceHandle<T>,
    target: string,
    probe: Probe,
    check: (observation: Observation) => boolean,
    deadline: number,
    signal: AbortSignal | undefined
  ): Promise<boolean> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return false;
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), remaining);
    const events = this.client.watch(handle.type, handle.namespace, {
      resourceVersion: handle.observed?.metadata?.resourceVersion,
      fieldSelector: `metadata.name=${handle.name}`,
      signal: anySignal(signal, controller.signal),
    });

    try {
      for await (const event of events) {
        if (check(probe.onEvent(event))) {
          return true;
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.debug('Watch failed', {
        target,
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      clearTimeout(timer);
      controller.abort();
    }

    if (signal?.aborted) {
      throw new WaitCancelledError(target, signal.reason);
    }
    return false;
  }
}
