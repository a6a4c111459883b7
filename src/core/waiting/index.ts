export {
  type ConditionPolicy,
  type ConditionsWaitOptions,
  ConditionWaiter,
  DEFAULT_WAITER_OPTIONS,
  type NamedCondition,
  type ReadyWaitOptions,
  type TimeoutPolicy,
  type WaiterDefaults,
  type WaitOptions,
  type WaitResult,
  type WaitStrategy,
} from './condition-waiter.js';
