/**
 * Wire-level constants shared by the relay server and its tooling.
 *
 * @module shared/constants
 */

/** Branch reference stamped on every work-order. Never derived from input. */
export const WORK_ORDER_BRANCH = 'refs/heads/main';

/** Queue names used when the environment does not override them. */
export const DEFAULT_QUEUES = {
  source: 'service:commands',
  target: 'poppit:notifications',
} as const;
