import {
  ACTIONS,
  DirectiveSchema,
  type Action,
  type WorkOrder,
} from '@relaunch/shared/relay-schemas';
import type { ProjectRegistry } from '../registry/project-registry.js';
import type { QueueWriter } from '../queue/queue-store.js';
import { buildWorkOrder, serializeWorkOrder } from './work-order-encoder.js';
import { logger } from '../../lib/logger.js';

/**
 * Error class for dispatch failures.
 *
 * Includes a machine-readable `code` so ingress adapters can map failures to
 * their own reporting (HTTP status, log level).
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: 'INVALID_DIRECTIVE' | 'UNKNOWN_REPOSITORY' | 'DELIVERY_FAILED',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

/** Repository and action extracted from a valid directive. */
export interface ResolvedDirective {
  repo: string;
  action: Action;
}

/** Outcome of a successful dispatch. */
export interface DispatchReceipt extends ResolvedDirective {
  targetQueue: string;
  workOrder: WorkOrder;
  /** Target queue length reported by the store after the append. */
  queueLength: number;
}

/** Configuration for the dispatcher. */
export interface DispatcherConfig {
  /** Queue used when a project has no `targetQueue` override. */
  defaultTargetQueue: string;
}

const MISSING_ACTION = "Message must contain either 'up', 'down', or 'restart' field";

/**
 * Validate a decoded directive and extract its repository and action.
 *
 * Exactly one of `up`, `down`, `restart` must be a non-empty string.
 *
 * @throws DispatchError with code `INVALID_DIRECTIVE`
 */
export function resolveDirective(input: unknown): ResolvedDirective {
  const parsed = DirectiveSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.');
    const reason = issue?.message ?? 'invalid input';
    throw new DispatchError(
      field ? `Invalid '${field}' field: ${reason}` : `Invalid directive: ${reason}`,
      'INVALID_DIRECTIVE',
    );
  }

  const populated: ResolvedDirective[] = [];
  for (const action of ACTIONS) {
    const repo = parsed.data[action];
    if (repo) populated.push({ repo, action });
  }

  const [first, ...rest] = populated;
  if (!first) {
    throw new DispatchError(MISSING_ACTION, 'INVALID_DIRECTIVE');
  }
  if (rest.length > 0) {
    const fields = populated.map((p) => p.action).join(', ');
    throw new DispatchError(
      `Message must contain only one of 'up', 'down', or 'restart' field (got: ${fields})`,
      'INVALID_DIRECTIVE',
    );
  }
  return first;
}

/**
 * Shared core of both ingress paths: validate a directive, resolve it against
 * the registry, encode the work-order and append it to the target queue.
 *
 * Holds no mutable state, so concurrent calls from the queue consumer and
 * HTTP handlers need no coordination.
 */
export class Dispatcher {
  private readonly registry: Pick<ProjectRegistry, 'lookup'>;
  private readonly queue: QueueWriter;
  private readonly config: DispatcherConfig;

  constructor(
    registry: Pick<ProjectRegistry, 'lookup'>,
    queue: QueueWriter,
    config: DispatcherConfig,
  ) {
    this.registry = registry;
    this.queue = queue;
    this.config = config;
  }

  /**
   * Dispatch a decoded directive.
   *
   * @param input - Decoded directive body; validated here
   * @throws DispatchError on invalid input, unknown repository or failed append
   */
  async dispatch(input: unknown): Promise<DispatchReceipt> {
    const { repo, action } = resolveDirective(input);

    const descriptor = this.registry.lookup(repo);
    if (!descriptor) {
      throw new DispatchError(
        `no configuration found for repository: ${repo}`,
        'UNKNOWN_REPOSITORY',
      );
    }

    logger.info(`[Dispatch] Processing ${action} command for ${repo}`);

    const targetQueue = descriptor.targetQueue || this.config.defaultTargetQueue;
    const workOrder = buildWorkOrder(repo, action, descriptor);

    let queueLength: number;
    try {
      queueLength = await this.queue.pushTail(targetQueue, serializeWorkOrder(workOrder));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DispatchError(
        `failed to push notification to ${targetQueue}: ${reason}`,
        'DELIVERY_FAILED',
        { cause: err },
      );
    }

    logger.info(`[Dispatch] Sent notification to ${targetQueue} for ${repo} (${action})`);
    return { repo, action, targetQueue, workOrder, queueLength };
  }

  /**
   * Decode a raw JSON message body and dispatch it.
   *
   * @throws DispatchError with code `INVALID_DIRECTIVE` when the body is not JSON
   */
  async dispatchMessage(raw: string): Promise<DispatchReceipt> {
    let input: unknown;
    try {
      input = JSON.parse(raw);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DispatchError(`failed to parse message: ${reason}`, 'INVALID_DIRECTIVE', {
        cause: err,
      });
    }
    return this.dispatch(input);
  }
}
