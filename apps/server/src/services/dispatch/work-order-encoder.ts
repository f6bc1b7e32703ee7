import { WORK_ORDER_BRANCH } from '@relaunch/shared/constants';
import type {
  Action,
  ProjectDescriptor,
  WorkOrder,
  WorkOrderType,
} from '@relaunch/shared/relay-schemas';

const WORK_ORDER_TYPES: Record<Action, WorkOrderType> = {
  up: 'service-up',
  down: 'service-down',
  restart: 'service-restart',
};

/**
 * Select the command list configured for an action.
 *
 * A missing list (typically `restartCommands`) resolves to an empty array;
 * deciding whether that is a no-op is left to the executor.
 */
export function commandsFor(descriptor: ProjectDescriptor, action: Action): string[] {
  switch (action) {
    case 'up':
      return [...descriptor.upCommands];
    case 'down':
      return [...descriptor.downCommands];
    case 'restart':
      return [...(descriptor.restartCommands ?? [])];
  }
}

/** Build the work-order for a resolved directive. Pure: no clock, no ids. */
export function buildWorkOrder(
  repo: string,
  action: Action,
  descriptor: ProjectDescriptor,
): WorkOrder {
  return {
    repo,
    branch: WORK_ORDER_BRANCH,
    type: WORK_ORDER_TYPES[action],
    dir: descriptor.dir,
    commands: commandsFor(descriptor, action),
  };
}

/**
 * Serialize a work-order with a fixed key order so identical inputs always
 * produce byte-identical payloads.
 */
export function serializeWorkOrder(order: WorkOrder): string {
  return JSON.stringify({
    repo: order.repo,
    branch: order.branch,
    type: order.type,
    dir: order.dir,
    commands: order.commands,
  });
}

/** Encode (repository, action, descriptor) straight to the queue payload. */
export function encodeWorkOrder(
  repo: string,
  action: Action,
  descriptor: ProjectDescriptor,
): string {
  return serializeWorkOrder(buildWorkOrder(repo, action, descriptor));
}
