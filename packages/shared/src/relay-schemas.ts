/**
 * Zod schemas for the relay wire formats.
 *
 * Covers the inbound directive (queue message body or HTTP request body),
 * the project registry file, and the outbound work-order appended to the
 * executor queue.
 *
 * @module shared/relay-schemas
 */
import { z } from 'zod';

// === Actions ===

export const ACTIONS = ['up', 'down', 'restart'] as const;

export const ActionSchema = z.enum(ACTIONS);

export type Action = z.infer<typeof ActionSchema>;

export const WorkOrderTypeSchema = z.enum(['service-up', 'service-down', 'service-restart']);

export type WorkOrderType = z.infer<typeof WorkOrderTypeSchema>;

// === Directive ===

/**
 * Raw inbound directive. Every field is optional and may be null, which
 * counts as absent like an empty string. The "exactly one
 * populated field" rule is enforced by the dispatcher so that both ingress
 * paths report the same reason.
 */
export const DirectiveSchema = z.object({
  up: z.string().nullish(),
  down: z.string().nullish(),
  restart: z.string().nullish(),
});

export type Directive = z.infer<typeof DirectiveSchema>;

// === Project registry ===

export const ProjectDescriptorSchema = z.object({
  repo: z.string().min(1),
  dir: z.string().min(1),
  upCommands: z.array(z.string()).default([]),
  downCommands: z.array(z.string()).default([]),
  restartCommands: z.array(z.string()).optional(),
  targetQueue: z.string().optional(),
});

export type ProjectDescriptor = z.infer<typeof ProjectDescriptorSchema>;

export const ProjectRegistryFileSchema = z.array(ProjectDescriptorSchema);

// === Work order ===

export const WorkOrderSchema = z.object({
  repo: z.string(),
  branch: z.string(),
  type: WorkOrderTypeSchema,
  dir: z.string(),
  commands: z.array(z.string()),
});

export type WorkOrder = z.infer<typeof WorkOrderSchema>;
