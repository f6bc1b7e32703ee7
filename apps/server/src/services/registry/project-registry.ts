import fs from 'fs/promises';
import {
  ProjectRegistryFileSchema,
  type ProjectDescriptor,
} from '@relaunch/shared/relay-schemas';
import { logger } from '../../lib/logger.js';

/**
 * Immutable lookup table from repository identifier to its project descriptor.
 *
 * Built once at startup. Descriptors are frozen, and the class exposes no
 * mutation, so any number of ingress handlers may read it concurrently.
 *
 * @module services/registry/project-registry
 */
export class ProjectRegistry {
  private readonly projects: ReadonlyMap<string, Readonly<ProjectDescriptor>>;

  /**
   * @param descriptors - Ordered descriptors; on duplicate `repo` the last entry wins
   */
  constructor(descriptors: readonly ProjectDescriptor[]) {
    const projects = new Map<string, Readonly<ProjectDescriptor>>();
    for (const descriptor of descriptors) {
      projects.set(descriptor.repo, Object.freeze({ ...descriptor }));
    }
    this.projects = projects;
  }

  /** Exact-match lookup. */
  lookup(repo: string): Readonly<ProjectDescriptor> | undefined {
    return this.projects.get(repo);
  }

  get size(): number {
    return this.projects.size;
  }
}

/** Error thrown when the registry file cannot be read or fails validation. */
export class RegistryLoadError extends Error {
  constructor(
    message: string,
    public readonly code: 'READ_FAILED' | 'INVALID_JSON' | 'INVALID_SCHEMA',
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'RegistryLoadError';
  }
}

/**
 * Read and validate a registry file (a JSON array of project descriptors).
 *
 * Duplicate repositories are logged and resolved last-wins.
 *
 * @param filePath - Path to the registry JSON file
 * @throws RegistryLoadError on read, parse, or schema failure
 */
export async function loadProjectRegistry(filePath: string): Promise<ProjectRegistry> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new RegistryLoadError(`failed to read config file: ${filePath}`, 'READ_FAILED', {
      cause: err,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new RegistryLoadError(`failed to parse config file: ${filePath}`, 'INVALID_JSON', {
      cause: err,
    });
  }

  const result = ProjectRegistryFileSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new RegistryLoadError(`invalid config file ${filePath}: ${details}`, 'INVALID_SCHEMA');
  }

  const seen = new Set<string>();
  for (const { repo } of result.data) {
    if (seen.has(repo)) {
      logger.warn(`[Registry] Duplicate entry for ${repo}; the last one wins`);
    }
    seen.add(repo);
  }

  const registry = new ProjectRegistry(result.data);
  logger.info(`[Registry] Loaded ${registry.size} project configurations`);
  return registry;
}
