import type { ProjectDescriptor } from '@relaunch/shared/relay-schemas';

/** Create a ProjectDescriptor with sensible defaults. */
export function createMockProject(overrides: Partial<ProjectDescriptor> = {}): ProjectDescriptor {
  return {
    repo: 'org/app',
    dir: '/srv/app',
    upCommands: ['docker compose up -d'],
    downCommands: ['docker compose down'],
    ...overrides,
  };
}

/** A small registry fixture: one default project, one with restart commands and a queue override. */
export function createMockProjects(): ProjectDescriptor[] {
  return [
    createMockProject(),
    createMockProject({
      repo: 'org/worker',
      dir: '/srv/worker',
      upCommands: ['./worker.sh start'],
      downCommands: ['./worker.sh stop'],
      restartCommands: ['./worker.sh stop', './worker.sh start'],
      targetQueue: 'executor:workers',
    }),
  ];
}
