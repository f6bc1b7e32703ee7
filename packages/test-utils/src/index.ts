export { MemoryQueueStore } from './memory-queue-store.js';
export { createMockProject, createMockProjects } from './mock-factories.js';
