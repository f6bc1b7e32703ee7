import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['apps/server', 'packages/shared']);
