import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/eventbus',
  'packages/tasks',
  'packages/jobs',
  'apps/backend',
]);
