/**
 * Vitest setup file
 */

import { beforeAll } from 'vitest';
import { ConsoleMonitor, setMonitor } from '@/lib/sentry';

beforeAll(() => {
  process.env.NODE_ENV = 'test';
  setMonitor(new ConsoleMonitor('silent'));
});
