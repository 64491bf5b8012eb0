/**
 * Vitest setup file
 * Runs before all tests
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { afterAll } from 'vitest';
import { resetContainer } from '../src/di/container.js';

afterAll(() => {
  // Cleanup DI container
  resetContainer();
});

// NOTE: Tests never touch the real filesystem; use tests/fakes/file-system.fake.ts.
