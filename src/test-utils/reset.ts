/**
 * Test Utilities - Unified Reset
 *
 * Resets every process-wide singleton for test isolation.
 *
 * ORDER MATTERS: the migration tracker refers to the connection, so the
 * connection closes first.
 *
 * @example
 * ```typescript
 * import { resetAll } from '../test-utils/index.js';
 *
 * beforeEach(() => {
 *   resetAll();
 *   vi.clearAllMocks();
 * });
 * ```
 */

import { closeDb, resetMigrationState } from '../database/index.js';
import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  closeDb();
  resetMigrationState();
  _clearEnvCache();
}
