/**
 * Test Utilities - Unified Reset
 *
 * Clears module-level caches between tests. The engine itself holds no
 * process-wide state; the parsed environment is the only cache.
 *
 * @example
 * ```typescript
 * beforeEach(() => {
 *   vi.stubEnv('LANTERN_HOME', dir);
 *   resetAll();
 * });
 * ```
 */

import { _clearEnvCache } from '../config/env.js';

export function resetAll(): void {
  _clearEnvCache();
}
