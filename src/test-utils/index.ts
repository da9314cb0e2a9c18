/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestWorkspace } from '../../test-utils/index.js';
 *
 * let workspace: TestWorkspace;
 * beforeEach(() => {
 *   workspace = createTestWorkspace();
 * });
 * afterEach(() => workspace.cleanup());
 * ```
 */

export { resetAll } from './reset.js';
export { createTestWorkspace, type TestWorkspace, type TestWorkspaceOptions } from './workspace.js';
export { createCliHarness, HARNESS_CONFIG, type CliHarness } from './cli.js';
