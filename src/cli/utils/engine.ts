/**
 * Engine lifetime for a single command.
 *
 * Every command that touches the index opens its own engine, runs, and
 * closes it (snapshotting the index) even when the command throws.
 */

import { createRetrievalEngine, type RetrievalEngine } from '../../agent/index.js';
import { loadConfig, type Config } from '../../config/index.js';
import type { CommandContext } from '../types.js';

export async function withEngine<T>(
  ctx: CommandContext,
  run: (engine: RetrievalEngine, config: Config) => Promise<T>
): Promise<T> {
  const config = loadConfig();
  ctx.debug(`Embedding provider: ${config.embedding.provider} (${config.embedding.model})`);

  const engine = await createRetrievalEngine(config, { logger: ctx });
  try {
    return await run(engine, config);
  } finally {
    await engine.close();
  }
}
