import { randomUUID } from 'node:crypto';
import { createPersistence, loadPersistenceDefaults, PinoLogger, type JsonObject } from 'waypoint';
//
import { config } from 'dotenv';
config()
//

const defaults = loadPersistenceDefaults(process.env);
const logger = new PinoLogger({
  name        : 'resume-thread',
  level       : defaults.logLevel,
  prettyPrint : defaults.prettyLogs
});

const turns: Array<{ role: 'user' | 'assistant'; content: string }> = [
  { role: 'user', content: 'Can you help me plan a trip to Lisbon?' },
  { role: 'assistant', content: 'Sure. How many days will you stay?' },
  { role: 'user', content: 'Four days, mostly food and museums.' }
];

async function main(): Promise<void> {
  const store = createPersistence({ defaults, logger });
  const threadId = `trip-${randomUUID()}`;

  await store.initialize();
  logger.info({ backend: store.backend, table: store.tableName }, 'Store ready');

  try {
    for (const [index, turn] of turns.entries()) {
      const state: JsonObject = { messages: turns.slice(0, index + 1), step: index + 1 };
      const saved = await store.saveState(threadId, `step-${index + 1}`, state, { author: turn.role });
      logger.info({ threadId, step: index + 1, saved }, 'Saved checkpoint');
    }

    const checkpoints = await store.listCheckpoints(threadId);
    logger.info({ threadId, checkpoints: checkpoints.map((doc) => doc.checkpointId) }, 'Listed checkpoints');

    const latest = await store.loadState(threadId);
    if (latest) {
      logger.info({ threadId, checkpointId: latest.checkpointId, state: latest.state }, 'Resuming from latest checkpoint');
    }

    const deleted = await store.deleteState(threadId);
    logger.info({ threadId, deleted }, 'Deleted thread');
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'resume-thread failed');
  process.exitCode = 1;
});
