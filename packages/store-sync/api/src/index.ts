import { buildApp } from './app.js';
import { config } from './config.js';
import { connectMongo, disconnectMongo, getMongoClient } from './db/mongo.js';
import { MongoConflictRepository } from './data/mongo-conflict-repository.js';
import { MongoEntityStore } from './data/mongo-entity-store.js';
import { ensureRuleIndexes, loadRules } from './data/rule-persistence.js';
import { initConflictEngine } from './engine.js';
import { getLogger } from './logger.js';

/**
 * Build the engine over MongoDB when configured, in memory otherwise.
 */
async function initStorage(): Promise<void> {
  const logger = getLogger();

  if (!config.mongodbUri) {
    logger.warn('MONGODB_URI not set; conflicts and rules will not persist');
    initConflictEngine();
    return;
  }

  const db = await connectMongo();
  const repository = new MongoConflictRepository(getMongoClient(), db);
  const entityStore = new MongoEntityStore(db);
  await repository.ensureIndexes();
  await entityStore.ensureIndexes();
  await ensureRuleIndexes(db);

  const rules = await loadRules(logger);
  initConflictEngine({ repository, entityStore, rules });

  logger.info({ rules: rules.length }, 'Connected to MongoDB');
}

async function start(): Promise<void> {
  try {
    await initStorage();
  } catch (err) {
    getLogger().error({ err }, 'Failed to initialize storage');
    process.exit(1);
  }

  const app = await buildApp();

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      {
        port: config.port,
        host: config.host,
        env: config.nodeEnv,
      },
      `Server running at http://${config.host}:${config.port}`
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await disconnectMongo();
      app.log.info('Server closed');
      process.exit(0);
    } catch (err) {
      app.log.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  getLogger().fatal({ err }, 'Server failed to start');
  process.exit(1);
});
