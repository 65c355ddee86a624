import 'dotenv/config';
import { loadConfig, exitOnConfigError, type Config } from './config/index.js';
import { applyLogLevel, logger } from './utils/logger.js';
import { VerificationPipeline } from './services/pipeline/VerificationPipeline.js';
import { buildServer } from './api/server.js';

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  exitOnConfigError(error);
}

applyLogLevel(config.server.logLevel);

logger.info(
  { extraction: config.extraction.provider, reasoning: config.reasoning.provider },
  'Initializing verification pipeline...'
);

const pipeline = VerificationPipeline.fromConfig(config);
const fastify = await buildServer(pipeline, {
  maxUploadSizeMB: config.server.maxUploadSizeMB,
  environment: config.server.nodeEnv,
});

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

const onSignal = () => {
  shutdown().catch(err => {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
    process.exit(1);
  });
};

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

try {
  await fastify.listen({
    port: config.server.port,
    host: '0.0.0.0',
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}
