/**
 * CodeRunner entry point
 */

import { loadEnvSafely } from '@coderunner/shared/Utils/env.js';
loadEnvSafely(import.meta.url);

import { Logger } from '@coderunner/shared/Utils/logger.js';
import { getConfig } from './config.js';
import { createServer } from './server.js';
import { ExecutionEngine, engineOptionsFromConfig } from './executor/engine.js';
import { Workspace } from './workspace/workspace.js';

const logger = new Logger('coderunner');

async function main() {
  const config = getConfig();

  const workspace = new Workspace(config.workspaceDir);
  await workspace.ensure();

  logger.info('Starting CodeRunner');
  logger.info(`Workspace: ${workspace.root}`);
  logger.info(`Python: ${config.pythonBin}`);
  logger.info(`Timeout: ${config.timeoutMs > 0 ? `${config.timeoutMs} ms` : 'none'}`);
  logger.info(`Cleanup: ${config.cleanup}`);
  if (config.execLogEnabled) {
    logger.info(`Execution log: ${config.logDir}`);
  }

  const engine = new ExecutionEngine(workspace, {
    ...engineOptionsFromConfig(config),
    logger: logger.child('engine'),
  });
  const app = createServer({
    workspace,
    engine,
    maxBody: config.maxBody,
    logger: logger.child('http'),
  });

  const server = app.listen(config.port, config.host, () => {
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : config.port;
    logger.info(`HTTP server running on http://${config.host}:${port}`);
    logger.info('  POST /run_code - Execute code');
    logger.info('  GET  /health   - Health check');
  });

  server.on('error', (err) => {
    logger.error('HTTP server error', err);
    process.exit(1);
  });

  const shutdown = () => {
    logger.info('Shutting down CodeRunner...');
    server.close(() => {
      engine
        .flushLogs()
        .then(() => {
          logger.info('HTTP server closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Failed to flush execution log', error);
          process.exit(1);
        });
    });
    // Running executions are not cancelled; give up on them after 5 seconds
    setTimeout(() => process.exit(0), 5000).unref();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
