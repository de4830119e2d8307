import { Command } from 'commander';
import { startHealthServer } from '../../server/health.js';
import { OpenRuntime } from '../shared.js';

export function serveCommand(open: OpenRuntime): Command {
  return new Command('serve')
    .description('Run the health endpoint and the recurring sync for every enabled tenant')
    .option('-p, --port <port>', 'health check port (defaults to $PORT or 8080)')
    .action(async (options: { port?: string }) => {
      const runtime = await open();
      const { config, logger } = runtime.context;
      const port = options.port ? Number.parseInt(options.port, 10) : config.server.port;

      const server = await startHealthServer(port, logger);
      await runtime.scheduler.restore();
      runtime.scheduler.watch(config.sync.watchIntervalMs);
      logger.info('Sync service is running...');

      const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down`);
        server.close();
        runtime.close().then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error(`Shutdown failed: ${String(error)}`);
            process.exit(1);
          }
        );
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    });
}
