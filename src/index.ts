// This is the process entrypoint that starts the selected transport and handles graceful shutdown.

import { loadRuntimeConfig, type RuntimeConfig } from './config/runtime-config.js';
import { createStdioSession } from './mcp/stdio.js';
import { createServer } from './server.js';
import { buildStderrLogger, errorForLog } from './utils/logger.js';

// stdout belongs to the JSON-RPC stream in this mode, so every log line goes to stderr.
async function runStdio(config: RuntimeConfig): Promise<void> {
  const logger = buildStderrLogger(config.logLevel);
  const session = createStdioSession({
    input: process.stdin,
    output: process.stdout,
    logger,
    portProbeTimeoutMs: config.portProbeTimeoutMs
  });

  process.on('SIGTERM', () => session.close('SIGTERM'));
  process.on('SIGINT', () => session.close('SIGINT'));

  logger.info({ event: 'stdio_server_started' }, 'stdio_server_started');
  await session.start();
  logger.info({ event: 'shutdown_completed' }, 'shutdown_completed');
  process.exit(0);
}

async function runHttp(config: RuntimeConfig): Promise<void> {
  const { app, registry } = createServer(config);

  // This helper performs graceful shutdown so open observer streams end before the listener closes.
  async function shutdown(signal: string): Promise<void> {
    app.log.info({ signal }, 'shutdown_started');

    try {
      await app.close();
    } catch (error) {
      app.log.error({ event: 'shutdown_failed', error: errorForLog(error) }, 'shutdown_failed');
      process.exit(1);
    }

    app.log.info({ signal }, 'shutdown_completed');
    process.exit(0);
  }

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  await app.listen({ host: config.host, port: config.port });
  app.log.info(
    {
      host: config.host,
      port: config.port,
      ssePath: config.ssePath,
      messagesPath: config.messagesPath,
      tools: registry.size
    },
    'server_started'
  );
}

async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  if (config.transport === 'stdio') {
    await runStdio(config);
    return;
  }

  await runHttp(config);
}

main().catch((error: unknown) => {
  // Startup failures happen before a logger exists; stderr keeps stdout clean for stdio mode.
  process.stderr.write(`${JSON.stringify({ level: 'fatal', msg: 'server_start_failed', error: errorForLog(error) })}\n`);
  process.exit(1);
});
