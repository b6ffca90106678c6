// apps/http/src/index.ts
import { isLexiruleError, log } from '@lexirule/core';
import { buildApp } from './app';
import { loadConfig } from './config';
import { createContext } from './context';

async function main() {
  const config = loadConfig();
  const ctx = await createContext(config);
  const app = await buildApp(ctx);

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info({ host: config.server.host, port: config.server.port, env: config.env }, 'http-listening');
}

main().catch((err: unknown) => {
  if (isLexiruleError(err)) {
    log.fatal({ code: err.code, details: err.details, error: err.message }, 'boot-failed');
  } else {
    log.fatal({ err }, 'boot-failed');
  }
  process.exit(1);
});
