import { errorToLog } from '@totalscan/core';
import { buildServer } from './app.js';
import { loadConfig } from './config.js';

const start = async () => {
  const config = loadConfig();
  const fastify = await buildServer(config);

  try {
    await fastify.ready();
    fastify.log.debug(`Registered routes:\n${fastify.printRoutes()}`);

    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(errorToLog(err), 'Dev server failed to start');
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error('Dev server failed to start', errorToLog(err));
  process.exit(1);
});
