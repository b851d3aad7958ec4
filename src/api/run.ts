import { buildServer } from './server.ts';
import { getServerConfig } from './config.ts';

const { port, host } = getServerConfig();

const app = buildServer({ logger: true });

await app.listen({ port, host });
