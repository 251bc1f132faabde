import Fastify, { type FastifyInstance } from 'fastify';
import type { Config } from '../types.js';
import { UpsClient } from '../ups/client.js';
import { NetSnmpTransport } from '../snmp/transport.js';
import { upsRoutes, type ClientFactory } from './ups.js';

export async function buildApi(config: Config, createClient?: ClientFactory): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
  });

  const transport = new NetSnmpTransport({
    mibPath: config.snmp.mib_path,
    port: config.snmp.port,
  });
  const factory: ClientFactory = createClient
    ?? ((hostname, community) => UpsClient.create({ hostname, community, transport }));

  await fastify.register(upsRoutes(factory, config.snmp.community, config.api.hosts));

  fastify.get('/api/health', async () => {
    return { ok: true };
  });

  return fastify;
}

export async function startApi(config: Config): Promise<FastifyInstance> {
  const fastify = await buildApi(config);

  // Parse bind address
  const [host, portStr] = config.api.bind.split(':');
  const port = parseInt(portStr, 10);

  await fastify.listen({ host, port });
  console.log(`API server listening on ${config.api.bind}`);
  return fastify;
}
