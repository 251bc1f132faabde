#!/usr/bin/env node
import type { FastifyInstance } from 'fastify';
import { loadConfig } from './config.js';
import { startApi } from './api/index.js';
import { runReport } from './cli/run.js';
import { NetSnmpTransport } from './snmp/transport.js';

const CONFIG_PATH = process.env.CONFIG_PATH ?? './config.toml';

const USAGE = 'Usage: apcups <host> [community]\n       apcups --serve';

let apiRef: FastifyInstance | null = null;

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.error(USAGE);
    process.exit(args.length === 0 ? 2 : 0);
  }

  const config = loadConfig(CONFIG_PATH);

  if (args[0] === '--serve') {
    apiRef = await startApi(config);
    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
    return;
  }

  const [hostname, community] = args;
  const result = await runReport({
    hostname,
    community: community ?? config.snmp.community,
    transport: new NetSnmpTransport({
      mibPath: config.snmp.mib_path,
      port: config.snmp.port,
    }),
  });

  if (!result.ok) {
    throw new Error(result.message);
  }

  for (const line of result.lines) {
    console.log(line);
  }
}

async function shutdown(): Promise<void> {
  console.log('\nShutting down...');

  try {
    await apiRef?.close();
  } catch (err) {
    console.error('Error during shutdown:', err);
  }

  process.exit(0);
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
