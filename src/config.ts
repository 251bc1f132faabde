import { readFileSync, existsSync } from 'fs';
import toml from 'toml';
import { z } from 'zod';
import type { Config } from './types.js';
import { DEFAULT_MIB_PATH } from './ups/attributes.js';

export const DEFAULT_CONFIG: Config = {
  snmp: {
    community: 'public',
    port: 161,
    mib_path: DEFAULT_MIB_PATH,
  },
  api: {
    bind: '127.0.0.1:3161',
    hosts: [],
  },
};

const ConfigFileSchema = z.object({
  snmp: z.object({
    community: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    mib_path: z.string().min(1),
  }).partial().optional(),
  api: z.object({
    bind: z.string().regex(/^[^:]+:\d+$/, 'expected host:port'),
    hosts: z.array(z.string().min(1)),
  }).partial().optional(),
});

function applyEnvOverrides(config: Config): Config {
  if (process.env.UPS_COMMUNITY) {
    config.snmp.community = process.env.UPS_COMMUNITY;
  }
  if (process.env.UPS_MIB_PATH) {
    config.snmp.mib_path = process.env.UPS_MIB_PATH;
  }
  if (process.env.API_BIND) {
    config.api.bind = process.env.API_BIND;
  }
  if (process.env.API_HOSTS) {
    config.api.hosts = process.env.API_HOSTS.split(',').map(h => h.trim()).filter(Boolean);
  }
  return config;
}

export function loadConfig(configPath: string): Config {
  if (!existsSync(configPath)) {
    console.warn(`Config file not found at ${configPath}, using defaults`);
    return applyEnvOverrides({
      snmp: { ...DEFAULT_CONFIG.snmp },
      api: { ...DEFAULT_CONFIG.api, hosts: [...DEFAULT_CONFIG.api.hosts] },
    });
  }

  const content = readFileSync(configPath, 'utf-8');
  const parsed = ConfigFileSchema.parse(toml.parse(content));

  const config: Config = {
    snmp: { ...DEFAULT_CONFIG.snmp, ...parsed.snmp },
    api: {
      ...DEFAULT_CONFIG.api,
      ...parsed.api,
      hosts: [...(parsed.api?.hosts ?? DEFAULT_CONFIG.api.hosts)],
    },
  };

  return applyEnvOverrides(config);
}
