import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config.js';

const dir = mkdtempSync(join(tmpdir(), 'apcups-config-'));

function writeToml(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

describe('loadConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('UPS_COMMUNITY', '');
    vi.stubEnv('UPS_MIB_PATH', '');
    vi.stubEnv('API_BIND', '');
    vi.stubEnv('API_HOSTS', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', () => {
    const config = loadConfig(join(dir, 'absent.toml'));
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(console.warn).toHaveBeenCalledWith(`Config file not found at ${join(dir, 'absent.toml')}, using defaults`);
  });

  it('does not share nested objects with the defaults', () => {
    const config = loadConfig(join(dir, 'absent.toml'));
    config.snmp.community = 'changed';
    expect(DEFAULT_CONFIG.snmp.community).toBe('public');
  });

  it('merges file values over the defaults', () => {
    const path = writeToml('partial.toml', '[snmp]\ncommunity = "test-community"\nport = 1161\n');
    const config = loadConfig(path);
    expect(config.snmp).toEqual({
      community: 'test-community',
      port: 1161,
      mib_path: '/usr/share/snmp/mibs/powernet381.mib',
    });
    expect(config.api.bind).toBe('127.0.0.1:3161');
  });

  it('applies environment overrides last', () => {
    const path = writeToml('env.toml', '[snmp]\ncommunity = "from-file"\n[api]\nbind = "0.0.0.0:8080"\n');
    vi.stubEnv('UPS_COMMUNITY', 'from-env');
    vi.stubEnv('UPS_MIB_PATH', '/opt/mibs/powernet.mib');
    vi.stubEnv('API_BIND', '127.0.0.1:9999');

    const config = loadConfig(path);
    expect(config.snmp.community).toBe('from-env');
    expect(config.snmp.mib_path).toBe('/opt/mibs/powernet.mib');
    expect(config.api.bind).toBe('127.0.0.1:9999');
  });

  it('reads the hosts the API may walk', () => {
    const path = writeToml('hosts.toml', '[api]\nhosts = ["rack-a", "rack-b"]\n');
    expect(loadConfig(path).api.hosts).toEqual(['rack-a', 'rack-b']);
    expect(loadConfig(join(dir, 'absent.toml')).api.hosts).toEqual([]);
  });

  it('takes the API hosts from the environment as a comma list', () => {
    vi.stubEnv('API_HOSTS', 'rack-a, rack-b,');
    expect(loadConfig(join(dir, 'absent.toml')).api.hosts).toEqual(['rack-a', 'rack-b']);
  });

  it('rejects values of the wrong type', () => {
    const path = writeToml('bad.toml', '[snmp]\nport = "snmp"\n');
    expect(() => loadConfig(path)).toThrow();
  });
});
