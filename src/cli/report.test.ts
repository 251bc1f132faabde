import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatPercent, formatReport, type UpsReport } from './report.js';
import { runReport } from './run.js';
import { queryError } from '../ups/errors.js';
import type { SnmpTransport } from '../snmp/transport.js';
import type { RawStatus, RawValue } from '../types.js';

const REPORT: UpsReport = {
  hostname: 'ups1.example.test',
  runtime: 3699,
  serial: 'AS0000000001',
  charge: 0.8734,
  load: 0.42,
  model: 'Smart-UPS 1500',
  name: 'rack-a',
  birthday: '1999-01-02',
  temperature: 31,
  needsNewBattery: false,
  onBattery: true,
};

describe('formatPercent', () => {
  it('rounds to whole percent in a three character field', () => {
    expect(formatPercent(0.8734)).toBe(' 87');
    expect(formatPercent(1)).toBe('100');
    expect(formatPercent(0.05)).toBe('  5');
    expect(formatPercent(0.876)).toBe(' 88');
  });

  it('rounds exact halves to the even percent', () => {
    expect(formatPercent(0.125)).toBe(' 12');
    expect(formatPercent(0.375)).toBe(' 38');
    expect(formatPercent(0.625)).toBe(' 62');
  });
});

describe('formatReport', () => {
  it('prints one labelled line per field', () => {
    expect(formatReport(REPORT)).toEqual([
      'UPS Address:\tups1.example.test',
      'UPS Runtime:\t3699 seconds',
      'UPS Serial:\tAS0000000001',
      'UPS Battery:\t 87%',
      'UPS Load:\t 42%',
      'UPS Model:\tSmart-UPS 1500',
      'UPS Name:\track-a',
      'UPS Birthday:\t1999-01-02',
      'UPS Temp:\t31C',
      'UPS does not need battery replacement.',
      'UPS is presently running on battery power.',
    ]);
  });

  it('reports battery replacement and input power', () => {
    const lines = formatReport({ ...REPORT, needsNewBattery: true, onBattery: false });
    expect(lines[9]).toBe('UPS does need battery replacement.');
    expect(lines[10]).toBe('UPS is presently running on input power.');
  });
});

describe('runReport', () => {
  const values: Partial<RawStatus> = {
    upsBasicOutputStatus: 2,
    upsAdvBatteryCapacity: 10000,
    upsAdvOutputLoad: 1300,
    upsAdvBatteryRunTimeRemaining: 180000,
    upsAdvIdentDateOfManufacture: '05/06/07',
    upsBasicBatteryLastReplaceDate: '05/06/07',
    upsAdvBatteryReplaceIndicator: 2,
    upsBasicIdentModel: 'Back-UPS',
    upsAdvIdentSerialNumber: 'SN-1',
    upsBasicIdentName: 'desk',
    upsAdvBatteryTemperature: 25,
  };

  const transport: SnmpTransport = {
    getNext: async (_target, attributes) => attributes.map((name): RawValue => values[name] ?? null),
  };

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds the report from one query', async () => {
    const result = await runReport({
      hostname: 'desk-ups',
      community: 'public',
      transport,
      resolver: async () => '192.0.2.10',
    });

    expect(result).toEqual({
      ok: true,
      lines: [
        'UPS Address:\tdesk-ups',
        'UPS Runtime:\t1800 seconds',
        'UPS Serial:\tSN-1',
        'UPS Battery:\t100%',
        'UPS Load:\t 13%',
        'UPS Model:\tBack-UPS',
        'UPS Name:\tdesk',
        'UPS Birthday:\t2007-05-06',
        'UPS Temp:\t25C',
        'UPS does need battery replacement.',
        'UPS is presently running on input power.',
      ],
    });
  });

  it('returns the resolution error', async () => {
    const result = await runReport({
      hostname: 'nowhere.invalid',
      community: 'public',
      transport,
      resolver: async () => {
        throw new Error('ENOTFOUND');
      },
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.message).toBe("Can't resolve: nowhere.invalid");
      expect(result.error?.code).toBe('RESOLUTION');
    }
  });

  it('returns the query error', async () => {
    const result = await runReport({
      hostname: 'desk-ups',
      community: 'public',
      transport: {
        getNext: async () => {
          throw queryError('Request timed out');
        },
      },
      resolver: async () => '192.0.2.10',
    });

    expect(result).toMatchObject({ ok: false, message: 'Unable to fetch UPS parameters.' });
  });
});
