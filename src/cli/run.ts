import { UpsClient, type HostResolver } from '../ups/client.js';
import type { UpsError } from '../ups/errors.js';
import type { SnmpTransport } from '../snmp/transport.js';
import { collectReport, formatReport } from './report.js';

export interface ReportOptions {
  hostname: string;
  community: string;
  transport: SnmpTransport;
  resolver?: HostResolver;
}

export type ReportResult =
  | { ok: true; lines: string[] }
  | { ok: false; error: UpsError | undefined; message: string };

/** Query one UPS and build the printable report, or the first error hit. */
export async function runReport(options: ReportOptions): Promise<ReportResult> {
  const ups = await UpsClient.create(options);
  if (!ups.error()) {
    await ups.query();
  }
  if (ups.error()) {
    return { ok: false, error: ups.lastError(), message: ups.errorMessage() ?? 'unknown error' };
  }

  return { ok: true, lines: formatReport(await collectReport(ups)) };
}
