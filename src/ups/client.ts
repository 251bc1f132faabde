import { lookup } from 'dns/promises';
import type { RawStatus, RawValue, Status, UpsAttribute } from '../types.js';
import { UPS_ATTRIBUTES } from './attributes.js';
import { cloneStatus, decodeStatus, emptyRawStatus, formatYmd, isKnownSymbol } from './decode.js';
import { UpsError, configurationError, queryError, resolutionError } from './errors.js';
import { NetSnmpTransport, type SnmpTransport } from '../snmp/transport.js';

export type HostResolver = (hostname: string) => Promise<string>;

export const resolveIPv4: HostResolver = async (hostname) => {
  const { address } = await lookup(hostname, { family: 4 });
  return address;
};

export interface UpsClientOptions {
  hostname?: string;
  community?: string;
  transport?: SnmpTransport;
  resolver?: HostResolver;
}

const ATTRIBUTE_NAMES: readonly UpsAttribute[] = UPS_ATTRIBUTES.map(a => a.name);

function buildRawStatus(values: RawValue[]): RawStatus {
  if (values.length !== ATTRIBUTE_NAMES.length) {
    throw queryError(`expected ${ATTRIBUTE_NAMES.length} values, got ${values.length}`);
  }
  const raw = emptyRawStatus();
  ATTRIBUTE_NAMES.forEach((name, i) => {
    raw[name] = values[i];
  });
  return raw;
}

function ticksToSeconds(value: RawValue): number | undefined {
  return typeof value === 'number' ? Math.trunc(value / 100) : undefined;
}

// Capacity and load are read at 1/100 % resolution: 8734 is 87.34%, 100 is 1%
function percentToFraction(value: RawValue): number | undefined {
  return typeof value === 'number' ? value / 10000 : undefined;
}

/**
 * Handle on one UPS management card.
 *
 * Failures are recorded on the handle instead of being thrown: check
 * `error()` / `errorMessage()`. Accessors run the first query on demand and
 * afterwards serve the cached status until `query()` is called again.
 */
export class UpsClient {
  private host: string;
  private communityString: string;
  private ip: string | null = null;
  private transport: SnmpTransport;

  private failure: UpsError | null = null;
  private queriedAt: Date | null = null;
  private raw: RawStatus | null = null;
  private decoded: Status | null = null;
  private pending: Promise<void> | null = null;

  private constructor(hostname: string, community: string, transport: SnmpTransport) {
    this.host = hostname;
    this.communityString = community;
    this.transport = transport;
  }

  static async create(options: UpsClientOptions): Promise<UpsClient> {
    const hostname = options.hostname?.trim() ?? '';
    const client = new UpsClient(
      hostname,
      options.community ?? 'public',
      options.transport ?? new NetSnmpTransport(),
    );

    if (!hostname) {
      client.failure = configurationError('No UPS hostname specified.');
      return client;
    }

    const resolve = options.resolver ?? resolveIPv4;
    try {
      client.ip = await resolve(hostname);
    } catch (err) {
      client.failure = resolutionError(hostname, err instanceof Error ? err.message : String(err));
    }
    return client;
  }

  // ============================================
  // State
  // ============================================

  error(): boolean {
    return this.failure !== null;
  }

  errorMessage(): string | undefined {
    if (!this.failure) return undefined;
    return this.failure.message || 'unknown error';
  }

  lastError(): UpsError | undefined {
    return this.failure ?? undefined;
  }

  hostname(): string | undefined {
    return this.failure ? undefined : this.host;
  }

  address(): string | undefined {
    return this.ip ?? undefined;
  }

  community(): string {
    return this.communityString;
  }

  isQueried(): boolean {
    return this.queriedAt !== null;
  }

  lastQuery(): Date | undefined {
    return this.queriedAt ? new Date(this.queriedAt.getTime()) : undefined;
  }

  // ============================================
  // Query
  // ============================================

  /**
   * Walk the UPS attributes and replace the cached status. A handle whose
   * hostname never resolved is left untouched. A failed walk is recorded and
   * cleared again by the next successful one.
   */
  async query(): Promise<void> {
    if (this.ip === null) return;

    const walk = this.walk(this.ip);
    this.pending = walk;
    try {
      await walk;
    } finally {
      if (this.pending === walk) this.pending = null;
    }
  }

  private async walk(ip: string): Promise<void> {
    try {
      const values = await this.transport.getNext(
        { address: ip, community: this.communityString },
        ATTRIBUTE_NAMES,
      );
      const raw = buildRawStatus(values);
      this.decoded = decodeStatus(raw);
      this.raw = raw;
      this.queriedAt = new Date();
      this.failure = null;
    } catch (err) {
      this.failure = err instanceof UpsError
        ? err
        : queryError(err instanceof Error ? err.message : String(err));
    }
  }

  // Reads wait on a walk already in flight, explicit or lazy
  private async ensureQueried(): Promise<void> {
    if (this.pending) {
      await this.pending;
      return;
    }
    if (this.queriedAt || this.failure) return;
    await this.query();
  }

  private async read<T>(pick: (status: Status) => T): Promise<T | undefined> {
    await this.ensureQueried();
    if (this.failure || !this.decoded) return undefined;
    return pick(this.decoded);
  }

  // ============================================
  // Accessors
  // ============================================

  async status(): Promise<Status | undefined> {
    return this.read(cloneStatus);
  }

  async rawStatus(): Promise<RawStatus | undefined> {
    await this.ensureQueried();
    if (this.failure || !this.raw) return undefined;
    return { ...this.raw };
  }

  async onBattery(): Promise<boolean | undefined> {
    return this.read((s) => {
      const output = s.upsBasicOutputStatus;
      if (!isKnownSymbol('upsBasicOutputStatus', output) || output === 'unknown') return undefined;
      return output === 'onBattery' || output === 'onSmartBoost';
    });
  }

  async needsNewBattery(): Promise<boolean | undefined> {
    return this.read((s) => {
      switch (s.upsAdvBatteryReplaceIndicator) {
        case 'batteryNeedsReplacing':
          return true;
        case 'noBatteryNeedsReplacing':
          return false;
        default:
          return undefined;
      }
    });
  }

  async runtime(): Promise<number | undefined> {
    return this.read(s => ticksToSeconds(s.upsAdvBatteryRunTimeRemaining));
  }

  async timeOnBattery(): Promise<number | undefined> {
    return this.read(s => ticksToSeconds(s.upsBasicBatteryTimeOnBattery));
  }

  async charge(): Promise<number | undefined> {
    return this.read(s => percentToFraction(s.upsAdvBatteryCapacity));
  }

  async load(): Promise<number | undefined> {
    return this.read(s => percentToFraction(s.upsAdvOutputLoad));
  }

  async model(): Promise<RawValue | undefined> {
    return this.read(s => s.upsBasicIdentModel);
  }

  async serial(): Promise<RawValue | undefined> {
    return this.read(s => s.upsAdvIdentSerialNumber);
  }

  async name(): Promise<RawValue | undefined> {
    return this.read(s => s.upsBasicIdentName);
  }

  async firmware(): Promise<RawValue | undefined> {
    return this.read(s => s.upsAdvIdentFirmwareRevision);
  }

  async temperature(): Promise<RawValue | undefined> {
    return this.read(s => s.upsAdvBatteryTemperature);
  }

  async birthday(): Promise<string | undefined> {
    return this.read((s) => {
      const date = s.upsAdvIdentDateOfManufacture;
      return date ? formatYmd(date) : undefined;
    });
  }

  async lastBatteryReplacement(): Promise<string | undefined> {
    return this.read((s) => {
      const date = s.upsBasicBatteryLastReplaceDate;
      return date ? formatYmd(date) : undefined;
    });
  }
}
