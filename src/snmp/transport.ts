import { access, constants } from 'fs/promises';
import snmp from 'net-snmp';
import type { RawValue, UpsAttribute } from '../types.js';
import { UPS_ATTRIBUTES, DEFAULT_MIB_PATH, MIB_DOWNLOAD_URL } from '../ups/attributes.js';
import { configurationError, queryError, transportError } from '../ups/errors.js';

// 0.5s per attempt, one retry: about 1s worst case per walk
const REQUEST_TIMEOUT_MS = 500;
const REQUEST_RETRIES = 1;

export interface SnmpTarget {
  address: string;
  community: string;
}

/**
 * Performs the GET-NEXT walk over the UPS attributes. Implementations throw
 * an UpsError on failure and otherwise return one value per requested
 * attribute, in request order.
 */
export interface SnmpTransport {
  getNext(target: SnmpTarget, attributes: readonly UpsAttribute[]): Promise<RawValue[]>;
}

export interface NetSnmpTransportOptions {
  mibPath?: string;
  port?: number;
}

interface Varbind {
  oid: string;
  value?: unknown;
}

function oidOf(name: UpsAttribute): string {
  const entry = UPS_ATTRIBUTES.find(a => a.name === name);
  if (!entry) {
    throw configurationError(`No OID known for ${name}`);
  }
  return entry.oid;
}

export function toRawValue(value: unknown): RawValue {
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') return value;
  return null;
}

export class NetSnmpTransport implements SnmpTransport {
  private mibPath: string;
  private port: number;

  constructor(options: NetSnmpTransportOptions = {}) {
    this.mibPath = options.mibPath ?? DEFAULT_MIB_PATH;
    this.port = options.port ?? 161;
  }

  async getNext(target: SnmpTarget, attributes: readonly UpsAttribute[]): Promise<RawValue[]> {
    await this.checkMib();
    const oids = attributes.map(oidOf);

    let session: ReturnType<typeof snmp.createSession>;
    try {
      session = snmp.createSession(target.address, target.community, {
        version: snmp.Version1,
        port: this.port,
        timeout: REQUEST_TIMEOUT_MS,
        retries: REQUEST_RETRIES,
      });
    } catch (err) {
      throw transportError(err instanceof Error ? err.message : String(err));
    }

    return new Promise<RawValue[]>((resolve, reject) => {
      let settled = false;
      const finish = (settle: () => void) => {
        if (settled) return;
        settled = true;
        session.close();
        settle();
      };

      // Emitted for replies that fail to parse; without a listener it throws from the socket handler
      session.on('error', (error: Error) => {
        console.error(`[snmp] ${target.address}: ${error.message}`);
        finish(() => reject(queryError(error.message)));
      });

      session.getNext(oids, (error: Error | null, varbinds?: Varbind[]) => {
        if (error) {
          finish(() => reject(queryError(error.message)));
          return;
        }
        if (!varbinds || varbinds.length === 0) {
          finish(() => reject(queryError('empty response')));
          return;
        }

        const values = attributes.map((name, i) => {
          const value = toRawValue(varbinds[i]?.value);
          if (value === null) {
            console.warn(`[snmp] ${target.address}: no value for ${name}`);
          }
          return value;
        });
        finish(() => resolve(values));
      });
    });
  }

  private async checkMib(): Promise<void> {
    try {
      await access(this.mibPath, constants.R_OK);
    } catch {
      throw configurationError(
        `Can't read MIB: '${this.mibPath}'. Maybe you need to download it from '${MIB_DOWNLOAD_URL}'?`,
      );
    }
  }
}
