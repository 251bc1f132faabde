import type { FastifyInstance, FastifyReply } from 'fastify';
import type { Status, UpsErrorCode, UpsSummary, RawValue } from '../types.js';
import type { UpsClient } from '../ups/client.js';
import { formatYmd } from '../ups/decode.js';

export type ClientFactory = (hostname: string, community: string) => Promise<UpsClient>;

type SerializedStatus = Omit<Status, 'upsAdvIdentDateOfManufacture' | 'upsBasicBatteryLastReplaceDate'> & {
  upsAdvIdentDateOfManufacture: string | null;
  upsBasicBatteryLastReplaceDate: string | null;
};

const HTTP_STATUS: Record<UpsErrorCode, number> = {
  CONFIGURATION: 500,
  RESOLUTION: 404,
  TRANSPORT: 502,
  QUERY: 502,
};

function serializeStatus(status: Status): SerializedStatus {
  const manufactured = status.upsAdvIdentDateOfManufacture;
  const replaced = status.upsBasicBatteryLastReplaceDate;
  return {
    ...status,
    upsAdvIdentDateOfManufacture: manufactured ? formatYmd(manufactured) : null,
    upsBasicBatteryLastReplaceDate: replaced ? formatYmd(replaced) : null,
  };
}

function orNull<T>(value: T | undefined): T | null {
  return value === undefined ? null : value;
}

function sendFailure(ups: UpsClient, reply: FastifyReply, host: string) {
  const failure = ups.lastError();
  const message = ups.errorMessage() ?? 'unknown error';
  console.error(`[api] ${host}: ${message}`);
  reply.code(failure ? HTTP_STATUS[failure.code] : 500);
  return { error: message, code: failure?.code ?? null };
}

function refuse(reply: FastifyReply, host: string) {
  console.warn(`[api] ${host}: not in api.hosts, refusing`);
  reply.code(403);
  return { error: `UPS not configured: ${host}`, code: null };
}

export function upsRoutes(createClient: ClientFactory, community: string, hosts: readonly string[]) {
  const allowed = new Set(hosts);

  return async function (fastify: FastifyInstance): Promise<void> {
    // GET /api/ups/:host/status - Full decoded status record
    fastify.get<{
      Params: { host: string };
    }>('/api/ups/:host/status', async (request, reply) => {
      const { host } = request.params;
      if (!allowed.has(host)) {
        return refuse(reply, host);
      }
      const ups = await createClient(host, community);
      const status = await ups.status();

      if (!status) {
        return sendFailure(ups, reply, host);
      }

      return {
        hostname: host,
        address: orNull(ups.address()),
        queried_at: orNull(ups.lastQuery()?.toISOString()),
        status: serializeStatus(status),
      };
    });

    // GET /api/ups/:host/summary - Convenience accessor values
    fastify.get<{
      Params: { host: string };
    }>('/api/ups/:host/summary', async (request, reply) => {
      const { host } = request.params;
      if (!allowed.has(host)) {
        return refuse(reply, host);
      }
      const ups = await createClient(host, community);
      await ups.query();

      if (ups.error()) {
        return sendFailure(ups, reply, host);
      }

      const summary: UpsSummary = {
        hostname: host,
        address: ups.address() ?? '',
        on_battery: orNull(await ups.onBattery()),
        needs_new_battery: orNull(await ups.needsNewBattery()),
        runtime_seconds: orNull(await ups.runtime()),
        charge: orNull(await ups.charge()),
        load: orNull(await ups.load()),
        model: orNull<RawValue>(await ups.model()),
        serial: orNull<RawValue>(await ups.serial()),
        name: orNull<RawValue>(await ups.name()),
        firmware: orNull<RawValue>(await ups.firmware()),
        temperature: orNull<RawValue>(await ups.temperature()),
        birthday: orNull(await ups.birthday()),
      };
      return summary;
    });
  };
}
