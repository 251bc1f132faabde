import type { UpsAttribute } from '../types.js';

// PowerNet-MIB: enterprises.apc.products.hardware.ups
const UPS = '1.3.6.1.4.1.318.1.1.1';

/**
 * Attributes fetched on every query, in request order. Results of the
 * GET-NEXT come back aligned with this list.
 */
export const UPS_ATTRIBUTES: ReadonlyArray<{ name: UpsAttribute; oid: string }> = [
  { name: 'upsAdvBatteryNominalVoltage', oid: `${UPS}.2.2.7` },    // VDC
  { name: 'upsAdvBatteryActualVoltage', oid: `${UPS}.2.2.8` },     // VDC
  { name: 'upsAdvBatteryCurrent', oid: `${UPS}.2.2.9` },           // A
  { name: 'upsAdvTotalDCCurrent', oid: `${UPS}.2.2.10` },          // A
  { name: 'upsBasicIdentModel', oid: `${UPS}.1.1.1` },
  { name: 'upsAdvIdentSerialNumber', oid: `${UPS}.1.2.3` },
  { name: 'upsAdvBatteryCapacity', oid: `${UPS}.2.2.1` },
  { name: 'upsAdvBatteryTemperature', oid: `${UPS}.2.2.2` },       // C
  { name: 'upsBasicInputPhase', oid: `${UPS}.3.1.1` },
  { name: 'upsBasicOutputPhase', oid: `${UPS}.4.1.2` },
  { name: 'upsAdvOutputLoad', oid: `${UPS}.4.2.3` },
  { name: 'upsAdvOutputVoltage', oid: `${UPS}.4.2.1` },            // VAC
  { name: 'upsAdvOutputFrequency', oid: `${UPS}.4.2.2` },          // Hz
  { name: 'upsBasicOutputStatus', oid: `${UPS}.4.1.1` },
  { name: 'upsAdvBatteryRunTimeRemaining', oid: `${UPS}.2.2.3` },  // ticks
  { name: 'upsAdvInputMaxLineVoltage', oid: `${UPS}.3.2.2` },      // VAC, last 60s
  { name: 'upsAdvInputMinLineVoltage', oid: `${UPS}.3.2.3` },      // VAC, last 60s
  { name: 'upsAdvInputLineVoltage', oid: `${UPS}.3.2.1` },         // VAC
  { name: 'upsAdvInputFrequency', oid: `${UPS}.3.2.4` },           // Hz
  { name: 'upsAdvInputLineFailCause', oid: `${UPS}.3.2.5` },
  { name: 'upsBasicIdentName', oid: `${UPS}.1.1.2` },
  { name: 'upsAdvIdentFirmwareRevision', oid: `${UPS}.1.2.1` },
  { name: 'upsAdvIdentDateOfManufacture', oid: `${UPS}.1.2.2` },   // MM/DD/YY
  { name: 'upsAdvBatteryReplaceIndicator', oid: `${UPS}.2.2.4` },
  { name: 'upsBasicBatteryLastReplaceDate', oid: `${UPS}.2.1.3` }, // MM/DD/YY
  { name: 'upsBasicBatteryTimeOnBattery', oid: `${UPS}.2.1.2` },   // ticks
  { name: 'upsBasicBatteryStatus', oid: `${UPS}.2.1.1` },
];

export const MIB_DOWNLOAD_URL = 'ftp://ftp.apcc.com/apc/public/software/pnetmib/mib/381/powernet381.mib';
export const DEFAULT_MIB_PATH = '/usr/share/snmp/mibs/powernet381.mib';
