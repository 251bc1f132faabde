import { format, getDate, getMonth, isValid } from 'date-fns';
import type {
  BatteryReplaceIndicator,
  BatteryStatus,
  DateAttribute,
  EnumAttribute,
  EnumSymbols,
  LineFailCause,
  OutputStatus,
  RawStatus,
  RawValue,
  Status,
} from '../types.js';

type EnumTable = { readonly [K in EnumAttribute]: ReadonlyMap<number, EnumSymbols[K]> };

export const ENUM_TABLE: EnumTable = {
  upsBasicOutputStatus: new Map<number, OutputStatus>([
    [1, 'unknown'],
    [2, 'onLine'],
    [3, 'onBattery'],
    [4, 'onSmartBoost'],
    [5, 'timedSleeping'],
    [6, 'softwareBypass'],
    [7, 'off'],
    [8, 'rebooting'],
    [9, 'switchedBypass'],
    [10, 'hardwareFailureBypass'],
    [11, 'sleepingUntilPowerReturn'],
    [12, 'onSmartTrim'],
  ]),
  upsAdvInputLineFailCause: new Map<number, LineFailCause>([
    [1, 'noTransfer'],
    [2, 'highLineVoltage'],
    [3, 'brownout'],
    [4, 'blackout'],
    [5, 'smallMomentarySag'],
    [6, 'deepMomentarySag'],
    [7, 'smallMomentarySpike'],
    [8, 'largeMomentarySpike'],
    [9, 'selfTest'],
    [10, 'rateOfVoltageChange'],
  ]),
  upsAdvBatteryReplaceIndicator: new Map<number, BatteryReplaceIndicator>([
    [1, 'noBatteryNeedsReplacing'],
    [2, 'batteryNeedsReplacing'],
  ]),
  upsBasicBatteryStatus: new Map<number, BatteryStatus>([
    [1, 'unknown'],
    [2, 'batteryNormal'],
    [3, 'batteryLow'],
  ]),
};

const ENUM_ATTRIBUTES: readonly EnumAttribute[] = [
  'upsBasicOutputStatus',
  'upsAdvInputLineFailCause',
  'upsAdvBatteryReplaceIndicator',
  'upsBasicBatteryStatus',
];

const DATE_ATTRIBUTES: readonly DateAttribute[] = [
  'upsAdvIdentDateOfManufacture',
  'upsBasicBatteryLastReplaceDate',
];

const MMDDYY = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;

/** A raw status with every attribute absent. */
export function emptyRawStatus(): RawStatus {
  return {
    upsAdvBatteryNominalVoltage: null,
    upsAdvBatteryActualVoltage: null,
    upsAdvBatteryCurrent: null,
    upsAdvTotalDCCurrent: null,
    upsBasicIdentModel: null,
    upsAdvIdentSerialNumber: null,
    upsAdvBatteryCapacity: null,
    upsAdvBatteryTemperature: null,
    upsBasicInputPhase: null,
    upsBasicOutputPhase: null,
    upsAdvOutputLoad: null,
    upsAdvOutputVoltage: null,
    upsAdvOutputFrequency: null,
    upsBasicOutputStatus: null,
    upsAdvBatteryRunTimeRemaining: null,
    upsAdvInputMaxLineVoltage: null,
    upsAdvInputMinLineVoltage: null,
    upsAdvInputLineVoltage: null,
    upsAdvInputFrequency: null,
    upsAdvInputLineFailCause: null,
    upsBasicIdentName: null,
    upsAdvIdentFirmwareRevision: null,
    upsAdvIdentDateOfManufacture: null,
    upsAdvBatteryReplaceIndicator: null,
    upsBasicBatteryLastReplaceDate: null,
    upsBasicBatteryTimeOnBattery: null,
    upsBasicBatteryStatus: null,
  };
}

/** Two-digit years from 50 up are 19xx, below 50 are 20xx. */
export function expandYear(year: number): number {
  if (year >= 100) return year;
  return year >= 50 ? 1900 + year : 2000 + year;
}

/**
 * Parse the card's MM/DD/YY date strings. Returns null when the value is
 * not a date or names a day that does not exist.
 */
export function parseMmDdYy(value: RawValue): Date | null {
  if (typeof value !== 'string') return null;
  const match = MMDDYY.exec(value.trim());
  if (!match) return null;

  const month = parseInt(match[1], 10);
  const day = parseInt(match[2], 10);
  const year = expandYear(parseInt(match[3], 10));

  const date = new Date(year, month - 1, day);
  if (!isValid(date) || getMonth(date) !== month - 1 || getDate(date) !== day) {
    return null;
  }
  return date;
}

export function formatYmd(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/** True when the value is one of the symbols the table defines for the attribute. */
export function isKnownSymbol<K extends EnumAttribute>(attribute: K, value: unknown): value is EnumSymbols[K] {
  for (const symbol of ENUM_TABLE[attribute].values()) {
    if (symbol === value) return true;
  }
  return false;
}

function decodeEnum<K extends EnumAttribute>(attribute: K, value: RawValue): EnumSymbols[K] | RawValue {
  if (typeof value === 'number') {
    const symbol = ENUM_TABLE[attribute].get(value);
    if (symbol !== undefined) return symbol;
  }
  if (value !== null) {
    console.warn(`[decode] ${attribute}: unrecognized code ${JSON.stringify(value)}, keeping raw value`);
  }
  return value;
}

/**
 * Turn the values of one SNMP walk into the user-facing status record.
 * Enumerated codes become their symbols and the two MM/DD/YY fields become
 * dates; everything else is copied as returned by the agent.
 */
export function decodeStatus(raw: RawStatus): Status {
  const status: Status = {
    ...raw,
    upsAdvIdentDateOfManufacture: null,
    upsBasicBatteryLastReplaceDate: null,
  };

  for (const attribute of ENUM_ATTRIBUTES) {
    status[attribute] = decodeEnum(attribute, raw[attribute]);
  }

  for (const attribute of DATE_ATTRIBUTES) {
    const date = parseMmDdYy(raw[attribute]);
    if (!date && raw[attribute] !== null) {
      console.warn(`[decode] ${attribute}: cannot parse ${JSON.stringify(raw[attribute])} as MM/DD/YY`);
    }
    status[attribute] = date;
  }

  return status;
}

/** Copy of a status record that shares no Date instances with the original. */
export function cloneStatus(status: Status): Status {
  const manufactured = status.upsAdvIdentDateOfManufacture;
  const replaced = status.upsBasicBatteryLastReplaceDate;
  return {
    ...status,
    upsAdvIdentDateOfManufacture: manufactured ? new Date(manufactured.getTime()) : null,
    upsBasicBatteryLastReplaceDate: replaced ? new Date(replaced.getTime()) : null,
  };
}
