export interface Config {
  snmp: SnmpConfig;
  api: ApiConfig;
}

export interface SnmpConfig {
  community: string;
  port: number;
  mib_path: string;
}

export interface ApiConfig {
  bind: string;
  // UPS hostnames the API may walk; anything else is refused
  hosts: string[];
}

// ============================================
// UPS Status Types
// ============================================

export type UpsAttribute =
  | 'upsAdvBatteryNominalVoltage'
  | 'upsAdvBatteryActualVoltage'
  | 'upsAdvBatteryCurrent'
  | 'upsAdvTotalDCCurrent'
  | 'upsBasicIdentModel'
  | 'upsAdvIdentSerialNumber'
  | 'upsAdvBatteryCapacity'
  | 'upsAdvBatteryTemperature'
  | 'upsBasicInputPhase'
  | 'upsBasicOutputPhase'
  | 'upsAdvOutputLoad'
  | 'upsAdvOutputVoltage'
  | 'upsAdvOutputFrequency'
  | 'upsBasicOutputStatus'
  | 'upsAdvBatteryRunTimeRemaining'
  | 'upsAdvInputMaxLineVoltage'
  | 'upsAdvInputMinLineVoltage'
  | 'upsAdvInputLineVoltage'
  | 'upsAdvInputFrequency'
  | 'upsAdvInputLineFailCause'
  | 'upsBasicIdentName'
  | 'upsAdvIdentFirmwareRevision'
  | 'upsAdvIdentDateOfManufacture'
  | 'upsAdvBatteryReplaceIndicator'
  | 'upsBasicBatteryLastReplaceDate'
  | 'upsBasicBatteryTimeOnBattery'
  | 'upsBasicBatteryStatus';

export type EnumAttribute =
  | 'upsBasicOutputStatus'
  | 'upsAdvInputLineFailCause'
  | 'upsAdvBatteryReplaceIndicator'
  | 'upsBasicBatteryStatus';

export type DateAttribute =
  | 'upsAdvIdentDateOfManufacture'
  | 'upsBasicBatteryLastReplaceDate';

export type RawValue = number | string | null;

export type RawStatus = Record<UpsAttribute, RawValue>;

export type OutputStatus =
  | 'unknown'
  | 'onLine'
  | 'onBattery'
  | 'onSmartBoost'
  | 'timedSleeping'
  | 'softwareBypass'
  | 'off'
  | 'rebooting'
  | 'switchedBypass'
  | 'hardwareFailureBypass'
  | 'sleepingUntilPowerReturn'
  | 'onSmartTrim';

export type LineFailCause =
  | 'noTransfer'
  | 'highLineVoltage'
  | 'brownout'
  | 'blackout'
  | 'smallMomentarySag'
  | 'deepMomentarySag'
  | 'smallMomentarySpike'
  | 'largeMomentarySpike'
  | 'selfTest'
  | 'rateOfVoltageChange';

export type BatteryReplaceIndicator = 'noBatteryNeedsReplacing' | 'batteryNeedsReplacing';

export type BatteryStatus = 'unknown' | 'batteryNormal' | 'batteryLow';

export interface EnumSymbols {
  upsBasicOutputStatus: OutputStatus;
  upsAdvInputLineFailCause: LineFailCause;
  upsAdvBatteryReplaceIndicator: BatteryReplaceIndicator;
  upsBasicBatteryStatus: BatteryStatus;
}

/**
 * Decoded UPS status. Enumerated attributes hold their symbol, or the raw
 * value when the agent reported a code the table does not know.
 */
export type Status =
  & { [K in Exclude<UpsAttribute, EnumAttribute | DateAttribute>]: RawValue }
  & { [K in EnumAttribute]: EnumSymbols[K] | RawValue }
  & { [K in DateAttribute]: Date | null };

export type UpsErrorCode = 'CONFIGURATION' | 'RESOLUTION' | 'TRANSPORT' | 'QUERY';

export interface UpsErrorInfo {
  code: UpsErrorCode;
  message: string;
  detail?: string;
}

export interface UpsSummary {
  hostname: string;
  address: string;
  on_battery: boolean | null;
  needs_new_battery: boolean | null;
  runtime_seconds: number | null;
  charge: number | null;
  load: number | null;
  model: RawValue;
  serial: RawValue;
  name: RawValue;
  firmware: RawValue;
  temperature: RawValue;
  birthday: string | null;
}
