import type { UpsClient } from '../ups/client.js';
import type { RawValue } from '../types.js';

export interface UpsReport {
  hostname: string;
  runtime: number | undefined;
  serial: RawValue | undefined;
  charge: number | undefined;
  load: number | undefined;
  model: RawValue | undefined;
  name: RawValue | undefined;
  birthday: string | undefined;
  temperature: RawValue | undefined;
  needsNewBattery: boolean | undefined;
  onBattery: boolean | undefined;
}

// Exact halves go to the even neighbour, like printf
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

// Same as printf("%3.0f", fraction * 100)
export function formatPercent(fraction: number | undefined): string {
  if (fraction === undefined) return '  ?';
  return roundHalfEven(fraction * 100).toFixed(0).padStart(3, ' ');
}

function show(value: RawValue | undefined): string {
  return value === undefined || value === null ? '' : String(value);
}

export async function collectReport(ups: UpsClient): Promise<UpsReport> {
  return {
    hostname: ups.hostname() ?? '',
    runtime: await ups.runtime(),
    serial: await ups.serial(),
    charge: await ups.charge(),
    load: await ups.load(),
    model: await ups.model(),
    name: await ups.name(),
    birthday: await ups.birthday(),
    temperature: await ups.temperature(),
    needsNewBattery: await ups.needsNewBattery(),
    onBattery: await ups.onBattery(),
  };
}

export function formatReport(report: UpsReport): string[] {
  return [
    `UPS Address:\t${report.hostname}`,
    `UPS Runtime:\t${show(report.runtime)} seconds`,
    `UPS Serial:\t${show(report.serial)}`,
    `UPS Battery:\t${formatPercent(report.charge)}%`,
    `UPS Load:\t${formatPercent(report.load)}%`,
    `UPS Model:\t${show(report.model)}`,
    `UPS Name:\t${show(report.name)}`,
    `UPS Birthday:\t${show(report.birthday)}`,
    `UPS Temp:\t${show(report.temperature)}C`,
    `UPS ${report.needsNewBattery ? 'does' : 'does not'} need battery replacement.`,
    `UPS is presently running on ${report.onBattery ? 'battery' : 'input'} power.`,
  ];
}
