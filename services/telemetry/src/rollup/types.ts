export type RollupGranularity = 'hourly' | 'daily';

export const ROLLUP_GRANULARITIES: readonly RollupGranularity[] = ['hourly', 'daily'];

export interface RollupKey {
  granularity: RollupGranularity;
  machineId: string;
  bucketStart: string;
}

export interface RollupAggregate {
  readingCount: number;
  avgTemperature: number | null;
  maxTemperature: number | null;
  minTemperature: number | null;
  temperatureStddev: number | null;
  avgVibration: number | null;
  maxVibration: number | null;
  vibrationStddev: number | null;
  avgPower: number | null;
  maxPower: number | null;
  powerStddev: number | null;
  highTemperatureCount: number;
  highVibrationCount: number;
}

export interface RollupRecord extends RollupKey, RollupAggregate {
  clientId: string;
  bucketEnd: string;
  computedAt: string;
}

export interface RollupListQuery {
  machineId: string;
  granularity: RollupGranularity;
  from: Date;
  to: Date;
}
