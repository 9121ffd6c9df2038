import type { ThresholdPolicy } from '../config/serviceConfig';
import type { ReadingRecord } from '../telemetry/types';
import type { RollupAggregate } from './types';

interface FieldSummary {
  avg: number | null;
  max: number | null;
  min: number | null;
  stddev: number | null;
}

function summarize(values: number[]): FieldSummary {
  if (values.length === 0) {
    return { avg: null, max: null, min: null, stddev: null };
  }
  let sum = 0;
  let max = values[0];
  let min = values[0];
  for (const value of values) {
    sum += value;
    if (value > max) {
      max = value;
    }
    if (value < min) {
      min = value;
    }
  }
  const avg = sum / values.length;
  let stddev: number | null = null;
  if (values.length > 1) {
    let squares = 0;
    for (const value of values) {
      squares += (value - avg) * (value - avg);
    }
    stddev = Math.sqrt(squares / (values.length - 1));
  }
  return { avg, max, min, stddev };
}

function compareReadings(a: ReadingRecord, b: ReadingRecord): number {
  return Date.parse(a.timestamp) - Date.parse(b.timestamp) || a.id - b.id;
}

/**
 * Folds a bucket's readings into a rollup aggregate. The result depends only on the readings and
 * the threshold policy: input order is normalised to (timestamp, id) before folding.
 */
export function computeRollup(readings: readonly ReadingRecord[], thresholds: ThresholdPolicy): RollupAggregate {
  const ordered = [...readings].sort(compareReadings);
  const temperatures: number[] = [];
  const vibrations: number[] = [];
  const powers: number[] = [];
  let highTemperatureCount = 0;
  let highVibrationCount = 0;

  for (const reading of ordered) {
    if (reading.temperature !== null) {
      temperatures.push(reading.temperature);
      if (reading.temperature > thresholds.highTemperature) {
        highTemperatureCount += 1;
      }
    }
    if (reading.vibration !== null) {
      vibrations.push(reading.vibration);
      if (reading.vibration > thresholds.highVibration) {
        highVibrationCount += 1;
      }
    }
    if (reading.power !== null) {
      powers.push(reading.power);
    }
  }

  const temperature = summarize(temperatures);
  const vibration = summarize(vibrations);
  const power = summarize(powers);

  return {
    readingCount: ordered.length,
    avgTemperature: temperature.avg,
    maxTemperature: temperature.max,
    minTemperature: temperature.min,
    temperatureStddev: temperature.stddev,
    avgVibration: vibration.avg,
    maxVibration: vibration.max,
    vibrationStddev: vibration.stddev,
    avgPower: power.avg,
    maxPower: power.max,
    powerStddev: power.stddev,
    highTemperatureCount,
    highVibrationCount
  };
}
