import { InverterTags } from '../config';
import {
  InverterReading,
  InverterSnapshot,
  LineMeasurement,
  LineMeasurementType,
  Point,
  PowerSnapshot,
} from '../types/sampling';

export const dailyInterval = '24h';

// stored precision is whole seconds
export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

export function linePoint(
  sourceTag: string,
  measurementType: LineMeasurementType,
  lineIdx: number,
  line: LineMeasurement,
  timestamp: Date,
): Point {
  return {
    measurement: `${measurementType}-line${lineIdx}`,
    timestamp: truncateToSeconds(timestamp),
    tags: {
      source: sourceTag,
      'measurement-type': measurementType,
      'line-idx': String(lineIdx),
    },
    fields: {
      P: line.activePower,
      Q: line.reactivePower,
      S: line.apparentPower,
      I_rms: line.rmsCurrent,
      V_rms: line.rmsVoltage,
    },
  };
}

export function powerHighRatePoints(sourceTag: string, snapshot: PowerSnapshot): Point[] {
  const groups: [LineMeasurementType, readonly LineMeasurement[]][] = [
    ['consumption', snapshot.consumption],
    ['production', snapshot.production],
    ['net', snapshot.net],
  ];
  return groups.flatMap(([type, lines]) =>
    lines.map((line, idx) => linePoint(sourceTag, type, idx, line, snapshot.timestamp)),
  );
}

function inverterTags(sourceTag: string, serial: string, inverters: InverterTags): Record<string, string> {
  return {
    ...inverters[serial],
    source: sourceTag,
    'measurement-type': 'inverter',
    serial,
  };
}

export function inverterPoint(sourceTag: string, reading: InverterReading, inverters: InverterTags): Point {
  return {
    measurement: `inverter-production-${reading.deviceId}`,
    timestamp: truncateToSeconds(reading.timestamp),
    tags: inverterTags(sourceTag, reading.deviceId, inverters),
    fields: { P: reading.watts },
  };
}

export function inverterHighRatePoints(
  sourceTag: string,
  snapshot: InverterSnapshot,
  inverters: InverterTags,
): Point[] {
  return [...snapshot.values()].map((reading) => inverterPoint(sourceTag, reading, inverters));
}

export function lineDailyPoint(
  sourceTag: string,
  measurementType: string,
  lineIdx: string,
  wh: number,
  timestamp: Date,
): Point {
  return {
    measurement: `${measurementType}-daily-summary-line${lineIdx}`,
    timestamp: truncateToSeconds(timestamp),
    tags: {
      source: sourceTag,
      'measurement-type': measurementType,
      'line-idx': lineIdx,
      interval: dailyInterval,
    },
    fields: { Wh: wh },
  };
}

export function inverterDailyPoint(
  sourceTag: string,
  serial: string,
  wh: number,
  timestamp: Date,
  inverters: InverterTags,
): Point {
  return {
    measurement: `inverter-daily-summary-${serial}`,
    timestamp: truncateToSeconds(timestamp),
    tags: { ...inverterTags(sourceTag, serial, inverters), interval: dailyInterval },
    fields: { Wh: wh },
  };
}
