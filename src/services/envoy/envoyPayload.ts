import { DeviceConnectionError } from '../../errors';
import {
  InverterReading,
  InverterSnapshot,
  LineMeasurement,
  LineMeasurementType,
  PowerSnapshot,
} from '../../types/sampling';

/*
 * Shapes of the two gateway endpoints we read:
 *   GET /production.json?details=1
 *     { production: [{ type: 'eim', measurementType: 'production', readingTime, lines: [...] }],
 *       consumption: [{ type: 'eim', measurementType: 'total-consumption' | 'net-consumption', ... }] }
 *   GET /api/v1/production/inverters
 *     [{ serialNumber, lastReportDate, lastReportWatts, ... }]
 */

const eimTypes: Record<string, LineMeasurementType> = {
  production: 'production',
  'total-consumption': 'consumption',
  'net-consumption': 'net',
};

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(detail: string): DeviceConnectionError {
  return new DeviceConnectionError(`unexpected gateway payload: ${detail}`);
}

function readNumber(source: JsonObject, key: string, context: string): number {
  const value = Number(source[key]);
  if (source[key] === null || source[key] === undefined || !Number.isFinite(value)) {
    throw malformed(`${context}.${key} is not a number`);
  }
  return value;
}

function parseLine(raw: unknown, context: string): LineMeasurement {
  if (!isObject(raw)) throw malformed(`${context} is not an object`);
  return {
    activePower: readNumber(raw, 'wNow', context),
    reactivePower: readNumber(raw, 'reactPwr', context),
    apparentPower: readNumber(raw, 'apprntPwr', context),
    rmsCurrent: readNumber(raw, 'rmsCurrent', context),
    rmsVoltage: readNumber(raw, 'rmsVoltage', context),
  };
}

function eimEntries(payload: JsonObject): JsonObject[] {
  const sections = [payload.production, payload.consumption];
  return sections.flatMap((section) =>
    Array.isArray(section) ? section.filter(isObject).filter((entry) => entry.type === 'eim') : [],
  );
}

export function parsePowerSnapshot(payload: unknown, receivedAt: Date): PowerSnapshot {
  if (!isObject(payload)) throw malformed('production payload is not an object');

  const lines: Record<LineMeasurementType, LineMeasurement[]> = {
    production: [],
    consumption: [],
    net: [],
  };
  let readingTime: number | null = null;
  let found = 0;

  for (const entry of eimEntries(payload)) {
    const type = typeof entry.measurementType === 'string' ? eimTypes[entry.measurementType] : undefined;
    if (!type) continue;
    found += 1;
    const rawLines = Array.isArray(entry.lines) ? entry.lines : [];
    lines[type] = rawLines.map((line, idx) => parseLine(line, `${type}.lines[${idx}]`));
    const entryTime = Number(entry.readingTime);
    if (readingTime === null && Number.isFinite(entryTime) && entryTime > 0) {
      readingTime = entryTime;
    }
  }

  if (found === 0) throw malformed('no metering (eim) entries');

  return {
    timestamp: readingTime !== null ? new Date(readingTime * 1000) : receivedAt,
    production: lines.production,
    consumption: lines.consumption,
    net: lines.net,
  };
}

export function parseInverterSnapshot(payload: unknown): InverterSnapshot {
  if (!Array.isArray(payload)) throw malformed('inverter payload is not an array');

  const snapshot: InverterSnapshot = new Map();
  payload.forEach((raw, idx) => {
    if (!isObject(raw)) throw malformed(`inverters[${idx}] is not an object`);
    const serial = raw.serialNumber;
    if (typeof serial !== 'string' || serial === '') {
      throw malformed(`inverters[${idx}].serialNumber is missing`);
    }
    const reading: InverterReading = {
      deviceId: serial,
      timestamp: new Date(readNumber(raw, 'lastReportDate', `inverters[${idx}]`) * 1000),
      watts: readNumber(raw, 'lastReportWatts', `inverters[${idx}]`),
    };
    snapshot.set(serial, reading);
  });
  return snapshot;
}
