export type MeasurementType = 'consumption' | 'production' | 'net' | 'inverter';
export type LineMeasurementType = Exclude<MeasurementType, 'inverter'>;

export interface LineMeasurement {
  activePower: number; // W
  reactivePower: number; // VAr
  apparentPower: number; // VA
  rmsCurrent: number; // A
  rmsVoltage: number; // V
}

export interface PowerSnapshot {
  readonly timestamp: Date;
  readonly consumption: readonly LineMeasurement[];
  readonly production: readonly LineMeasurement[];
  readonly net: readonly LineMeasurement[];
}

export interface InverterReading {
  deviceId: string;
  timestamp: Date;
  watts: number;
}

export type InverterSnapshot = Map<string, InverterReading>;

export interface Point {
  measurement: string;
  timestamp: Date;
  tags: Record<string, string>;
  fields: Record<string, number>;
}

export interface IntegralGroup {
  key: Record<string, string>;
  value: number;
}

export type LoopName = 'power' | 'inverter';

export interface Clock {
  now(): Date;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const systemClock: Clock = {
  now: () => new Date(),
};
