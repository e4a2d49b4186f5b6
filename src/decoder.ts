import { DecodeError } from "./errors.js";
import { decodeSensorStatus, parseResetFlags, type ResetFlags, type SensorStatus } from "./flags.js";
import type {
  RawDeviceStatus,
  RawHubStatus,
  RawMessage,
  RawObservation,
  RawPrecipEvent,
  RawRapidWind,
  RawStrikeEvent,
} from "./reader.js";
import { Wind } from "./wind.js";

interface DeviceMessage {
  serialNumber: string;
  hubSerialNumber?: string;
}

export interface PrecipEvent extends DeviceMessage {
  type: "precip_event";
  timestamp: Date;
}

export interface StrikeEvent extends DeviceMessage {
  type: "strike_event";
  timestamp: Date;
  /** km */
  distance: number;
  energy: number;
}

export interface RapidWind extends DeviceMessage {
  type: "rapid_wind";
  timestamp: Date;
  wind: Wind;
}

export type PrecipKind = "none" | "rain" | "hail" | "rain_hail";

export interface WindObservation {
  lull: Wind;
  avg: Wind;
  gust: Wind;
  intervalMs: number;
}

export interface SolarObservation {
  illuminance: number;
  ultravioletIndex: number;
  irradiance: number;
}

export interface PrecipObservation {
  quantityLastMinute: number;
  kind: PrecipKind;
}

export interface LightningObservation {
  averageDistance: number;
  count: number;
}

export interface Observation extends DeviceMessage {
  type: "observation";
  firmwareRevision: number;
  timestamp: Date;
  wind?: WindObservation;
  /** hPa */
  stationPressure?: number;
  /** °C */
  airTemperature?: number;
  /** % */
  relativeHumidity?: number;
  solar?: SolarObservation;
  precip?: PrecipObservation;
  lightning?: LightningObservation;
  batteryVolts: number;
  reportIntervalMs: number;
}

export interface DeviceStatus extends DeviceMessage {
  type: "device_status";
  timestamp: Date;
  uptimeMs: number;
  voltage: number;
  firmwareRevision: number;
  rssi: number;
  hubRssi: number;
  sensorStatus: SensorStatus;
  debug: boolean;
}

export interface HubStatus {
  type: "hub_status";
  serialNumber: string;
  firmwareRevision: string;
  timestamp: Date;
  uptimeMs: number;
  rssi: number;
  resetFlags: ResetFlags;
  seq: number;
}

export type StationMessage = PrecipEvent | StrikeEvent | RapidWind | Observation | DeviceStatus | HubStatus;

export type StationMessageType = StationMessage["type"];

export type DecodeResult = { ok: true; message: StationMessage } | { ok: false; raw: RawMessage; error: DecodeError };

function fromEpochSeconds(seconds: number): Date {
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) {
    throw new DecodeError("out_of_range", `Timestamp ${seconds} is outside the representable range`);
  }
  return date;
}

function deviceFields(raw: { serial_number: string; hub_sn?: string }): DeviceMessage {
  return raw.hub_sn === undefined
    ? { serialNumber: raw.serial_number }
    : { serialNumber: raw.serial_number, hubSerialNumber: raw.hub_sn };
}

function decodePrecipEvent(raw: RawPrecipEvent): PrecipEvent {
  return { type: "precip_event", ...deviceFields(raw), timestamp: fromEpochSeconds(raw.evt[0]) };
}

function decodeStrikeEvent(raw: RawStrikeEvent): StrikeEvent {
  const [timestamp, distance, energy] = raw.evt;
  return { type: "strike_event", ...deviceFields(raw), timestamp: fromEpochSeconds(timestamp), distance, energy };
}

function decodeRapidWind(raw: RawRapidWind): RapidWind {
  const [timestamp, speed, direction] = raw.ob;
  return { type: "rapid_wind", ...deviceFields(raw), timestamp: fromEpochSeconds(timestamp), wind: new Wind(speed, direction) };
}

/** Where each field of an obs_st reading sits in its positional array */
export const OBSERVATION_SLOTS = {
  timestamp: 0,
  windLull: 1,
  windAvg: 2,
  windGust: 3,
  windDirection: 4,
  windSampleInterval: 5,
  stationPressure: 6,
  airTemperature: 7,
  relativeHumidity: 8,
  illuminance: 9,
  ultravioletIndex: 10,
  irradiance: 11,
  rainLastMinute: 12,
  precipType: 13,
  lightningDistance: 14,
  lightningCount: 15,
  batteryVolts: 16,
  reportInterval: 17,
} as const;

type ObservationFields = { [K in keyof typeof OBSERVATION_SLOTS]: number | undefined };

function readObservationSlots(slots: ReadonlyArray<number | null>): ObservationFields {
  const at = (index: number) => slots[index] ?? undefined;
  const s = OBSERVATION_SLOTS;
  return {
    timestamp: at(s.timestamp),
    windLull: at(s.windLull),
    windAvg: at(s.windAvg),
    windGust: at(s.windGust),
    windDirection: at(s.windDirection),
    windSampleInterval: at(s.windSampleInterval),
    stationPressure: at(s.stationPressure),
    airTemperature: at(s.airTemperature),
    relativeHumidity: at(s.relativeHumidity),
    illuminance: at(s.illuminance),
    ultravioletIndex: at(s.ultravioletIndex),
    irradiance: at(s.irradiance),
    rainLastMinute: at(s.rainLastMinute),
    precipType: at(s.precipType),
    lightningDistance: at(s.lightningDistance),
    lightningCount: at(s.lightningCount),
    batteryVolts: at(s.batteryVolts),
    reportInterval: at(s.reportInterval),
  };
}

// Each group constructor returns undefined unless every field it needs is present.

function windGroup(f: ObservationFields): WindObservation | undefined {
  const { windLull, windAvg, windGust, windDirection, windSampleInterval } = f;
  if (
    windLull === undefined ||
    windAvg === undefined ||
    windGust === undefined ||
    windDirection === undefined ||
    windSampleInterval === undefined
  ) {
    return undefined;
  }
  return {
    lull: new Wind(windLull, windDirection),
    avg: new Wind(windAvg, windDirection),
    gust: new Wind(windGust, windDirection),
    intervalMs: Math.trunc(windSampleInterval) * 1000,
  };
}

function solarGroup(f: ObservationFields): SolarObservation | undefined {
  const { illuminance, ultravioletIndex, irradiance } = f;
  if (illuminance === undefined || ultravioletIndex === undefined || irradiance === undefined) {
    return undefined;
  }
  return { illuminance, ultravioletIndex, irradiance };
}

const PRECIP_KINDS: readonly PrecipKind[] = ["none", "rain", "hail", "rain_hail"];

/** Throws on a precipitation type code outside 0-3 */
function precipGroup(f: ObservationFields): PrecipObservation | undefined {
  const { rainLastMinute, precipType } = f;
  if (rainLastMinute === undefined || precipType === undefined) {
    return undefined;
  }
  const kind: PrecipKind | undefined = Number.isInteger(precipType) ? PRECIP_KINDS[precipType] : undefined;
  if (kind === undefined) {
    throw new DecodeError("unrecognized_code", `Unrecognized precip type ${precipType}`);
  }
  return { quantityLastMinute: rainLastMinute, kind };
}

function lightningGroup(f: ObservationFields): LightningObservation | undefined {
  const { lightningDistance, lightningCount } = f;
  if (lightningDistance === undefined || lightningCount === undefined) {
    return undefined;
  }
  return { averageDistance: lightningDistance, count: Math.trunc(lightningCount) };
}

function required(value: number | undefined, what: string): number {
  if (value === undefined) {
    throw new DecodeError("missing_field", `Missing ${what}`);
  }
  return value;
}

function decodeObservation(raw: RawObservation): Observation {
  const f = readObservationSlots(raw.obs[0]);

  const timestamp = fromEpochSeconds(Math.trunc(required(f.timestamp, "observation timestamp")));
  const wind = windGroup(f);
  const solar = solarGroup(f);
  const precip = precipGroup(f);
  const lightning = lightningGroup(f);
  const batteryVolts = required(f.batteryVolts, "battery voltage");
  const reportIntervalMs = Math.trunc(required(f.reportInterval, "report interval")) * 60 * 1000;

  const observation: Observation = {
    type: "observation",
    ...deviceFields(raw),
    firmwareRevision: raw.firmware_revision,
    timestamp,
    batteryVolts,
    reportIntervalMs,
  };
  if (wind) observation.wind = wind;
  if (f.stationPressure !== undefined) observation.stationPressure = f.stationPressure;
  if (f.airTemperature !== undefined) observation.airTemperature = f.airTemperature;
  if (f.relativeHumidity !== undefined) observation.relativeHumidity = f.relativeHumidity;
  if (solar) observation.solar = solar;
  if (precip) observation.precip = precip;
  if (lightning) observation.lightning = lightning;
  return observation;
}

function decodeDeviceStatus(raw: RawDeviceStatus): DeviceStatus {
  return {
    type: "device_status",
    ...deviceFields(raw),
    timestamp: fromEpochSeconds(raw.timestamp),
    uptimeMs: raw.uptime * 1000,
    voltage: raw.voltage,
    firmwareRevision: raw.firmware_revision,
    rssi: raw.rssi,
    hubRssi: raw.hub_rssi,
    sensorStatus: decodeSensorStatus(raw.sensor_status),
    debug: raw.debug === 1,
  };
}

function decodeHubStatus(raw: RawHubStatus): HubStatus {
  return {
    type: "hub_status",
    serialNumber: raw.serial_number,
    firmwareRevision: raw.firmware_revision,
    timestamp: fromEpochSeconds(raw.timestamp),
    uptimeMs: raw.uptime * 1000,
    rssi: raw.rssi,
    resetFlags: parseResetFlags(raw.reset_flags),
    seq: raw.seq,
  };
}

/**
 * Converts one raw message into its domain form. A failure hands back the
 * untouched raw message alongside the error so the caller can log both.
 */
export function decodeMessage(raw: RawMessage): DecodeResult {
  try {
    switch (raw.type) {
      case "evt_precip":
        return { ok: true, message: decodePrecipEvent(raw) };
      case "evt_strike":
        return { ok: true, message: decodeStrikeEvent(raw) };
      case "rapid_wind":
        return { ok: true, message: decodeRapidWind(raw) };
      case "obs_st":
        return { ok: true, message: decodeObservation(raw) };
      case "device_status":
        return { ok: true, message: decodeDeviceStatus(raw) };
      case "hub_status":
        return { ok: true, message: decodeHubStatus(raw) };
      default: {
        const unknown: never = raw;
        throw new Error(`Unhandled raw message ${JSON.stringify(unknown)}`);
      }
    }
  } catch (err) {
    if (err instanceof DecodeError) {
      return { ok: false, raw, error: err };
    }
    throw err;
  }
}

/**
 * Decodes a stream of raw messages. Undecodable messages are logged and
 * dropped; the stream only ends when its source does.
 */
export async function* decodeMessages(raws: AsyncIterable<RawMessage>): AsyncGenerator<StationMessage> {
  for await (const raw of raws) {
    const result = decodeMessage(raw);
    if (result.ok) {
      yield result.message;
    } else {
      console.warn(`Dropped undecodable message: ${JSON.stringify(result.raw)}`);
      console.warn(`.. error was: ${result.error.message}`);
    }
  }
}
