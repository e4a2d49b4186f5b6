import { DecodeError } from "./errors.js";

export interface SensorStatus {
  lightningFailure: boolean;
  lightningNoise: boolean;
  lightningDisturber: boolean;
  pressureFailed: boolean;
  temperatureFailed: boolean;
  humidityFailed: boolean;
  windFailed: boolean;
  precipFailed: boolean;
  irradianceFailed: boolean;
  powerBoosterDepleted: boolean;
  powerBoosterShorePower: boolean;
}

const SENSOR_STATUS_BITS: Record<keyof SensorStatus, number> = {
  lightningFailure: 0x1,
  lightningNoise: 0x2,
  lightningDisturber: 0x4,
  pressureFailed: 0x8,
  temperatureFailed: 0x10,
  humidityFailed: 0x20,
  windFailed: 0x40,
  precipFailed: 0x80,
  irradianceFailed: 0x100,
  powerBoosterDepleted: 0x8000,
  powerBoosterShorePower: 0x10000,
};

/** Bits outside the known masks are ignored. */
export function decodeSensorStatus(field: number): SensorStatus {
  const has = (mask: number) => (field & mask) !== 0;
  return {
    lightningFailure: has(SENSOR_STATUS_BITS.lightningFailure),
    lightningNoise: has(SENSOR_STATUS_BITS.lightningNoise),
    lightningDisturber: has(SENSOR_STATUS_BITS.lightningDisturber),
    pressureFailed: has(SENSOR_STATUS_BITS.pressureFailed),
    temperatureFailed: has(SENSOR_STATUS_BITS.temperatureFailed),
    humidityFailed: has(SENSOR_STATUS_BITS.humidityFailed),
    windFailed: has(SENSOR_STATUS_BITS.windFailed),
    precipFailed: has(SENSOR_STATUS_BITS.precipFailed),
    irradianceFailed: has(SENSOR_STATUS_BITS.irradianceFailed),
    powerBoosterDepleted: has(SENSOR_STATUS_BITS.powerBoosterDepleted),
    powerBoosterShorePower: has(SENSOR_STATUS_BITS.powerBoosterShorePower),
  };
}

export interface ResetFlags {
  brownout: boolean;
  pin: boolean;
  powerOn: boolean;
  software: boolean;
  watchdog: boolean;
  windowWatchdog: boolean;
  lowPower: boolean;
  hardFault: boolean;
}

const RESET_FLAG_LABELS: Record<string, keyof ResetFlags> = {
  BOR: "brownout",
  PIN: "pin",
  POR: "powerOn",
  SFT: "software",
  WDG: "watchdog",
  WWD: "windowWatchdog",
  LPW: "lowPower",
  HRDFLT: "hardFault",
};

/**
 * Parses the hub's comma-separated reset cause labels, e.g. "BOR,PIN,POR".
 * Throws a DecodeError on any label it does not know.
 */
export function parseResetFlags(labels: string): ResetFlags {
  const flags: ResetFlags = {
    brownout: false,
    pin: false,
    powerOn: false,
    software: false,
    watchdog: false,
    windowWatchdog: false,
    lowPower: false,
    hardFault: false,
  };

  for (const label of labels.split(",")) {
    const flag = Object.hasOwn(RESET_FLAG_LABELS, label) ? RESET_FLAG_LABELS[label] : undefined;
    if (flag === undefined) {
      throw new DecodeError("unrecognized_code", `Unrecognized reset flag label "${label}"`);
    }
    flags[flag] = true;
  }

  return flags;
}
