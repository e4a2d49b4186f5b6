import type { Observation } from "./decoder.js";

/*
 * Secondary quantities derived from an observation. Every function returns
 * undefined as soon as one of its inputs is missing from the observation.
 */

const LAMBDA = -0.0065; // Temperature lapse rate (K m^-1)
const R_SUB_D = 287.0; // Specific gas constant of dry air (J kg^-1 K^-1)
const G = 9.80665; // Standard gravity (m s^-2)
const HYPSOMETRIC_EXPONENT = G / (R_SUB_D * LAMBDA);
const ZERO_C_KELVIN = 273.15;

// Arden-Buck best fit for saturated vapor pressure over water (hPa, °C).
const ARDEN_BUCK_A = 6.1121;
const ARDEN_BUCK_B = 18.678;
const ARDEN_BUCK_C = 257.14;
const ARDEN_BUCK_D = 234.5;

// Stull best fit for wet bulb temperature.
const STULL_A = 0.151977;
const STULL_B = 8.313659;
const STULL_C = -1.676311;
const STULL_D = 0.00391838;
const STULL_E = 0.023101;
const STULL_F = -4.686035;

// Steadman apparent temperature, radiation-incorporating form.
const STEADMAN_CE = 0.348;
const STEADMAN_CWS = -0.7;
const STEADMAN_CQ = 0.7;
const STEADMAN_OWS = 10.0;
const STEADMAN_B = -4.25;

export type ThermalInputs = Pick<Observation, "airTemperature" | "relativeHumidity">;
export type PressureInputs = Pick<Observation, "stationPressure" | "airTemperature">;
export type ApparentTemperatureInputs = ThermalInputs & Pick<Observation, "wind" | "solar">;

/**
 * Station pressure reduced to mean sea level (hPa) with the hypsometric
 * equation, given the station's elevation in meters.
 */
export function barometricPressure(obs: PressureInputs, stationElevation: number): number | undefined {
  const { stationPressure, airTemperature } = obs;
  if (stationPressure === undefined || airTemperature === undefined) return undefined;

  const tKelvin = airTemperature + ZERO_C_KELVIN;
  const lapse = LAMBDA * stationElevation;
  const ratio = (1 + lapse / (tKelvin - lapse)) ** HYPSOMETRIC_EXPONENT;
  return stationPressure * ratio;
}

/** hPa */
export function saturatedVaporPressure(obs: Pick<Observation, "airTemperature">): number | undefined {
  const t = obs.airTemperature;
  if (t === undefined) return undefined;
  return ARDEN_BUCK_A * Math.exp((ARDEN_BUCK_B - t / ARDEN_BUCK_D) * (t / (ARDEN_BUCK_C + t)));
}

/** hPa */
export function actualVaporPressure(obs: ThermalInputs): number | undefined {
  const saturated = saturatedVaporPressure(obs);
  if (saturated === undefined || obs.relativeHumidity === undefined) return undefined;
  return saturated * (obs.relativeHumidity / 100);
}

/**
 * Temperature (°C) at which the actual vapor pressure would saturate.
 *
 * Solves (B - t/D) * t/(C + t) = ln(e/A) for t, the exact inverse of the
 * Arden-Buck curve; dropping the t/D term gives the familiar C*L/(B - L).
 * Bone-dry air has no dew point.
 */
export function dewPoint(obs: ThermalInputs): number | undefined {
  const actual = actualVaporPressure(obs);
  if (actual === undefined || actual <= 0) return undefined;

  const ln = Math.log(actual / ARDEN_BUCK_A);
  const b = ARDEN_BUCK_B - ln;
  const discriminant = b * b - (4 * ARDEN_BUCK_C * ln) / ARDEN_BUCK_D;
  if (discriminant < 0) return undefined;

  return (ARDEN_BUCK_D / 2) * (b - Math.sqrt(discriminant));
}

/** °C, Stull's empirical fit */
export function wetBulbTemperature(obs: ThermalInputs): number | undefined {
  const { airTemperature: t, relativeHumidity: rh } = obs;
  if (t === undefined || rh === undefined) return undefined;

  return (
    t * Math.atan(STULL_A * Math.sqrt(rh + STULL_B)) +
    Math.atan(t + rh) -
    Math.atan(rh + STULL_C) +
    STULL_D * rh ** 1.5 * Math.atan(STULL_E * rh) +
    STULL_F
  );
}

/** °C, Steadman's apparent temperature including solar radiation */
export function apparentTemperature(obs: ApparentTemperatureInputs): number | undefined {
  const ta = obs.airTemperature;
  const e = actualVaporPressure(obs);
  const ws = obs.wind?.avg.speedMagnitude;
  const q = obs.solar?.irradiance;
  if (ta === undefined || e === undefined || ws === undefined || q === undefined) return undefined;

  return ta + STEADMAN_CE * e + STEADMAN_CWS * ws + (STEADMAN_CQ * q) / (ws + STEADMAN_OWS) + STEADMAN_B;
}

export interface DerivedQuantities {
  barometricPressure?: number;
  vaporPressure?: number;
  dewPoint?: number;
  wetBulbTemperature?: number;
  apparentTemperature?: number;
}

/** Every derived quantity that the observation has the inputs for */
export function deriveQuantities(obs: Observation, stationElevation: number): DerivedQuantities {
  const derived: DerivedQuantities = {};
  const entries: [keyof DerivedQuantities, number | undefined][] = [
    ["barometricPressure", barometricPressure(obs, stationElevation)],
    ["vaporPressure", actualVaporPressure(obs)],
    ["dewPoint", dewPoint(obs)],
    ["wetBulbTemperature", wetBulbTemperature(obs)],
    ["apparentTemperature", apparentTemperature(obs)],
  ];
  for (const [key, value] of entries) {
    if (value !== undefined) derived[key] = value;
  }
  return derived;
}
