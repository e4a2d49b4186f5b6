import dotenv from "dotenv";
import { parseDuration } from "./utils/parseDuration.js";

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ValidityConfig {
  /** How long a rapid-wind reading stays exported */
  rapidWindMs: number;
  /** Observation values stay fresh for this many of the station's report intervals */
  observationIntervals: number;
  /** How long device and hub status values stay exported */
  statusMs: number;
}

export interface AppConfig {
  port: number;
  udpPort: number;
  /** Station elevation in meters, used to compute barometric pressure */
  stationElevation: number;
  validity: ValidityConfig;
}

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function portFromEnv(env: Env, key: string, fallback: number): number {
  const port = numberFromEnv(env, key, fallback);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${key} must be a port number, got ${port}`);
  }
  return port;
}

function durationFromEnv(env: Env, key: string, fallback: string): number {
  const value = env[key];
  const raw = value === undefined || value.trim() === "" ? fallback : value;
  const ms = parseDuration(raw);
  if (ms === null || ms <= 0) {
    throw new ConfigError(`${key} must be a positive duration like "15s" or "5m", got "${raw}"`);
  }
  return ms;
}

function stationElevationFromEnv(env: Env): number {
  const raw = env.STATION_ELEVATION;
  if (raw === undefined || raw.trim() === "") {
    throw new ConfigError("STATION_ELEVATION is required (meters above sea level)");
  }
  const elevation = Number(raw);
  if (!Number.isFinite(elevation) || elevation < 0) {
    throw new ConfigError(`STATION_ELEVATION must be a finite, non-negative number of meters, got "${raw}"`);
  }
  return elevation;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const observationIntervals = numberFromEnv(env, "OBSERVATION_VALIDITY_INTERVALS", 2);
  if (observationIntervals <= 0) {
    throw new ConfigError(`OBSERVATION_VALIDITY_INTERVALS must be positive, got ${observationIntervals}`);
  }

  return {
    port: portFromEnv(env, "PORT", 8080),
    udpPort: portFromEnv(env, "UDP_PORT", 50222),
    stationElevation: stationElevationFromEnv(env),
    validity: {
      rapidWindMs: durationFromEnv(env, "RAPID_WIND_VALIDITY", "15s"),
      observationIntervals,
      statusMs: durationFromEnv(env, "STATUS_VALIDITY", "5m"),
    },
  };
}
