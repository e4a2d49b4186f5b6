import { Counter, Registry, type Gauge } from "prom-client";
import type { ValidityConfig } from "../config.js";
import type { DeviceStatus, HubStatus, Observation, RapidWind, StationMessage } from "../decoder.js";
import type { Perishable } from "../perishable.js";
import { apparentTemperature, barometricPressure, dewPoint, wetBulbTemperature } from "../physics.js";
import { exportValue, stationGauge } from "./perishableGauge.js";
import { WindMetrics } from "./windMetrics.js";

const snakeCase = (key: string) => key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);

export interface EncodedMetrics {
  contentType: string;
  body: string;
}

/**
 * Prometheus view of the station. Every station gauge sits in a Perishable
 * cell; a scrape only includes cells that were freshened recently enough.
 */
export class Exporter {
  private readonly messagesReceived = new Counter<"type">({
    name: "weather_exporter_messages_received_total",
    help: "API messages received",
    labelNames: ["type"],
    registers: [],
  });

  private readonly instantWind = new WindMetrics("instant_wind", "Instantaneous wind");

  private readonly observation = {
    timestamp: stationGauge("observation_timestamp_unix_sec", "Current observation Unix timestamp (s)"),
    windLull: new WindMetrics("observation_wind_lull", "Wind lull"),
    windAvg: new WindMetrics("observation_wind_avg", "Wind average"),
    windGust: new WindMetrics("observation_wind_gust", "Wind gust"),
    stationPressure: stationGauge("observation_station_pressure_hpa", "Current station pressure (hPa)"),
    barometricPressure: stationGauge(
      "observation_barometric_pressure_hpa",
      "Current barometric pressure, mean sea level (hPa)"
    ),
    temperature: stationGauge("observation_temperature_deg_c", "Current temperature (°C)"),
    relativeHumidity: stationGauge("observation_relative_humidity_pct", "Current relative humidity (%)"),
    dewPoint: stationGauge("observation_dew_point_deg_c", "Current dew point (°C)"),
    wetBulbTemperature: stationGauge("observation_wet_bulb_temperature_deg_c", "Current wet bulb temperature (°C)"),
    apparentTemperature: stationGauge("observation_apparent_temperature_deg_c", "Current apparent temperature (°C)"),
    illuminance: stationGauge("observation_illuminance_lux", "Current illuminance (lux)"),
    ultravioletIndex: stationGauge("observation_uv_index", "Current UV index"),
    irradiance: stationGauge("observation_irradiance_w_per_m2", "Current solar irradiance (W·m^-2)"),
    rainLastMinute: stationGauge("observation_rain_previous_minute_mm", "Rain over the previous minute (mm)"),
    lightningDistance: stationGauge("observation_lightning_average_distance_km", "Average lightning strike distance (km)"),
    lightningCount: stationGauge("observation_lightning_strike_count", "Lightning strikes in the report interval"),
    batteryVolts: stationGauge("observation_battery_volts", "Station battery voltage (V)"),
  };

  private readonly device = {
    uptime: stationGauge("device_uptime_sec", "Station uptime (s)"),
    voltage: stationGauge("device_voltage_volts", "Station voltage (V)"),
    rssi: stationGauge("device_rssi_dbm", "Station signal strength (dBm)"),
    hubRssi: stationGauge("device_hub_rssi_dbm", "Hub signal strength as seen by the station (dBm)"),
    sensorStatus: stationGauge<string>("device_sensor_status", "Sensor status flags (1 = set)", ["flag"]),
  };

  private readonly hub = {
    uptime: stationGauge("hub_uptime_sec", "Hub uptime (s)"),
    rssi: stationGauge("hub_rssi_dbm", "Hub signal strength (dBm)"),
    resetFlags: stationGauge<string>("hub_reset_flags", "Causes of the hub's last reset (1 = set)", ["flag"]),
  };

  constructor(
    private readonly stationElevation: number,
    private readonly validity: ValidityConfig
  ) {}

  handleReport(msg: StationMessage): void {
    this.messagesReceived.inc({ type: msg.type });

    switch (msg.type) {
      case "rapid_wind":
        this.exportRapidWind(msg);
        break;
      case "observation":
        this.exportObservation(msg);
        break;
      case "device_status":
        this.exportDeviceStatus(msg);
        break;
      case "hub_status":
        this.exportHubStatus(msg);
        break;
      case "precip_event":
      case "strike_event":
        break;
      default: {
        const unknown: never = msg;
        throw new Error(`Unhandled message ${JSON.stringify(unknown)}`);
      }
    }
  }

  async encode(): Promise<EncodedMetrics> {
    const registry = new Registry();
    registry.registerMetric(this.messagesReceived);
    for (const gauge of this.freshGauges()) {
      registry.registerMetric(gauge);
    }
    return { contentType: registry.contentType, body: await registry.metrics() };
  }

  private freshGauges(): Gauge[] {
    const cells: Perishable<Gauge>[] = [
      ...this.instantWind.cells(),
      this.observation.timestamp,
      ...this.observation.windLull.cells(),
      ...this.observation.windAvg.cells(),
      ...this.observation.windGust.cells(),
      this.observation.stationPressure,
      this.observation.barometricPressure,
      this.observation.temperature,
      this.observation.relativeHumidity,
      this.observation.dewPoint,
      this.observation.wetBulbTemperature,
      this.observation.apparentTemperature,
      this.observation.illuminance,
      this.observation.ultravioletIndex,
      this.observation.irradiance,
      this.observation.rainLastMinute,
      this.observation.lightningDistance,
      this.observation.lightningCount,
      this.observation.batteryVolts,
      ...Object.values(this.device),
      ...Object.values(this.hub),
    ];
    return cells.flatMap((cell) => cell.map((gauge) => [gauge]) ?? []);
  }

  private exportRapidWind(msg: RapidWind): void {
    this.instantWind.export(msg.wind, this.validity.rapidWindMs);
  }

  private exportObservation(obs: Observation): void {
    const validFor = obs.reportIntervalMs * this.validity.observationIntervals;
    const m = this.observation;

    exportValue(m.timestamp, Math.floor(obs.timestamp.getTime() / 1000), validFor);
    if (obs.wind) {
      m.windLull.export(obs.wind.lull, validFor);
      m.windAvg.export(obs.wind.avg, validFor);
      m.windGust.export(obs.wind.gust, validFor);
    }
    exportValue(m.stationPressure, obs.stationPressure, validFor);
    exportValue(m.barometricPressure, barometricPressure(obs, this.stationElevation), validFor);
    exportValue(m.temperature, obs.airTemperature, validFor);
    exportValue(m.relativeHumidity, obs.relativeHumidity, validFor);
    exportValue(m.dewPoint, dewPoint(obs), validFor);
    exportValue(m.wetBulbTemperature, wetBulbTemperature(obs), validFor);
    exportValue(m.apparentTemperature, apparentTemperature(obs), validFor);
    exportValue(m.illuminance, obs.solar?.illuminance, validFor);
    exportValue(m.ultravioletIndex, obs.solar?.ultravioletIndex, validFor);
    exportValue(m.irradiance, obs.solar?.irradiance, validFor);
    exportValue(m.rainLastMinute, obs.precip?.quantityLastMinute, validFor);
    exportValue(m.lightningDistance, obs.lightning?.averageDistance, validFor);
    exportValue(m.lightningCount, obs.lightning?.count, validFor);
    exportValue(m.batteryVolts, obs.batteryVolts, validFor);
  }

  private exportDeviceStatus(status: DeviceStatus): void {
    const validFor = this.validity.statusMs;
    exportValue(this.device.uptime, status.uptimeMs / 1000, validFor);
    exportValue(this.device.voltage, status.voltage, validFor);
    exportValue(this.device.rssi, status.rssi, validFor);
    exportValue(this.device.hubRssi, status.hubRssi, validFor);
    const sensorStatus = this.device.sensorStatus.freshen(validFor);
    for (const [flag, set] of Object.entries(status.sensorStatus)) {
      sensorStatus.set({ flag: snakeCase(flag) }, set ? 1 : 0);
    }
  }

  private exportHubStatus(status: HubStatus): void {
    const validFor = this.validity.statusMs;
    exportValue(this.hub.uptime, status.uptimeMs / 1000, validFor);
    exportValue(this.hub.rssi, status.rssi, validFor);
    const resetFlags = this.hub.resetFlags.freshen(validFor);
    for (const [flag, set] of Object.entries(status.resetFlags)) {
      resetFlags.set({ flag: snakeCase(flag) }, set ? 1 : 0);
    }
  }
}
