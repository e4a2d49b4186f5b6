import type { Observation, RapidWind, StationMessage } from "./decoder.js";
import { apparentTemperature, barometricPressure, dewPoint, wetBulbTemperature } from "./physics.js";
import { broadcastReading } from "./web/websocketServer.js";
import type { Wind } from "./wind.js";

export type PublishFn = (topic: string, payload: string, retain: boolean) => void;

const TOPIC_ROOT = "station";

/**
 * Turns decoded messages into retained topic/value readings. Values the
 * station did not report are not published, so subscribers keep the last
 * real reading rather than a placeholder.
 */
export class Publisher {
  constructor(
    private readonly stationElevation: number,
    private readonly publish: PublishFn = broadcastReading
  ) {}

  handleReport(msg: StationMessage): void {
    switch (msg.type) {
      case "rapid_wind":
        this.publishRapidWind(msg);
        break;
      case "observation":
        this.publishObservation(msg);
        break;
      default:
        break;
    }
  }

  private send(topic: string, value: number | string | undefined): void {
    if (value === undefined) return;
    this.publish(`${TOPIC_ROOT}/${topic}`, String(value), true);
  }

  private publishWind(prefix: string, wind: Wind): void {
    this.send(`${prefix}/speed_magnitude_m_per_s`, wind.speedMagnitude);
    this.send(`${prefix}/source_direction_deg`, wind.sourceDirection);
    const [north, east] = wind.componentVelocity();
    this.send(`${prefix}/component_velocity_m_per_s`, `${north} ${east}`);
  }

  private publishRapidWind(msg: RapidWind): void {
    this.publishWind("instant_wind", msg.wind);
  }

  private publishObservation(obs: Observation): void {
    this.send("observation/timestamp", obs.timestamp.toISOString());
    if (obs.wind) {
      this.publishWind("observation/wind/lull", obs.wind.lull);
      this.publishWind("observation/wind/avg", obs.wind.avg);
      this.publishWind("observation/wind/gust", obs.wind.gust);
    }
    this.send("observation/pressure/station_hpa", obs.stationPressure);
    this.send("observation/pressure/barometric_hpa", barometricPressure(obs, this.stationElevation));
    this.send("observation/thermal/temperature_deg_c", obs.airTemperature);
    this.send("observation/thermal/relative_humidity_pct", obs.relativeHumidity);
    this.send("observation/thermal/dew_point_deg_c", dewPoint(obs));
    this.send("observation/thermal/wet_bulb_temperature_deg_c", wetBulbTemperature(obs));
    this.send("observation/thermal/apparent_temperature_deg_c", apparentTemperature(obs));
    this.send("observation/solar/illuminance_lux", obs.solar?.illuminance);
    this.send("observation/solar/irradiance_w_per_m2", obs.solar?.irradiance);
    this.send("observation/solar/uv_index", obs.solar?.ultravioletIndex);
    this.send("observation/precip/previous_minute_rain_mm", obs.precip?.quantityLastMinute);
    this.send("observation/precip/kind", obs.precip?.kind);
    this.send("observation/lightning/average_distance_km", obs.lightning?.averageDistance);
    this.send("observation/lightning/strike_count", obs.lightning?.count);
    this.send("observation/battery_volts", obs.batteryVolts);
  }
}
