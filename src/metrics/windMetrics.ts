import type { Gauge } from "prom-client";
import type { Perishable } from "../perishable.js";
import type { Wind } from "../wind.js";
import { stationGauge } from "./perishableGauge.js";

export class WindMetrics {
  private readonly speedMagnitude: Perishable<Gauge>;
  private readonly sourceDirection: Perishable<Gauge>;
  private readonly componentVelocityNorth: Perishable<Gauge>;
  private readonly componentVelocityEast: Perishable<Gauge>;

  constructor(name: string, description: string) {
    this.speedMagnitude = stationGauge(`${name}_speed_magnitude_m_per_s`, `${description} speed magnitude (m·s^-1)`);
    this.sourceDirection = stationGauge(`${name}_source_direction_deg`, `${description} source direction (deg)`);
    this.componentVelocityNorth = stationGauge(
      `${name}_component_velocity_north_m_per_s`,
      `${description} component velocity North (m·s^-1)`
    );
    this.componentVelocityEast = stationGauge(
      `${name}_component_velocity_east_m_per_s`,
      `${description} component velocity East (m·s^-1)`
    );
  }

  cells(): Perishable<Gauge>[] {
    return [this.speedMagnitude, this.sourceDirection, this.componentVelocityNorth, this.componentVelocityEast];
  }

  export(wind: Wind, validForMs: number): void {
    this.speedMagnitude.freshen(validForMs).set(wind.speedMagnitude);
    this.sourceDirection.freshen(validForMs).set(wind.sourceDirection);
    const [north, east] = wind.componentVelocity();
    this.componentVelocityNorth.freshen(validForMs).set(north);
    this.componentVelocityEast.freshen(validForMs).set(east);
  }
}
