import type { ValidityConfig } from "./config.js";
import type { Observation, RapidWind, StationMessage } from "./decoder.js";
import { Perishable } from "./perishable.js";
import { deriveQuantities, type DerivedQuantities } from "./physics.js";

interface LatestObservation {
  observation?: Observation;
}

interface LatestWind {
  rapidWind?: RapidWind;
}

export interface ObservationSnapshot {
  observation: Observation;
  derived: DerivedQuantities;
  windComponents?: { north: number; east: number };
  instantWind?: { speed: number; direction: number; at: string };
}

/**
 * The most recent observation and rapid wind, each readable only while it
 * is fresh. Derived quantities are computed when a snapshot is asked for.
 */
export class LatestReadings {
  private readonly latestObservation: Perishable<LatestObservation>;
  private readonly latestWind: Perishable<LatestWind>;

  constructor(
    private readonly stationElevation: number,
    private readonly validity: ValidityConfig,
    clock?: () => number
  ) {
    this.latestObservation = new Perishable<LatestObservation>({}, clock);
    this.latestWind = new Perishable<LatestWind>({}, clock);
  }

  handleReport(msg: StationMessage): void {
    if (msg.type === "observation") {
      this.latestObservation.freshen(msg.reportIntervalMs * this.validity.observationIntervals).observation = msg;
    } else if (msg.type === "rapid_wind") {
      this.latestWind.freshen(this.validity.rapidWindMs).rapidWind = msg;
    }
  }

  snapshot(): ObservationSnapshot | null {
    const observation = this.latestObservation.map((latest) => latest.observation);
    if (!observation) return null;

    const snapshot: ObservationSnapshot = {
      observation,
      derived: deriveQuantities(observation, this.stationElevation),
    };
    if (observation.wind) {
      const [north, east] = observation.wind.avg.componentVelocity();
      snapshot.windComponents = { north, east };
    }
    const rapidWind = this.latestWind.map((latest) => latest.rapidWind);
    if (rapidWind) {
      snapshot.instantWind = {
        speed: rapidWind.wind.speedMagnitude,
        direction: rapidWind.wind.sourceDirection,
        at: rapidWind.timestamp.toISOString(),
      };
    }
    return snapshot;
  }
}
