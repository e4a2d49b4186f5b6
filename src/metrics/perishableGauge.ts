import { Gauge } from "prom-client";
import { Perishable } from "../perishable.js";

export const STATION_PREFIX = "weather_station";

export function stationGauge<L extends string = string>(
  name: string,
  help: string,
  labelNames: readonly L[] = []
): Perishable<Gauge<L>> {
  return new Perishable(
    new Gauge<L>({
      name: `${STATION_PREFIX}_${name}`,
      help,
      labelNames,
      registers: [],
    })
  );
}

/** Sets a gauge and keeps it exported for `validForMs`; absent values leave it to expire */
export function exportValue(cell: Perishable<Gauge>, value: number | undefined, validForMs: number): void {
  if (value === undefined) return;
  cell.freshen(validForMs).set(value);
}
