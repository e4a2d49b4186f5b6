/** North and east components, in that order */
export type Components = [north: number, east: number];

/**
 * Wind as reported by the station: a speed and the direction the wind blows
 * *from*, in degrees (meteorological convention).
 */
export class Wind {
  constructor(
    readonly speedMagnitude: number,
    readonly sourceDirection: number
  ) {}

  /** Unit vector of the source direction as (north, east) components */
  componentDirection(): Components {
    const radians = (this.sourceDirection * Math.PI) / 180;
    return [Math.cos(radians), Math.sin(radians)];
  }

  componentVelocity(): Components {
    const [north, east] = this.componentDirection();
    return [this.speedMagnitude * north, this.speedMagnitude * east];
  }
}
