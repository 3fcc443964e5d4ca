export class Angle {
  readonly radians: number

  private constructor(radians: number) {
    this.radians = radians
  }

  static fromRadians(radians: number): Angle {
    return new Angle(radians)
  }

  static fromDegrees(degrees: number): Angle {
    return new Angle(degrees * Math.PI / 180)
  }

  get degrees(): number {
    return this.radians * 180 / Math.PI
  }

  equals(other: Angle, tolerance: number = 0): boolean {
    return Math.abs(this.radians - other.radians) <= tolerance
  }

  toString(): string {
    return `${this.degrees}°`
  }
}
