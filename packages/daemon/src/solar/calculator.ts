import type { SolarEventKind } from "@sundial/shared";

const DEG = Math.PI / 180;
const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;

/**
 * Approximate sunrise/sunset from a single-cosine declination model.
 * Error is on the order of minutes; this is not an ephemeris.
 *
 * `utcOffsetMinutes` pins the timezone used for the calendar day and solar
 * noon. When omitted, the host's offset for the given date applies.
 */
export class SolarTimeCalculator {
  constructor(
    readonly latitude: number,
    readonly longitude: number,
    readonly utcOffsetMinutes?: number,
  ) {}

  sunrise(date: Date, offsetMinutes = 0): Date | null {
    return this.compute("sunrise", date, offsetMinutes);
  }

  sunset(date: Date, offsetMinutes = 0): Date | null {
    return this.compute("sunset", date, offsetMinutes);
  }

  event(kind: SolarEventKind, date: Date, offsetMinutes = 0): Date | null {
    return this.compute(kind, date, offsetMinutes);
  }

  private compute(kind: SolarEventKind, date: Date, offsetMinutes: number): Date | null {
    const day = this.localDay(date);

    const declination = -23.45 * Math.cos((Math.PI * (day.dayOfYear + 10)) / 182.5);
    const cosHourAngle = -Math.tan(this.latitude * DEG) * Math.tan(declination * DEG);
    // Polar day or night: the sun never crosses the horizon
    if (cosHourAngle < -1 || cosHourAngle > 1) return null;

    const hourAngle = Math.acos(cosHourAngle) / DEG;
    const solarNoon = 12 - this.longitude / 15 + day.utcOffsetMinutes / 60;
    const hours = kind === "sunrise" ? solarNoon - hourAngle / 15 : solarNoon + hourAngle / 15;

    // epsilon keeps 5.999999… hours from truncating a whole minute early
    const minutes = Math.floor(hours * 60 + 1e-9) + Math.trunc(offsetMinutes);
    return new Date(day.midnight + minutes * MINUTE_MS);
  }

  private localDay(date: Date): { midnight: number; dayOfYear: number; utcOffsetMinutes: number } {
    if (this.utcOffsetMinutes !== undefined) {
      const shifted = new Date(date.getTime() + this.utcOffsetMinutes * MINUTE_MS);
      const y = shifted.getUTCFullYear();
      const m = shifted.getUTCMonth();
      const d = shifted.getUTCDate();
      return {
        midnight: Date.UTC(y, m, d) - this.utcOffsetMinutes * MINUTE_MS,
        dayOfYear: dayOfYear(y, m, d),
        utcOffsetMinutes: this.utcOffsetMinutes,
      };
    }

    const y = date.getFullYear();
    const m = date.getMonth();
    const d = date.getDate();
    const midnight = new Date(y, m, d);
    return {
      midnight: midnight.getTime(),
      dayOfYear: dayOfYear(y, m, d),
      utcOffsetMinutes: -midnight.getTimezoneOffset(),
    };
  }
}

function dayOfYear(year: number, month: number, day: number): number {
  return Math.round((Date.UTC(year, month, day) - Date.UTC(year, 0, 0)) / DAY_MS);
}
