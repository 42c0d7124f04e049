import type { FetchWindow } from "../../packages/shared/src/pipeline-types.js";
import {
  parseArchivePayload,
  type ArchivePayload,
  type FetchOutcome
} from "../../pipeline/services/archive-client.js";
import { addCalendarDays, countCalendarDays } from "../../pipeline/utils/calendar.js";

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Raw archive JSON covering `[start, end]` with `hoursPerDay` hourly rows per
 * date. Temperature is the hour of day; the daily max is the day of month.
 */
export const buildRawArchiveJson = (
  start: string,
  end: string,
  hoursPerDay = 24
): Record<string, unknown> => {
  const dates: string[] = [];
  for (let offset = 0; offset < countCalendarDays(start, end); offset += 1) {
    dates.push(addCalendarDays(start, offset));
  }

  const hourlyTime: string[] = [];
  const temperature: number[] = [];
  const weatherCode: number[] = [];

  for (const date of dates) {
    for (let hour = 0; hour < hoursPerDay; hour += 1) {
      hourlyTime.push(`${date}T${pad(hour)}:00`);
      temperature.push(hour);
      weatherCode.push(3);
    }
  }

  return {
    latitude: 21.0,
    longitude: 105.8,
    hourly: {
      time: hourlyTime,
      temperature_2m: temperature,
      weather_code: weatherCode
    },
    daily: {
      time: dates,
      weather_code: dates.map(() => 61),
      temperature_2m_max: dates.map((date) => Number(date.slice(8, 10))),
      sunrise: dates.map((date) => `${date}T05:42`)
    }
  };
};

export const buildArchivePayload = (
  start: string,
  end: string,
  hoursPerDay = 24
): ArchivePayload => parseArchivePayload(buildRawArchiveJson(start, end, hoursPerDay));

export interface RecordedRequest {
  latitude: number;
  longitude: number;
  window: FetchWindow;
}

/**
 * In-process stand-in for the archive client. Each call takes the next
 * scripted outcome; once the script is exhausted every window succeeds with
 * `hoursPerDay` rows per day.
 */
export class FakeArchiveClient {
  readonly requests: RecordedRequest[] = [];

  private readonly script: FetchOutcome[];

  constructor(
    script: FetchOutcome[] = [],
    private readonly hoursPerDay = 2
  ) {
    this.script = [...script];
  }

  async fetchWindow(
    latitude: number,
    longitude: number,
    window: FetchWindow
  ): Promise<FetchOutcome> {
    this.requests.push({ latitude, longitude, window });

    const scripted = this.script.shift();
    if (scripted) {
      return scripted;
    }

    return {
      kind: "SUCCESS",
      payload: buildArchivePayload(window.start, window.end, this.hoursPerDay)
    };
  }
}

export const RATE_LIMITED: FetchOutcome = { kind: "RATE_LIMITED", status: 429 };

export const successFor = (start: string, end: string, hoursPerDay = 2): FetchOutcome => ({
  kind: "SUCCESS",
  payload: buildArchivePayload(start, end, hoursPerDay)
});
