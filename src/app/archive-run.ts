import { logger, type Logger } from "../lib/logger.js";
import { extractDisplayFields, formatDisplayLines, type WeatherReading } from "../weather/reading.js";

export const CITIES: readonly string[] = ["Atlanta", "San Diego", "Bahia"];

interface ArchiverLike {
  fetchWeather(city: string): Promise<WeatherReading | null>;
  saveToS3(reading: WeatherReading | null, city: string): Promise<boolean>;
}

export interface ArchiveRunOptions {
  log?: Logger;
  print?: (line: string) => void;
}

export interface ArchiveRunSummary {
  archived: number;
  fetchFailed: number;
  shapeMismatch: number;
  saveFailed: number;
}

export async function runArchive(
  archiver: ArchiverLike,
  cities: readonly string[] = CITIES,
  options: ArchiveRunOptions = {}
): Promise<ArchiveRunSummary> {
  const log = options.log ?? logger;
  const print = options.print ?? ((line: string) => console.log(line));
  const summary: ArchiveRunSummary = { archived: 0, fetchFailed: 0, shapeMismatch: 0, saveFailed: 0 };

  for (const city of cities) {
    log.info("Fetching weather data", { city });
    const reading = await archiver.fetchWeather(city);
    if (!reading) {
      summary.fetchFailed += 1;
      log.warn("Failed to fetch weather data", { city });
      continue;
    }

    const extracted = extractDisplayFields(reading);
    if (!extracted.ok) {
      summary.shapeMismatch += 1;
      log.warn("Unexpected response structure", { city, reason: extracted.reason, response: reading });
      continue;
    }

    for (const line of formatDisplayLines(extracted.fields)) {
      print(line);
    }

    if (await archiver.saveToS3(reading, city)) {
      summary.archived += 1;
    } else {
      summary.saveFailed += 1;
    }
  }

  log.info("Weather archive run completed", { cities: cities.length, ...summary });
  return summary;
}
