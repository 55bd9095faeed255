import type { AppConfig } from "../config/env.js";
import { OpenWeatherClient } from "../integrations/openweather-client.js";
import { archiveObjectKey, formatArchiveTimestamp } from "../lib/archive-timestamp.js";
import { errorMessage, logger, type Logger } from "../lib/logger.js";
import { S3BucketStore } from "../storage/s3-bucket-store.js";
import type { WeatherReading } from "../weather/reading.js";

export interface BucketStoreLike {
  readonly bucket: string;
  exists(): Promise<boolean>;
  resolveRegion(): Promise<string>;
  create(region: string): Promise<void>;
  putJson(key: string, document: unknown): Promise<void>;
}

export interface WeatherClientLike {
  current(city: string): Promise<WeatherReading>;
}

export interface ArchiverDeps {
  store?: BucketStoreLike;
  weather?: WeatherClientLike;
  log?: Logger;
  now?: () => Date;
}

export class WeatherArchiver {
  private readonly store: BucketStoreLike;
  private readonly weather: WeatherClientLike;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(config: AppConfig, deps: ArchiverDeps = {}) {
    this.store = deps.store ?? new S3BucketStore(config.bucketName);
    this.weather = deps.weather ?? new OpenWeatherClient(config.apiKey, config.weatherBaseUrl);
    this.log = deps.log ?? logger;
    this.now = deps.now ?? (() => new Date());
  }

  async ensureBucketExists(): Promise<void> {
    const bucket = this.store.bucket;

    let exists: boolean;
    try {
      exists = await this.store.exists();
    } catch (error) {
      this.log.error("Error accessing bucket", { bucket, error: errorMessage(error) });
      return;
    }

    if (exists) {
      this.log.info("Bucket exists", { bucket });
      return;
    }

    this.log.info("Bucket does not exist, creating it", { bucket });
    try {
      const region = await this.store.resolveRegion();
      await this.store.create(region);
      this.log.info("Bucket created", { bucket, region });
    } catch (error) {
      this.log.error("Error creating bucket", { bucket, error: errorMessage(error) });
    }
  }

  async fetchWeather(city: string): Promise<WeatherReading | null> {
    try {
      return await this.weather.current(city);
    } catch (error) {
      this.log.error("Error fetching weather data", { city, error: errorMessage(error) });
      return null;
    }
  }

  async saveToS3(reading: WeatherReading | null, city: string): Promise<boolean> {
    if (!reading || Object.keys(reading).length === 0) {
      this.log.warn("No weather data to save", { city });
      return false;
    }

    const timestamp = formatArchiveTimestamp(this.now());
    const key = archiveObjectKey(city, timestamp);

    try {
      reading.timestamp = timestamp;
      await this.store.putJson(key, reading);
      this.log.info("Weather data saved", { city, bucket: this.store.bucket, key });
      return true;
    } catch (error) {
      this.log.error("Error saving weather data", { city, key, error: errorMessage(error) });
      return false;
    }
  }
}
