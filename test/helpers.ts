import type { LogContext, LogLevel, Logger } from "../src/lib/logger.js";
import type { BucketStoreLike } from "../src/services/weather-archiver.js";

export interface LogEvent {
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export function recordingLogger(): { log: Logger; events: LogEvent[] } {
  const events: LogEvent[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      events.push({ level, message, context });
    };

  return {
    log: {
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error")
    },
    events
  };
}

export class FakeBucketStore implements BucketStoreLike {
  readonly bucket = "test-bucket";
  readonly created: string[] = [];
  readonly puts: Array<{ key: string; body: string }> = [];
  probe: () => Promise<boolean> = async () => true;
  region = "us-west-2";
  createError: Error | null = null;
  putError: Error | null = null;

  async exists(): Promise<boolean> {
    return this.probe();
  }

  async resolveRegion(): Promise<string> {
    return this.region;
  }

  async create(region: string): Promise<void> {
    if (this.createError) {
      throw this.createError;
    }
    this.created.push(region);
  }

  async putJson(key: string, document: unknown): Promise<void> {
    if (this.putError) {
      throw this.putError;
    }
    this.puts.push({ key, body: JSON.stringify(document) });
  }
}

export const testConfig = {
  apiKey: "test-key",
  bucketName: "test-bucket",
  weatherBaseUrl: "https://weather.example.test/data/2.5",
  logLevel: "info"
} as const;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}
