import { z } from "zod";

/** Raw OpenWeather current-weather document. Opaque apart from the display fields. */
export type WeatherReading = Record<string, unknown>;

export interface ExtractedFields {
  temp: number;
  feelsLike: number;
  humidity: number;
  description: string;
}

export type ExtractResult =
  | { ok: true; fields: ExtractedFields }
  | { ok: false; reason: string };

const displaySchema = z.object({
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    humidity: z.number()
  }),
  weather: z.array(z.object({ description: z.string() })).min(1)
});

export function isWeatherReading(value: unknown): value is WeatherReading {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractDisplayFields(reading: WeatherReading): ExtractResult {
  const parsed = displaySchema.safeParse(reading);
  if (!parsed.success) {
    return {
      ok: false,
      reason: parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")
    };
  }

  const { main, weather } = parsed.data;
  return {
    ok: true,
    fields: {
      temp: main.temp,
      feelsLike: main.feels_like,
      humidity: main.humidity,
      description: weather[0].description
    }
  };
}

// Integral readings keep one decimal so 72 prints as 72.0.
function formatTemperature(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function formatDisplayLines(fields: ExtractedFields): string[] {
  return [
    `Temperature: ${formatTemperature(fields.temp)}°F`,
    `Feels like: ${formatTemperature(fields.feelsLike)}°F`,
    `Humidity: ${fields.humidity}%`,
    `Conditions: ${fields.description}`
  ];
}
