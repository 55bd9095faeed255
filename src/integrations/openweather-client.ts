import { isWeatherReading, type WeatherReading } from "../weather/reading.js";

type FetchLike = (input: URL | string, init?: RequestInit) => Promise<Response>;

export class OpenWeatherClient {
  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string,
    private readonly fetcher: FetchLike = fetch
  ) {}

  async current(city: string): Promise<WeatherReading> {
    const url = new URL(`${this.baseUrl.replace(/\/+$/, "")}/weather`);
    url.searchParams.set("q", city);
    url.searchParams.set("appid", this.apiKey);
    url.searchParams.set("units", "imperial");

    const response = await this.fetcher(url);
    if (!response.ok) {
      throw new Error(`OpenWeather request failed (${response.status})`);
    }

    const data: unknown = await response.json();
    if (!isWeatherReading(data)) {
      throw new Error("OpenWeather response was not a JSON object");
    }

    return data;
  }
}
