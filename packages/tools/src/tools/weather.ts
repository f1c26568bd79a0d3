import { z } from "zod";
import { defineTool } from "../tool.js";
import { roundTo, seededRandom } from "../seeded-random.js";

export const WeatherArgsSchema = z.object({
  city: z.string().trim().min(1).describe("The city name, e.g. 'Seattle'"),
});

export const WEATHER_CONDITIONS = ["Sunny", "Cloudy", "Rainy", "Partly Cloudy", "Snowy"] as const;

export type WeatherReading = {
  readonly City: string;
  readonly TemperatureCelsius: number;
  readonly Condition: (typeof WEATHER_CONDITIONS)[number];
  readonly Humidity: number;
  readonly WindSpeedKmh: number;
};

/** Simulated reading, stable per city name. */
export function readWeather(city: string): WeatherReading {
  const next = seededRandom(city.toLowerCase());
  return {
    City: city,
    TemperatureCelsius: roundTo(next() * 35 + 5, 1),
    Condition: WEATHER_CONDITIONS[Math.floor(next() * WEATHER_CONDITIONS.length)] ?? "Cloudy",
    Humidity: 30 + Math.floor(next() * 60),
    WindSpeedKmh: roundTo(next() * 30, 1),
  };
}

export function formatWeather(reading: WeatherReading): string {
  return `${reading.City}: ${reading.TemperatureCelsius}°C, ${reading.Condition}, humidity ${reading.Humidity}%, wind ${reading.WindSpeedKmh} km/h`;
}

export const weatherTool = defineTool({
  name: "get_weather",
  description: "Get the current weather for a given city.",
  parameters: {
    type: "object",
    properties: {
      city: { type: "string", description: "The city name, e.g. 'Seattle'" },
    },
    required: ["city"],
  },
  schema: WeatherArgsSchema,
  execute: ({ city }) => readWeather(city),
});
