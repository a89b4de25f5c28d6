import { AmbientConditions, WeatherState } from "../types.js";
import { clamp, round1 } from "../utils/numbers.js";
import { secondsToMs, timeFactor } from "./clock.js";
import { RandomSource, uniform } from "./random.js";

export const BASE_OUTDOOR_TEMP_C = 15.0;
export const DAILY_TEMP_SWING_C = 6.5;
const BASE_HUMIDITY_PCT = 60.0;
const WEATHER_VARIATION_C = 3;
const WEATHER_HOLD_SECONDS: [number, number] = [3600, 7200];

export function initialWeather(startMs: number, rng: RandomSource): WeatherState {
  return {
    variation: uniform(rng, -WEATHER_VARIATION_C, WEATHER_VARIATION_C),
    nextChangeAtMs: startMs + secondsToMs(uniform(rng, ...WEATHER_HOLD_SECONDS))
  };
}

/** Redraws the weather offset once its hold time has passed; otherwise returns `weather` untouched. */
export function refreshWeather(weather: WeatherState, nowMs: number, rng: RandomSource): WeatherState {
  if (!(nowMs > weather.nextChangeAtMs)) return weather;
  return {
    variation: uniform(rng, -WEATHER_VARIATION_C, WEATHER_VARIATION_C),
    nextChangeAtMs: nowMs + secondsToMs(uniform(rng, ...WEATHER_HOLD_SECONDS))
  };
}

/** Outdoor temperature without the weather offset, used by the mode controller. */
export function approximateAmbientTemperature(hourOfDay: number): number {
  return BASE_OUTDOOR_TEMP_C + DAILY_TEMP_SWING_C * timeFactor(hourOfDay);
}

export function computeAmbient(hourOfDay: number, weatherVariation: number, rng: RandomSource): AmbientConditions {
  const tf = timeFactor(hourOfDay);
  const temperature = approximateAmbientTemperature(hourOfDay) + weatherVariation;

  const humidityVariation = -10 * tf + 15 * Math.sin((2 * Math.PI * (hourOfDay - 3)) / 24);
  const humidity = clamp(BASE_HUMIDITY_PCT + humidityVariation + uniform(rng, -5, 5), 30, 90);

  return {
    ambientTemperature: round1(temperature),
    ambientHumidity: round1(humidity)
  };
}
