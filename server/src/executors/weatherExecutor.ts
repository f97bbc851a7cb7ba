/**
 * Weather Executor - current conditions from wttr.in's JSON format
 */

import { z } from 'zod';
import { IToolExecutor, ExecutionResult, ToolContext, buildResult } from './interface';
import { GetWeatherParams, GetWeatherParamsType } from '../core/schemas';
import { fetchWithTimeout, FetchFn } from '../services/http';
import { logger, describeError } from '../services/logger';

// Only the fields we read; wttr.in returns strings for every number
const WttrPayload = z.object({
  current_condition: z
    .array(
      z.object({
        temp_C: z.string(),
        FeelsLikeC: z.string(),
        humidity: z.string(),
        windspeedKmph: z.string(),
        weatherDesc: z.array(z.object({ value: z.string() })).min(1),
      })
    )
    .min(1),
});

export interface WeatherReport {
  city: string;
  description: string;
  temperatureC: string;
  feelsLikeC: string;
  humidity: string;
  windKmph: string;
}

export function formatWeatherReport(report: WeatherReport): string {
  const city = report.city.charAt(0).toUpperCase() + report.city.slice(1);
  return (
    `${city}: ${report.description}, ${report.temperatureC}°C ` +
    `(feels like ${report.feelsLikeC}°C), humidity ${report.humidity}%, ` +
    `wind ${report.windKmph} km/h.`
  );
}

export interface WeatherExecutorOptions {
  baseUrl: string;
  defaultCity: string;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
}

export class WeatherExecutor implements IToolExecutor<GetWeatherParamsType> {
  readonly id = 'get_weather';
  readonly name = 'Weather';
  readonly category = 'information';
  readonly description = 'Get the current weather for a city';
  readonly schema = GetWeatherParams;

  constructor(private options: WeatherExecutorOptions) {}

  async execute(params: GetWeatherParamsType, context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const city = params.city ?? this.options.defaultCity;
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(city)}?format=j1`;

    try {
      const response = await fetchWithTimeout(
        url,
        { headers: { Accept: 'application/json' } },
        { timeoutMs: this.options.timeoutMs, fetchImpl: this.options.fetchImpl }
      );

      if (response.status !== 200) {
        logger.error(`Failed to get weather for ${city}`, { turnId: context.turnId, status: response.status });
        return buildResult(this.id, startedAt, `Could not retrieve weather for ${city}.`, {
          code: 'WEATHER_UNAVAILABLE',
        });
      }

      const payload = WttrPayload.parse(await response.json());
      const current = payload.current_condition[0];
      const message = formatWeatherReport({
        city,
        description: current.weatherDesc[0].value.trim(),
        temperatureC: current.temp_C,
        feelsLikeC: current.FeelsLikeC,
        humidity: current.humidity,
        windKmph: current.windspeedKmph,
      });

      logger.info(`Weather for ${city}: ${message}`, { turnId: context.turnId });
      return buildResult(this.id, startedAt, message);
    } catch (error) {
      logger.error(`Error retrieving weather for ${city}`, { turnId: context.turnId, error: describeError(error) });
      return buildResult(this.id, startedAt, `An error occurred while retrieving weather for ${city}.`, {
        code: 'WEATHER_ERROR',
      });
    }
  }
}
