import { z } from 'zod';

import { describeError } from '../logger';
import type { ToolExecutor } from './toolExecutor';
import type { ToolContext, ToolHandler, ToolParameterSchema } from './types';

export interface StandardToolsOptions {
  /**
   * Names of tools to register. Defaults to every standard tool.
   */
  allowlist?: readonly string[];
  fetchFn?: typeof fetch;
  now?: () => Date;
  /**
   * Per-request timeout for the weather APIs.
   */
  requestTimeoutMs?: number;
}

interface StandardTool {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
  createHandler: (deps: ToolDeps) => ToolHandler;
}

interface ToolDeps {
  fetchFn: typeof fetch;
  now: () => Date;
  requestTimeoutMs: number;
}

const GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

export const COMMON_TIMEZONES = [
  'UTC',
  'America/New_York',
  'America/Los_Angeles',
  'Europe/London',
  'Europe/Paris',
  'Asia/Tokyo',
  'Asia/Shanghai',
  'Australia/Sydney',
];

// WMO weather interpretation codes
const WEATHER_CODES: Record<number, string> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Foggy',
  48: 'Depositing rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  61: 'Slight rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  71: 'Slight snow',
  73: 'Moderate snow',
  75: 'Heavy snow',
  77: 'Snow grains',
  80: 'Slight rain showers',
  81: 'Moderate rain showers',
  82: 'Violent rain showers',
  85: 'Slight snow showers',
  86: 'Heavy snow showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm with slight hail',
  99: 'Thunderstorm with heavy hail',
};

export function describeWeatherCode(code: number): string {
  return WEATHER_CODES[code] ?? 'Unknown';
}

class UnknownTimezoneError extends Error {
  constructor(readonly timezone: string) {
    super(`Unknown timezone: ${timezone}`);
    this.name = 'UnknownTimezoneError';
  }
}

class RequestTimeoutError extends Error {
  constructor() {
    super('Request timed out');
    this.name = 'RequestTimeoutError';
  }
}

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  zoneName: string;
}

function zonedParts(date: Date, timeZone: string): ZonedParts {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
      timeZoneName: 'short',
    });
  } catch (err) {
    if (err instanceof RangeError) {
      throw new UnknownTimezoneError(timeZone);
    }
    throw err;
  }

  const values = new Map<string, string>();
  for (const part of formatter.formatToParts(date)) {
    values.set(part.type, part.value);
  }
  const numeric = (type: string): number => Number(values.get(type) ?? '0');
  return {
    year: numeric('year'),
    month: numeric('month'),
    day: numeric('day'),
    hour: numeric('hour'),
    minute: numeric('minute'),
    second: numeric('second'),
    zoneName: values.get('timeZoneName') ?? timeZone,
  };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

export function formatZonedTime(date: Date, timeZone: string): string {
  const parts = zonedParts(date, timeZone);
  return (
    `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)} ` +
    `${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)} ${parts.zoneName}`
  );
}

/**
 * UTC offset of `timeZone` at `date`, in hours.
 */
export function utcOffsetHours(date: Date, timeZone: string): number {
  const parts = zonedParts(date, timeZone);
  const asUtc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
  );
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return Math.round((asUtc - wholeSeconds) / 60_000) / 60;
}

const CurrentTimeArgsSchema = z.object({
  timezone: z.string().trim().min(1).default('UTC'),
});

const TimeDifferenceArgsSchema = z.object({
  timezone1: z.string().trim().min(1),
  timezone2: z.string().trim().min(1),
});

const CityArgsSchema = z.object({
  city: z.string().trim().min(1),
});

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.infer<S> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid arguments: ${detail}`);
  }
  return result.data;
}

const GeocodingResponseSchema = z.object({
  results: z
    .array(
      z.object({
        latitude: z.number(),
        longitude: z.number(),
        name: z.string(),
        country: z.string().optional(),
      }),
    )
    .optional(),
});

const CurrentWeatherResponseSchema = z.object({
  current: z
    .object({
      temperature_2m: z.number(),
      relative_humidity_2m: z.number().optional(),
      weather_code: z.number().optional(),
      wind_speed_10m: z.number().optional(),
    })
    .optional(),
  current_units: z.object({ temperature_2m: z.string() }).partial().optional(),
});

const DailyForecastResponseSchema = z.object({
  daily: z
    .object({
      time: z.array(z.string()),
      temperature_2m_max: z.array(z.number()),
      temperature_2m_min: z.array(z.number()),
      weather_code: z.array(z.number()),
    })
    .optional(),
});

async function fetchJson(url: URL, deps: ToolDeps, signal: AbortSignal): Promise<unknown> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(signal.reason);
  if (signal.aborted) {
    onAbort();
  } else {
    signal.addEventListener('abort', onAbort, { once: true });
  }
  const timer = setTimeout(() => controller.abort(new RequestTimeoutError()), deps.requestTimeoutMs);

  try {
    const response = await deps.fetchFn(url, { signal: controller.signal });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    return await response.json();
  } catch (err) {
    if (controller.signal.reason instanceof RequestTimeoutError) {
      throw controller.signal.reason;
    }
    throw err;
  } finally {
    clearTimeout(timer);
    signal.removeEventListener('abort', onAbort);
  }
}

interface Location {
  latitude: number;
  longitude: number;
  name: string;
  country: string;
}

async function geocode(
  city: string,
  deps: ToolDeps,
  signal: AbortSignal,
): Promise<Location | null> {
  const url = new URL(GEOCODING_URL);
  url.searchParams.set('name', city);
  url.searchParams.set('count', '1');
  url.searchParams.set('language', 'en');
  url.searchParams.set('format', 'json');

  const parsed = GeocodingResponseSchema.parse(await fetchJson(url, deps, signal));
  const first = parsed.results?.[0];
  if (!first) {
    return null;
  }
  return {
    latitude: first.latitude,
    longitude: first.longitude,
    name: first.name,
    country: first.country ?? '',
  };
}

async function getWeather(city: string, deps: ToolDeps, ctx: ToolContext): Promise<string> {
  try {
    const location = await geocode(city, deps, ctx.signal);
    if (!location) {
      return `Could not find coordinates for city: ${city}`;
    }

    const url = new URL(FORECAST_URL);
    url.searchParams.set('latitude', String(location.latitude));
    url.searchParams.set('longitude', String(location.longitude));
    url.searchParams.set(
      'current',
      'temperature_2m,relative_humidity_2m,weather_code,wind_speed_10m',
    );
    const weather = CurrentWeatherResponseSchema.parse(await fetchJson(url, deps, ctx.signal));
    const current = weather.current;
    if (!current) {
      return `Could not fetch weather data for ${location.name}.`;
    }

    const unit = weather.current_units?.temperature_2m ?? '°C';
    const humidity = current.relative_humidity_2m ?? 'N/A';
    const wind = current.wind_speed_10m ?? 'N/A';
    const conditions = describeWeatherCode(current.weather_code ?? 0);
    return (
      `Weather in ${location.name}, ${location.country}: ${current.temperature_2m}${unit}, ` +
      `${conditions}. Humidity: ${humidity}%, Wind: ${wind} km/h`
    );
  } catch (err) {
    if (err instanceof RequestTimeoutError) {
      return `Weather API timeout for ${city}`;
    }
    return `Error fetching weather: ${describeError(err)}`;
  }
}

async function getForecast(city: string, deps: ToolDeps, ctx: ToolContext): Promise<string> {
  try {
    const location = await geocode(city, deps, ctx.signal);
    if (!location) {
      return `Could not find coordinates for city: ${city}`;
    }

    const url = new URL(FORECAST_URL);
    url.searchParams.set('latitude', String(location.latitude));
    url.searchParams.set('longitude', String(location.longitude));
    url.searchParams.set('daily', 'temperature_2m_max,temperature_2m_min,weather_code');
    url.searchParams.set('timezone', 'auto');
    const forecast = DailyForecastResponseSchema.parse(await fetchJson(url, deps, ctx.signal));
    const daily = forecast.daily;
    if (!daily) {
      return `Could not fetch forecast data for ${location.name}.`;
    }

    const lines = [`7-day forecast for ${location.name}, ${location.country}:`];
    daily.time.slice(0, 7).forEach((date, index) => {
      const min = daily.temperature_2m_min[index];
      const max = daily.temperature_2m_max[index];
      const conditions = describeWeatherCode(daily.weather_code[index] ?? 0);
      lines.push(`${date}: ${min ?? 'N/A'}°C to ${max ?? 'N/A'}°C, ${conditions}`);
    });
    return lines.join('\n');
  } catch (err) {
    if (err instanceof RequestTimeoutError) {
      return `Weather API timeout for ${city}`;
    }
    return `Error fetching forecast: ${describeError(err)}`;
  }
}

const CITY_PARAMETERS: ToolParameterSchema = {
  type: 'object',
  properties: {
    city: {
      type: 'string',
      description: "City name (e.g., 'London', 'Paris', 'New York')",
    },
  },
  required: ['city'],
};

export const STANDARD_TOOLS: readonly StandardTool[] = [
  {
    name: 'get_current_time',
    description:
      "Get the current date and time in a specific timezone. Supports standard IANA timezone names like 'America/New_York', 'Europe/London', 'Asia/Tokyo'.",
    parameters: {
      type: 'object',
      properties: {
        timezone: {
          type: 'string',
          description:
            "Timezone name (e.g., 'America/New_York', 'Asia/Tokyo', 'UTC'). Defaults to UTC if not specified.",
        },
      },
      required: [],
    },
    createHandler: (deps) => (args) => {
      const { timezone } = parseArgs(CurrentTimeArgsSchema, args);
      try {
        return `Current time in ${timezone}: ${formatZonedTime(deps.now(), timezone)}`;
      } catch (err) {
        if (err instanceof UnknownTimezoneError) {
          return `Unknown timezone: ${timezone}. Try one of these: ${COMMON_TIMEZONES.join(', ')}`;
        }
        return `Error getting time: ${describeError(err)}`;
      }
    },
  },
  {
    name: 'get_time_difference',
    description:
      'Calculate the time difference between two timezones. Useful for scheduling across time zones.',
    parameters: {
      type: 'object',
      properties: {
        timezone1: { type: 'string', description: 'First timezone name' },
        timezone2: { type: 'string', description: 'Second timezone name' },
      },
      required: ['timezone1', 'timezone2'],
    },
    createHandler: (deps) => (args) => {
      const { timezone1, timezone2 } = parseArgs(TimeDifferenceArgsSchema, args);
      try {
        const now = deps.now();
        const difference = utcOffsetHours(now, timezone1) - utcOffsetHours(now, timezone2);
        if (difference === 0) {
          return `${timezone1} and ${timezone2} are in the same timezone (no difference).`;
        }
        const hours = Math.abs(difference).toFixed(1);
        return difference > 0
          ? `${timezone1} is ${hours} hours ahead of ${timezone2}.`
          : `${timezone1} is ${hours} hours behind ${timezone2}.`;
      } catch (err) {
        if (err instanceof UnknownTimezoneError) {
          return `Unknown timezone in request: ${err.timezone}`;
        }
        return `Error calculating time difference: ${describeError(err)}`;
      }
    },
  },
  {
    name: 'get_weather',
    description:
      'Get current weather conditions for a specific city. Returns temperature, humidity, wind speed, and conditions.',
    parameters: CITY_PARAMETERS,
    createHandler: (deps) => (args, ctx) => {
      const { city } = parseArgs(CityArgsSchema, args);
      return getWeather(city, deps, ctx);
    },
  },
  {
    name: 'get_forecast',
    description:
      'Get a 7-day weather forecast for a specific city. Returns daily temperature ranges and conditions.',
    parameters: CITY_PARAMETERS,
    createHandler: (deps) => (args, ctx) => {
      const { city } = parseArgs(CityArgsSchema, args);
      return getForecast(city, deps, ctx);
    },
  },
];

/**
 * Registers the time and weather tools on `executor` and returns the names
 * that were registered.
 */
export function registerStandardTools(
  executor: ToolExecutor,
  options: StandardToolsOptions = {},
): string[] {
  const deps: ToolDeps = {
    fetchFn: options.fetchFn ?? fetch,
    now: options.now ?? (() => new Date()),
    requestTimeoutMs: options.requestTimeoutMs ?? 10_000,
  };
  const allowed = options.allowlist ? new Set(options.allowlist) : undefined;

  const registered: string[] = [];
  for (const tool of STANDARD_TOOLS) {
    if (allowed && !allowed.has(tool.name)) {
      continue;
    }
    executor.registerTool(tool.name, tool.description, tool.parameters, tool.createHandler(deps));
    registered.push(tool.name);
  }
  return registered;
}
