import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ConditionsFormatter,
  conditions,
  formatConditions,
  temperatureInitial,
} from '../../core/conditions/ConditionsFormatter.js';
import type { WeatherPort } from '../../ports/WeatherPort.js';
import { ConfigError, DecodeError, ValidationError } from '../../utils/errors.js';

const overcast = '{"weather":[{"description":"overcast clouds"}],"main":{"temp":9.21,"humidity":46}}';

describe('temperatureInitial', () => {
  it('maps each unit system to its letter', () => {
    expect(temperatureInitial('standard')).toBe('K');
    expect(temperatureInitial('metric')).toBe('C');
    expect(temperatureInitial('imperial')).toBe('F');
  });

  it('returns an empty label for unknown units', () => {
    expect(temperatureInitial('rankine')).toBe('');
  });
});

describe('formatConditions', () => {
  it('formats description, temperature and humidity', () => {
    const line = formatConditions(
      { summaries: [{ description: 'light rain' }], metrics: { temp: 283.1, humidity: 87 } },
      'standard'
    );
    expect(line).toBe('light rain, 283.10 K, humidity 87%');
  });

  it('uses only the first summary, trimmed', () => {
    const line = formatConditions(
      {
        summaries: [{ description: '  mist ' }, { description: 'haze' }],
        metrics: { temp: 50, humidity: 99 },
      },
      'imperial'
    );
    expect(line).toBe('mist, 50.00 F, humidity 99%');
  });

  it('rounds temperature ties to even', () => {
    const line = formatConditions({ summaries: [], metrics: { temp: 20.125, humidity: 1 } }, 'metric');
    expect(line).toBe(', 20.12 C, humidity 1%');
  });

  it('leaves the description out when there are no summaries', () => {
    const line = formatConditions({ summaries: [], metrics: { temp: -3.456, humidity: 20 } }, 'metric');
    expect(line).toBe(', -3.46 C, humidity 20%');
  });
});

describe('ConditionsFormatter', () => {
  const port = (body: string): WeatherPort => ({
    current: vi.fn().mockResolvedValue(body),
    geocode: vi.fn(),
    forecast: vi.fn(),
  });

  it('describes the current weather from the port', async () => {
    const weather = port(overcast);
    const formatter = new ConditionsFormatter(weather);

    await expect(formatter.describe('london', 'metric')).resolves.toBe(
      'overcast clouds, 9.21 C, humidity 46%'
    );
    expect(weather.current).toHaveBeenCalledWith('london', 'metric');
  });

  it('propagates decode errors', async () => {
    const formatter = new ConditionsFormatter(port('<html>'));
    await expect(formatter.describe('london', 'metric')).rejects.toThrow(DecodeError);
  });
});

describe('conditions', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches and formats the current conditions', async () => {
    const fetchMock = vi.fn().mockResolvedValue(new Response(overcast, { status: 200 }));

    const line = await conditions('london', 'metric', 'KEY', {
      baseUrl: 'https://weather.test',
      fetch: fetchMock,
    });

    expect(line).toBe('overcast clouds, 9.21 C, humidity 46%');
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      'https://weather.test/data/2.5/weather?q=london&units=metric&appid=KEY'
    );
  });

  it('uses the global fetch by default', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(overcast, { status: 200 })));
    await expect(conditions('london', 'imperial', 'KEY')).resolves.toBe(
      'overcast clouds, 9.21 F, humidity 46%'
    );
  });

  it('rejects an empty api key', async () => {
    await expect(conditions('london', 'metric', '')).rejects.toThrow(ConfigError);
  });

  it('rejects invalid arguments before any request', async () => {
    const fetchMock = vi.fn();
    await expect(conditions('', 'metric', 'KEY', { fetch: fetchMock })).rejects.toThrow(
      ValidationError
    );
    await expect(conditions('london', 'fahrenheit', 'KEY', { fetch: fetchMock })).rejects.toThrow(
      ValidationError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
