import { WeatherObservation } from '../../types/domain.types';
import { NoaaWeatherRecord, StormGlassWeatherRecord } from '../../types/raw-record.types';
import {
  assertCoordinates,
  assertNonNegative,
  msFromKnots,
  parseTimestamp,
  pickSourced,
  roundTo,
  UnrepresentableError
} from './normalization.util';

export function mapStormGlassWeather(raw: StormGlassWeatherRecord): WeatherObservation {
  const { locationId, latitude, longitude, reading } = raw.payload;
  assertCoordinates(latitude, longitude);

  const windSpeed = pickSourced(reading.windSpeed, 'sg');
  const waveHeight = pickSourced(reading.waveHeight, 'sg');
  if (windSpeed === undefined && waveHeight === undefined) {
    throw new UnrepresentableError('Hour carries neither wind speed nor wave height');
  }

  return {
    locationId,
    latitude,
    longitude,
    windSpeedMs: windSpeed === undefined ? undefined : roundTo(assertNonNegative(windSpeed, 'windSpeed'), 1),
    waveHeightM: waveHeight === undefined ? undefined : roundTo(assertNonNegative(waveHeight, 'waveHeight'), 1),
    timestamp: parseTimestamp(reading.time, raw.fetchedAt),
    source: raw.providerId
  };
}

export function mapNoaaWeather(raw: NoaaWeatherRecord): WeatherObservation {
  const { locationId, latitude, longitude, reading } = raw.payload;
  assertCoordinates(latitude, longitude);

  // units=english reports wind in knots
  const windKnots = assertNonNegative(reading.s, 'wind speed');

  return {
    locationId,
    latitude,
    longitude,
    windSpeedMs: roundTo(msFromKnots(windKnots), 1),
    timestamp: parseTimestamp(reading.t, raw.fetchedAt),
    source: raw.providerId
  };
}
