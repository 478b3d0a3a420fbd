import { DependencyContainer, InjectionToken } from 'tsyringe';
import { AppConfig } from '../../config/app.config';
import { PROVIDER_IDS, ProviderId } from '../../types/domain.types';
import { MarinesiaProvider } from './marinesia.provider';
import { MarineTrafficProvider } from './marinetraffic.provider';
import { NoaaProvider } from './noaa.provider';
import { IProviderClient } from './provider-client.interface';
import { StormGlassProvider } from './stormglass.provider';
import { UnctadProvider } from './unctad.provider';

/** The closed set of provider variants. */
export const PROVIDER_CLIENTS: Record<ProviderId, InjectionToken<IProviderClient>> = {
  marinetraffic: MarineTrafficProvider,
  marinesia: MarinesiaProvider,
  unctad: UnctadProvider,
  stormglass: StormGlassProvider,
  noaa: NoaaProvider
};

/**
 * Resolves a client for every provider with a configured key. Providers
 * without a key are left out, which disables them without failing a cycle.
 */
export function buildProviderRegistry(config: AppConfig, resolver: DependencyContainer): IProviderClient[] {
  return PROVIDER_IDS
    .filter(providerId => Boolean(config.providers[providerId].apiKey))
    .map(providerId => resolver.resolve(PROVIDER_CLIENTS[providerId]));
}
