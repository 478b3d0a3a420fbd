// Raw provider records: wire payloads tagged with provenance. Transient, they
// live for one cycle and are discarded after normalization.

import {
  LocatedWire,
  MarinesiaPositionWire,
  MarineTrafficCongestionWire,
  MarineTrafficPositionWire,
  NoaaWindReadingWire,
  StormGlassHourWire,
  UnctadPortWire
} from '../adapters/providers/wire.schemas';
import { DataKind } from './domain.types';

interface Provenance {
  readonly fetchedAt: Date;
}

export interface MarineTrafficPositionRecord extends Provenance {
  readonly providerId: 'marinetraffic';
  readonly kind: DataKind.VESSEL_POSITION;
  readonly payload: MarineTrafficPositionWire;
}

export interface MarineTrafficCongestionRecord extends Provenance {
  readonly providerId: 'marinetraffic';
  readonly kind: DataKind.PORT_CONGESTION;
  readonly payload: MarineTrafficCongestionWire;
}

export interface MarinesiaPositionRecord extends Provenance {
  readonly providerId: 'marinesia';
  readonly kind: DataKind.VESSEL_POSITION;
  readonly payload: MarinesiaPositionWire;
}

export interface UnctadPortRecord extends Provenance {
  readonly providerId: 'unctad';
  readonly kind: DataKind.PORT_CONGESTION;
  readonly payload: UnctadPortWire;
}

export interface StormGlassWeatherRecord extends Provenance {
  readonly providerId: 'stormglass';
  readonly kind: DataKind.WEATHER;
  readonly payload: LocatedWire<StormGlassHourWire>;
}

export interface NoaaWeatherRecord extends Provenance {
  readonly providerId: 'noaa';
  readonly kind: DataKind.WEATHER;
  readonly payload: LocatedWire<NoaaWindReadingWire>;
}

export type RawRecord =
  | MarineTrafficPositionRecord
  | MarineTrafficCongestionRecord
  | MarinesiaPositionRecord
  | UnctadPortRecord
  | StormGlassWeatherRecord
  | NoaaWeatherRecord;
