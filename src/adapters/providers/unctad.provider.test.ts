import 'reflect-metadata';
import { IngestionMetrics } from '../../services/ingestion-metrics.service';
import { DataKind } from '../../types/domain.types';
import { buildTestConfig } from '../../test-support/test-config';
import { jsonResponse, testCredential } from '../../test-support/http';
import { UnctadProvider } from './unctad.provider';

// Mock global fetch
global.fetch = jest.fn();

describe('UnctadProvider', () => {
  let provider: UnctadProvider;
  const query = {
    vesselIds: [],
    ports: [
      { portId: 'NLRTM', name: 'Rotterdam', latitude: 51.95, longitude: 4.14 },
      { portId: 'DEHAM', name: 'Hamburg', latitude: 53.55, longitude: 9.99 }
    ]
  };

  beforeEach(() => {
    jest.clearAllMocks();
    provider = new UnctadProvider(buildTestConfig(), new IngestionMetrics());
  });

  it('should send the key as a header and the ports as locodes', async () => {
    (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({ data: [] }));

    await provider.fetch(testCredential('unctad'), DataKind.PORT_CONGESTION, query);

    const [url, init] = (global.fetch as jest.Mock).mock.calls[0];
    expect(new URL(url).searchParams.get('locode')).toBe('NLRTM,DEHAM');
    expect(init.headers).toEqual({ Accept: 'application/json', 'x-api-key': 'test-key' });
  });

  it('should return port records for well-formed entries', async () => {
    (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({
      data: [
        { locode: 'NLRTM', vesselsAtAnchor: 31, meanWaitingDays: 1.5, observedAt: '2026-03-01T06:00:00Z' },
        { locode: 'DEHAM', vesselsAtAnchor: null, meanWaitingDays: 0.5, observedAt: '2026-03-01T06:00:00Z' }
      ]
    }));

    const records = await provider.fetch(testCredential('unctad'), DataKind.PORT_CONGESTION, query);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ providerId: 'unctad', kind: DataKind.PORT_CONGESTION, payload: { locode: 'NLRTM' } });
  });

  it('should only serve port congestion', async () => {
    expect(provider.capabilities).toEqual([DataKind.PORT_CONGESTION]);
    await expect(provider.fetch(testCredential('unctad'), DataKind.WEATHER, query)).resolves.toEqual([]);
    expect(global.fetch).not.toHaveBeenCalled();
  });
});
