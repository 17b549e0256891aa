import { describe, it, expect } from 'vitest';
import { BetsApiClient, finalFromResult, toRosterEntry } from '../src/source/betsapi.js';
import { SourceUnavailableError } from '../src/util/errors.js';
import { DEFAULT_CONFIG } from '../config/default.js';

const config = { ...DEFAULT_CONFIG.source, baseUrl: 'https://betsapi.test', token: 'test-secret', upcomingPages: 3 };

function fakeFetch(respond: (url: URL) => { status?: number; body: unknown }) {
  const urls: URL[] = [];
  const fetchImpl: typeof fetch = async input => {
    const url = new URL(String(input));
    urls.push(url);
    const { status = 200, body } = respond(url);
    return new Response(JSON.stringify(body), { status });
  };
  return { fetchImpl, urls };
}

function upcoming(id: string, league: string, timeStatus = '0') {
  return {
    id,
    time: '1772366400',
    time_status: timeStatus,
    league: { id: '22821', name: league },
    home: { name: 'Hawks (Ace)' },
    away: { name: 'Bulls (Nova)' },
  };
}

describe('BetsApiClient', () => {
  it('polls the in-play feed and parses target events', async () => {
    const { fetchImpl, urls } = fakeFetch(() => ({
      body: {
        success: 1,
        results: [[
          { type: 'CT', NA: 'Ebasketball H2H GG League - 4x5mins' },
          { type: 'EV', NA: 'Bulls (Nova) @ Hawks (Ace)', C2: '151234567', TM: '2', TS: '30', CP: 'Q2' },
        ]],
      },
    }));
    const client = new BetsApiClient(config, 'bet365', { fetchImpl, now: () => 42 });

    const snaps = await client.poll();
    expect(snaps.map(s => [s.eventId, s.quarter, s.timeRemaining, s.observedAt])).toEqual([['151234567', 2, 150, 42]]);
    expect(urls[0].pathname).toBe('/v1/bet365/inplay');
    expect(urls[0].searchParams.get('token')).toBe('test-secret');
  });

  it('turns HTTP errors into SourceUnavailableError', async () => {
    const { fetchImpl } = fakeFetch(() => ({ status: 503, body: {} }));
    const client = new BetsApiClient(config, 'bet365', { fetchImpl });
    await expect(client.poll()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it('turns a rejected request into SourceUnavailableError', async () => {
    const { fetchImpl } = fakeFetch(() => ({ body: { success: 0, error: 'TOKEN_INVALID' } }));
    const client = new BetsApiClient(config, 'bet365', { fetchImpl });
    await expect(client.poll()).rejects.toThrow('BetsAPI /v1/bet365/inplay: TOKEN_INVALID');
  });

  it('wraps network failures', async () => {
    const fetchImpl: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const client = new BetsApiClient(config, 'bet365', { fetchImpl });
    await expect(client.poll()).rejects.toThrow('BetsAPI /v1/bet365/inplay failed: fetch failed');
  });

  it('looks up a finished result by FI', async () => {
    const { fetchImpl, urls } = fakeFetch(() => ({ body: { success: 1, results: [{ time_status: '3', ss: '55-60' }] } }));
    const client = new BetsApiClient(config, 'bet365', { fetchImpl });

    expect(await client.lookupFinal('151234567')).toEqual({ home: 55, away: 60 });
    expect(urls[0].pathname).toBe('/v1/bet365/result');
    expect(urls[0].searchParams.get('FI')).toBe('151234567');
  });

  it('walks upcoming pages until one comes back empty', async () => {
    const { fetchImpl, urls } = fakeFetch(url => {
      const page = url.searchParams.get('page');
      if (page === '1') {
        return {
          body: {
            success: 1,
            results: [
              upcoming('101', 'Ebasketball H2H GG League - 4x5mins'),
              upcoming('102', 'NBA'),
              upcoming('103', 'Ebasketball H2H GG League - 4x5mins', '1'),
            ],
          },
        };
      }
      if (page === '2') return { body: { success: 1, results: [upcoming('101', 'Ebasketball H2H GG League - 4x5mins')] } };
      return { body: { success: 1, results: [] } };
    });
    const client = new BetsApiClient(config, 'bet365', { fetchImpl });

    const fixtures = await client.listFixtures();
    expect(fixtures.map(f => [f.eventId, f.status])).toEqual([['101', 'scheduled'], ['103', 'live']]);
    expect(urls.map(u => u.searchParams.get('page'))).toEqual(['1', '2', '3']);
    expect(urls[0].searchParams.get('sport_id')).toBe('18');
  });

  it('keeps earlier pages when a later page fails', async () => {
    const { fetchImpl } = fakeFetch(url =>
      url.searchParams.get('page') === '1'
        ? { body: { success: 1, results: [upcoming('101', 'Ebasketball H2H GG League - 4x5mins')] } }
        : { status: 500, body: {} },
    );
    const client = new BetsApiClient(config, 'bet365', { fetchImpl });
    expect((await client.listFixtures()).map(f => f.eventId)).toEqual(['101']);
  });
});

describe('finalFromResult', () => {
  it('prefers the full-time score fields', () => {
    expect(finalFromResult({ time_status: 3, scores: { ft_home: '70', ft_away: '68' }, ss: '1-1' })).toEqual({ home: 70, away: 68 });
  });

  it('returns null until the match is finished', () => {
    expect(finalFromResult({ time_status: '1', ss: '30-28' })).toBeNull();
    expect(finalFromResult({ time_status: '3' })).toBeNull();
  });
});

describe('toRosterEntry', () => {
  it('converts the epoch start and drops cancelled fixtures', () => {
    const entry = toRosterEntry({
      id: '101', time: 1772366400, time_status: '0',
      league: { id: '22821', name: 'Ebasketball H2H GG League' },
      home: { name: 'Hawks (Ace)' }, away: { name: 'Bulls (Nova)' },
    });
    expect(entry?.startTimeUtc).toBe('2026-03-01T12:00:00.000Z');
    expect(entry?.leagueId).toBe('22821');

    expect(toRosterEntry({
      id: '102', time: 1772366400, time_status: '5',
      league: { name: 'Ebasketball H2H GG League' },
      home: { name: 'Hawks (Ace)' }, away: { name: 'Bulls (Nova)' },
    })).toBeNull();
  });
});
