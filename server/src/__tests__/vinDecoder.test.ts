import { afterEach, describe, it, expect, vi } from 'vitest';
import { createVinDecodeClient, flattenDecodeResponse } from '../services/vinDecoder';
import { silentLogger } from './helpers';

const VIN = '1HGCM82633A004352';

function client() {
  return createVinDecodeClient({ baseUrl: 'https://decoder.test/api', timeoutMs: 1000, logger: silentLogger() });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('flattenDecodeResponse', () => {
  it('keeps populated values and drops empty ones', () => {
    expect(
      flattenDecodeResponse({
        Count: 4,
        Results: [
          { Variable: 'Make', Value: 'HONDA' },
          { Variable: 'Model', Value: '' },
          { Variable: 'Trim', Value: 'null' },
          { Variable: 'Doors', Value: null },
        ],
      }),
    ).toEqual({ Make: 'HONDA' });
  });

  it('treats Count 0 and unexpected shapes as empty', () => {
    expect(flattenDecodeResponse({ Count: 0, Results: [{ Variable: 'Make', Value: 'HONDA' }] })).toEqual({});
    expect(flattenDecodeResponse({ Message: 'nope' })).toEqual({});
  });
});

describe('createVinDecodeClient', () => {
  it('requests the decode endpoint once and flattens the result', async () => {
    const fetchMock = stubFetch(
      new Response(JSON.stringify({ Count: 1, Results: [{ Variable: 'Make', Value: 'HONDA' }] }), { status: 200 }),
    );

    expect(await client().decode(VIN)).toEqual({ ok: true, value: { Make: 'HONDA' } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      `https://decoder.test/api/vehicles/DecodeVin/${VIN}?format=json`,
      expect.objectContaining({ signal: expect.any(AbortSignal) }),
    ]);
  });

  it('reports a non-2xx status as unavailable and releases the body', async () => {
    const response = new Response('busy', { status: 503 });
    if (!response.body) throw new Error('expected a response body');
    const cancel = vi.spyOn(response.body, 'cancel');
    stubFetch(response);

    expect(await client().decode(VIN)).toEqual({ ok: false, error: 'DecodeServiceUnavailable' });
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('reports a network failure or timeout as unavailable', async () => {
    stubFetch(new TypeError('fetch failed'));
    expect(await client().decode(VIN)).toEqual({ ok: false, error: 'DecodeServiceUnavailable' });
  });

  it('lets a non-JSON body surface as an exception', async () => {
    stubFetch(new Response('<html>', { status: 200 }));
    await expect(client().decode(VIN)).rejects.toThrow(SyntaxError);
  });
});
