/**
 * Unit tests for meteoblue.client.ts
 */
import { Test, TestingModule } from '@nestjs/testing';
import { InputValidationError, TransportError } from '../common/errors';
import { EXTRACTOR_SETTINGS } from '../config/extractor-settings';
import { buildRequestPayload } from '../query/request-payload';
import { QueryBlock } from '../query/query.types';
import { MeteoblueClient } from './meteoblue.client';
import {
  TEST_API_URL,
  createTestSettings,
  jsonResponse,
} from '../../test/utils/test-helpers';
import { soilResponse } from '../../test/utils/mock-data';

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

describe('MeteoblueClient', () => {
  let client: MeteoblueClient;

  const location = { id: 'T-01', latitude: -15.5, longitude: -47.9 };
  const window = { startDate: '2023-02-24', endDate: '2023-03-30' };
  const queries: QueryBlock[] = [
    { domain: 'SOILGRIDS2', codes: [{ code: 837, level: '0-30 cm' }] },
  ];

  beforeEach(async () => {
    mockFetch.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MeteoblueClient,
        { provide: EXTRACTOR_SETTINGS, useValue: createTestSettings() },
      ],
    }).compile();

    client = module.get<MeteoblueClient>(MeteoblueClient);
  });

  it('should POST the payload with the API key', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(soilResponse('T-01', -15.5, -47.9)));

    await client.fetchLocation(location, window, queries);

    expect(mockFetch).toHaveBeenCalledWith(
      `${TEST_API_URL}?apikey=test-secret`,
      expect.objectContaining({
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
      }),
    );
    const [, init] = mockFetch.mock.calls[0];
    expect(JSON.parse(init.body)).toEqual(
      buildRequestPayload(location, window, queries),
    );
  });

  it('should return the decoded body', async () => {
    const body = soilResponse('T-01', -15.5, -47.9);
    mockFetch.mockResolvedValueOnce(jsonResponse(body));

    await expect(client.fetchLocation(location, window, queries)).resolves.toEqual(
      body,
    );
  });

  it('should retry once after a connection error', async () => {
    const body = soilResponse('T-01', -15.5, -47.9);
    mockFetch
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse(body));

    await expect(client.fetchLocation(location, window, queries)).resolves.toEqual(
      body,
    );
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should fail after a second connection error', async () => {
    mockFetch
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new TypeError('fetch failed'));

    await expect(
      client.fetchLocation(location, window, queries),
    ).rejects.toThrow('Request for T-01 failed after retry: fetch failed');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should not retry HTTP errors', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({}, 503));

    const error: unknown = await client
      .fetchLocation(location, window, queries)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      message: 'Provider returned HTTP 503 for T-01',
      status: 503,
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it('should report the provider error message', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error_message: 'Invalid apikey' }, 401),
    );

    await expect(
      client.fetchLocation(location, window, queries),
    ).rejects.toThrow('Provider rejected request for T-01: Invalid apikey');
  });

  it('should treat an error message in a 200 body as a failure', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ error_message: 'Time interval too long' }),
    );

    await expect(
      client.fetchLocation(location, window, queries),
    ).rejects.toThrow(TransportError);
  });

  it('should fail on a body that is not JSON', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      json: () => Promise.reject(new SyntaxError('Unexpected token <')),
    });

    await expect(
      client.fetchLocation(location, window, queries),
    ).rejects.toThrow('Invalid JSON from provider for T-01: Unexpected token <');
  });

  it('should reject a window that ends before it starts', async () => {
    await expect(
      client.fetchLocation(
        location,
        { startDate: '2023-03-30', endDate: '2023-02-24' },
        queries,
      ),
    ).rejects.toThrow(InputValidationError);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
