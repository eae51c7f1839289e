import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  InputValidationError,
  TransportError,
  formatErrorMessage,
} from '../common/errors';
import {
  EXTRACTOR_SETTINGS,
  ExtractorSettings,
} from '../config/extractor-settings';
import { QueryBlock } from '../query/query.types';
import {
  RequestLocation,
  buildRequestPayload,
} from '../query/request-payload';
import { TimeWindow } from '../time-window/time-window';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * HTTP client for the meteoblue dataset API.
 *
 * One POST per location and category. A request that never reaches the
 * server is retried once after `retryDelayMs`; an HTTP error status or an
 * `error_message` body fails immediately.
 */
@Injectable()
export class MeteoblueClient {
  private readonly logger = new Logger(MeteoblueClient.name);

  constructor(
    @Inject(EXTRACTOR_SETTINGS) private readonly settings: ExtractorSettings,
  ) {}

  /**
   * Query one location over one time window.
   *
   * @returns The decoded JSON body, unvalidated
   * @throws InputValidationError if the window ends before it starts
   * @throws TransportError if the request fails
   */
  async fetchLocation(
    location: RequestLocation,
    window: TimeWindow,
    queries: QueryBlock[],
  ): Promise<unknown> {
    if (window.startDate > window.endDate) {
      throw new InputValidationError(
        `Time window for ${location.id} ends before it starts (${window.startDate} > ${window.endDate})`,
      );
    }

    const payload = buildRequestPayload(
      location,
      window,
      queries,
      this.settings.timeIntervalOffset,
    );
    const url = `${this.settings.apiUrl}?apikey=${encodeURIComponent(this.settings.apiKey)}`;

    this.logger.debug(
      `Querying ${location.id} for ${payload.timeIntervals[0]} (${queries.length} block(s))`,
    );

    const response = await this.post(url, JSON.stringify(payload), location.id);

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new TransportError(
        `Invalid JSON from provider for ${location.id}: ${formatErrorMessage(error)}`,
        response.status,
        error instanceof Error ? error : undefined,
      );
    }

    if (isRecord(body) && typeof body.error_message === 'string') {
      throw new TransportError(
        `Provider rejected request for ${location.id}: ${body.error_message}`,
        response.status,
      );
    }
    if (!response.ok) {
      throw new TransportError(
        `Provider returned HTTP ${response.status} for ${location.id}`,
        response.status,
      );
    }

    return body;
  }

  private async post(
    url: string,
    body: string,
    locationId: string,
  ): Promise<Response> {
    const request: RequestInit = {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    };

    try {
      return await fetch(url, request);
    } catch (error) {
      this.logger.warn(
        `Connection error for ${locationId}: ${formatErrorMessage(error)}. Retrying in ${this.settings.retryDelayMs}ms...`,
      );
    }

    await this.sleep(this.settings.retryDelayMs);

    try {
      return await fetch(url, request);
    } catch (error) {
      throw new TransportError(
        `Request for ${locationId} failed after retry: ${formatErrorMessage(error)}`,
        undefined,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Sleep helper for retry delays.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
