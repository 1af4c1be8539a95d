/**
 * FMP Market Data Adapter
 *
 * - REST (stable API) via axios
 * - Transient failures retried with exponential backoff (3 attempts, 2s..10s)
 * - HTTP 429 surfaces as rate_limit without retry
 */

import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import Decimal from "decimal.js";
import { ResultAsync, errAsync, okAsync } from "neverthrow";
import type { z } from "zod";
import { findCloseOn, findPricePair, type IsoDate, type PriceBar, type PricePair, type PriceStr } from "@dip-scanner/core";
import { DEFAULT_BACKOFF, logger, retryWithBackoff, type BackoffConfig } from "@dip-scanner/utils";

import { isTransientMarketDataError, type MarketDataError, type MarketDataPort } from "../ports";
import {
  FmpConfigSchema,
  FmpConstituentRowSchema,
  FmpEarningsRowSchema,
  FmpHistoricalRowSchema,
  FmpRowsSchema,
  type FmpConfig,
  type FmpConfigInput,
} from "./types";

export interface FmpAdapterOptions {
  /** Replaces the HTTP transport (tests) */
  adapter?: AxiosAdapter;
  backoff?: BackoffConfig;
  sleep?: (ms: number) => Promise<void>;
}

type QueryParams = Record<string, string>;

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, value * 1000);
  }
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const at = Date.parse(value);
  return Number.isNaN(at) ? undefined : Math.max(0, at - now);
}

function toPriceStr(close: number | string | null | undefined): PriceStr | null {
  if (close === null || close === undefined) return null;
  try {
    const value = new Decimal(close);
    return value.isFinite() ? value.toString() : null;
  } catch {
    // decimal.js throws on non-numeric strings
    return null;
  }
}

function pickRows<S extends z.ZodTypeAny>(rows: unknown[], schema: S): Array<z.infer<S>> {
  const picked: Array<z.infer<S>> = [];
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) picked.push(parsed.data);
  }
  return picked;
}

/**
 * FMP Market Data Adapter
 *
 * Implements MarketDataPort against the FMP stable REST API
 */
export class FmpMarketDataAdapter implements MarketDataPort {
  private config: FmpConfig;
  private http: AxiosInstance;
  private backoff: BackoffConfig;
  private sleep: ((ms: number) => Promise<void>) | undefined;

  constructor(config: FmpConfigInput, options: FmpAdapterOptions = {}) {
    this.config = FmpConfigSchema.parse(config);
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.sleep = options.sleep;

    this.http = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      headers: { Accept: "application/json" },
      adapter: options.adapter,
    });

    // NOTE: never log the API key
    logger.info("FMP market data adapter constructed", {
      baseUrl: this.config.baseUrl,
      timeoutMs: this.config.timeoutMs,
      lookbackDays: this.config.lookbackDays,
      apiKeyPresent: Boolean(this.config.apiKey),
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // MarketDataPort
  // ─────────────────────────────────────────────────────────────────────────────

  listIndexConstituents(): ResultAsync<string[], MarketDataError> {
    return this.getRows("sp500-constituent").map(rows => {
      const symbols = pickRows(rows, FmpConstituentRowSchema).map(r => r.symbol);
      return [...new Set(symbols)];
    });
  }

  earningsOn(date: IsoDate): ResultAsync<string[], MarketDataError> {
    return this.getRows("earnings-calendar", { from: date, to: date }).map(rows => {
      const symbols = pickRows(rows, FmpEarningsRowSchema)
        .filter(r => r.date === undefined || r.date === date)
        .map(r => r.symbol);
      return [...new Set(symbols)];
    });
  }

  historicalCloses(symbol: string, count: number): ResultAsync<PriceBar[], MarketDataError> {
    return this.getRows("historical-price-eod/full", { symbol }).map(rows =>
      pickRows(rows, FmpHistoricalRowSchema)
        .map(r => ({ date: r.date, close: toPriceStr(r.close) }))
        .sort((a, b) => b.date.localeCompare(a.date))
        .slice(0, count),
    );
  }

  priceAndPrevClose(symbol: string, date: IsoDate): ResultAsync<PricePair | null, MarketDataError> {
    return this.historicalCloses(symbol, this.config.lookbackDays).map(window => {
      const pair = findPricePair(window, date);
      if (!pair) {
        logger.debug("FMP: no price pair in lookback window", { symbol, date, bars: window.length });
      }
      return pair;
    });
  }

  closeOn(symbol: string, date: IsoDate): ResultAsync<PriceStr | null, MarketDataError> {
    return this.historicalCloses(symbol, this.config.lookbackDays).map(window => {
      const close = findCloseOn(window, date);
      if (close === null) {
        logger.debug("FMP: no close in lookback window", { symbol, date });
      }
      return close;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // HTTP
  // ─────────────────────────────────────────────────────────────────────────────

  private getRows(path: string, params: QueryParams = {}): ResultAsync<unknown[], MarketDataError> {
    return retryWithBackoff(() => this.get(path, params), {
      label: `FMP ${path}`,
      shouldRetry: isTransientMarketDataError,
      config: this.backoff,
      sleep: this.sleep,
    }).andThen(body => {
      const parsed = FmpRowsSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn("FMP: unexpected response format", { path });
        return errAsync<unknown[], MarketDataError>({
          type: "invalid_response",
          message: `${path}: expected a JSON array`,
        });
      }
      return okAsync<unknown[], MarketDataError>(parsed.data);
    });
  }

  private get(path: string, params: QueryParams): ResultAsync<unknown, MarketDataError> {
    logger.debug("FMP request", { path, ...params });
    return ResultAsync.fromPromise(
      this.http.get<unknown>(path, { params: { ...params, apikey: this.config.apiKey } }),
      this.mapError,
    ).map(response => response.data);
  }

  private mapError = (error: unknown): MarketDataError => {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;

      if (status === 429) {
        return {
          type: "rate_limit",
          message: "FMP API rate limit exceeded",
          retryAfterMs: parseRetryAfter(error.response?.headers["retry-after"]),
        };
      }
      if (status !== undefined && status >= 500) {
        return { type: "server_error", message: error.message, status };
      }
      if (status !== undefined) {
        return { type: "client_error", message: error.message, status };
      }
      if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
        return { type: "timeout", message: error.message };
      }
      return { type: "network", message: error.message };
    }

    return {
      type: "network",
      message: error instanceof Error ? error.message : String(error),
    };
  };
}
