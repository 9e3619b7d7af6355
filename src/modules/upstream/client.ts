import crypto from 'crypto';
import { z } from 'zod';
import { env } from '../../config/env.js';
import { AppError, ErrorCode, isUpstreamFailure } from '../../common/errors/app-error.js';
import { upstreamLogger, type Logger } from '../../common/logger.js';
import { toLocalWallMs } from '../metering/time-normalizer.js';
import type { SnapshotOutcome, SnapshotSource } from '../metering/types.js';
import { mapSnapshot } from './snapshot-mapper.js';
import {
  AUTH_RESULT_CODES,
  energyAnalysisSchema,
  envelopeSchema,
  orderSchema,
  type UpstreamClientConfig,
} from './types.js';

export type FetchLike = typeof fetch;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Upstream Account API Client
 *
 * Fetches the energy analysis (balance, ladder, usage) and the recharge
 * order list, and assembles one AccountSnapshot. Failures come back as a
 * typed outcome, never as an exception:
 * - auth: HTTP 401/403 or an auth result code
 * - network: transport errors, timeouts, 5xx
 * - no data: any other non-success answer or an unexpected payload
 * Either call failing fails the whole snapshot.
 */
export class UpstreamClient implements SnapshotSource {
  constructor(
    private readonly config: UpstreamClientConfig,
    private readonly logger: Logger = upstreamLogger,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  /**
   * Request signature: yyyyMMddHHmmss (local) followed by
   * md5(yyyyMMddHHmmss + secret). The order service expects the digest in
   * upper case; the energy analysis service in lower case.
   */
  generateAppKey(now: Date = new Date(), { upperCase = false }: { upperCase?: boolean } = {}): string {
    const timeStr = new Date(toLocalWallMs(now, this.config.localOffsetHours))
      .toISOString()
      .slice(0, 19)
      .replace(/[-T:]/g, '');
    const signature = crypto
      .createHash('md5')
      .update(timeStr + this.config.apiSecret, 'utf8')
      .digest('hex');
    return timeStr + (upperCase ? signature.toUpperCase() : signature);
  }

  async fetchSnapshot(): Promise<SnapshotOutcome> {
    const fetchedAt = new Date();

    try {
      const [analysisData, ordersData] = await Promise.all([
        this.post(this.config.analysisUrl, this.analysisForm(fetchedAt), {
          token: this.config.token,
          'token-type': '2',
        }),
        this.post(this.config.orderListUrl, this.orderListForm(fetchedAt), {
          cityId: this.config.cityId,
          platform: 'ios',
        }),
      ]);

      const analysis = this.parseData(energyAnalysisSchema, analysisData, 'energy analysis');
      const orders = this.parseData(z.array(orderSchema), ordersData ?? [], 'order list');

      const snapshot = mapSnapshot(analysis, orders, fetchedAt, this.config.localOffsetHours);
      this.logger.debug(
        {
          balanceCents: snapshot.balanceCents,
          recharges: snapshot.rechargeEvents.length,
          tiers: snapshot.ladderTiers.length,
        },
        'Fetched account snapshot'
      );
      return { ok: true, snapshot };
    } catch (error) {
      if (isUpstreamFailure(error)) {
        this.logger.warn({ code: error.code, message: error.message }, 'Upstream request failed');
        return { ok: false, failure: error };
      }
      throw error;
    }
  }

  private analysisForm(now: Date): Record<string, string> {
    return {
      appKey: this.generateAppKey(now),
      token: this.config.token,
      clientType: this.config.clientType,
      paymentNo: this.config.paymentNo,
      companyCode: this.config.companyCode,
    };
  }

  private orderListForm(now: Date): Record<string, string> {
    return {
      appKey: this.generateAppKey(now, { upperCase: true }),
      orderStatus: '0',
      pageNum: '1',
      pageSize: String(this.config.orderPageSize),
      token: this.config.token,
      type: '2',
      version: '1',
    };
  }

  /**
   * POST a form and return the envelope's `data`.
   */
  private async post(
    url: string,
    form: Record<string, string>,
    headers: Record<string, string>
  ): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'content-type': FORM_CONTENT_TYPE, ...headers },
        body: new URLSearchParams(form).toString(),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw AppError.upstream(
        ErrorCode.UPSTREAM_NETWORK_ERROR,
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw AppError.upstream(ErrorCode.UPSTREAM_AUTH_EXPIRED, `Upstream rejected the token (HTTP ${response.status})`);
    }
    if (response.status >= 500) {
      throw AppError.upstream(ErrorCode.UPSTREAM_NETWORK_ERROR, `Upstream unavailable (HTTP ${response.status})`);
    }
    if (!response.ok) {
      throw AppError.upstream(ErrorCode.UPSTREAM_NO_DATA, `Upstream answered HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw AppError.upstream(ErrorCode.UPSTREAM_NO_DATA, `Upstream answered with invalid JSON from ${url}`);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!envelope.success) {
      throw AppError.upstream(ErrorCode.UPSTREAM_NO_DATA, `Unexpected response envelope from ${url}`);
    }

    const resultCode = envelope.data.resultCode ?? envelope.data.code;
    if (resultCode !== undefined && AUTH_RESULT_CODES.has(resultCode)) {
      throw AppError.upstream(ErrorCode.UPSTREAM_AUTH_EXPIRED, envelope.data.message ?? 'Token expired', {
        resultCode,
      });
    }
    if (resultCode !== 200) {
      throw AppError.upstream(ErrorCode.UPSTREAM_NO_DATA, envelope.data.message ?? 'Upstream returned no data', {
        resultCode: resultCode ?? null,
      });
    }

    return envelope.data.data;
  }

  private parseData<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.infer<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw AppError.upstream(ErrorCode.UPSTREAM_NO_DATA, `Unexpected ${what} payload`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }
}

// Singleton instance
let upstreamClientInstance: UpstreamClient | null = null;

export function getUpstreamClient(): UpstreamClient | null {
  if (!env.UPSTREAM_TOKEN) {
    return null;
  }
  if (!upstreamClientInstance) {
    upstreamClientInstance = new UpstreamClient({
      analysisUrl: env.UPSTREAM_ANALYSIS_URL,
      orderListUrl: env.UPSTREAM_ORDER_LIST_URL,
      token: env.UPSTREAM_TOKEN,
      paymentNo: env.UPSTREAM_PAYMENT_NO,
      companyCode: env.UPSTREAM_COMPANY_CODE,
      cityId: env.UPSTREAM_CITY_ID,
      clientType: env.UPSTREAM_CLIENT_TYPE,
      apiSecret: env.UPSTREAM_API_SECRET,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
      orderPageSize: 10,
      localOffsetHours: env.LOCAL_UTC_OFFSET_HOURS,
    });
  }
  return upstreamClientInstance;
}
