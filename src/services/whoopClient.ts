import { KeyedMutex } from '../lib/keyedMutex';
import { type Err, fail, ok, type Result } from '../lib/result';
import type { CredentialStore } from '../stores/credentialStore';
import { errorMessage, type FetchFn, type WhoopAuthService } from './whoopAuthService';
import {
  pageParsers,
  profileSchema,
  WHOOP_ENDPOINTS,
  type WhoopCategory,
  type WhoopProfile,
  type WhoopRecordMap,
  type WhoopResource,
} from './whoopTypes';

export interface WhoopClientOptions {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  fetchFn?: FetchFn;
  clock?: () => Date;
}

export interface RecordFilters {
  startDate?: string;
  endDate?: string;
  /** Advisory page size; WHOOP may return fewer records. */
  limit?: number;
}

type Attempt =
  | { status: 'ok'; body: unknown }
  | { status: 'unauthorized'; code: number }
  | { status: 'error'; code?: number; message: string };

/**
 * Authenticated GETs against the WHOOP developer API for one user.
 *
 * A 401/403 triggers a single refresh of the stored credential followed by
 * one retry, so an invocation makes at most two resource calls. Failures come
 * back as result values; an empty record list is a success.
 */
export class WhoopClient {
  private readonly fetchFn: FetchFn;
  private readonly clock: () => Date;
  private readonly refreshLock = new KeyedMutex();
  // Per user: callers waiting on the lock, and the last refresh that failed while they waited.
  private readonly refreshWaiters = new Map<string, number>();
  private readonly failedRefresh = new Map<string, { staleAccessToken: string; failure: Err<'AuthExpired'> }>();

  constructor(
    private readonly credentials: CredentialStore,
    private readonly auth: WhoopAuthService,
    private readonly options: WhoopClientOptions
  ) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.clock = options.clock ?? (() => new Date());
  }

  async fetchRecords<C extends WhoopCategory>(
    userId: string,
    category: C,
    filters: RecordFilters = {}
  ): Promise<Result<WhoopRecordMap[C][]>> {
    const params: Record<string, string> = {};
    if (filters.startDate) params.start_date = filters.startDate;
    if (filters.endDate) params.end_date = filters.endDate;
    if (filters.limit !== undefined) params.limit = String(filters.limit);

    const response = await this.request(userId, category, params);
    if (!response.ok) return response;

    const page = pageParsers[category](response.value);
    if (!page) {
      console.error(`❌ WHOOP ${category} payload did not match the expected shape (user ${userId})`);
      return fail('UpstreamError', `Malformed ${category} payload`);
    }
    return ok(page.records);
  }

  async fetchProfile(userId: string): Promise<Result<WhoopProfile>> {
    const response = await this.request(userId, 'profile', {});
    if (!response.ok) return response;

    const parsed = profileSchema.safeParse(response.value);
    if (!parsed.success) return fail('UpstreamError', 'Malformed profile payload');
    return ok(parsed.data);
  }

  private async request(userId: string, resource: WhoopResource, params: Record<string, string>): Promise<Result<unknown>> {
    const credential = await this.credentials.get(userId);
    if (!credential) return fail('NotLinked', 'No WHOOP account linked');

    const url = new URL(`${this.options.apiBaseUrl}/${WHOOP_ENDPOINTS[resource]}`);
    for (const [key, value] of Object.entries(params)) url.searchParams.set(key, value);

    let attempt = await this.get(url, credential.accessToken);

    if (attempt.status === 'unauthorized') {
      console.log(`🔄 WHOOP ${resource} answered ${attempt.code} for user ${userId}, refreshing token...`);
      const renewed = await this.renewAccessToken(userId, credential.accessToken);
      if (!renewed.ok) return renewed;

      attempt = await this.get(url, renewed.value);
      if (attempt.status === 'unauthorized') {
        return fail('UpstreamError', `WHOOP still rejected the token after refresh (${attempt.code})`, attempt.code);
      }
    }

    if (attempt.status === 'error') return fail('UpstreamError', attempt.message, attempt.code);
    return ok(attempt.body);
  }

  /**
   * Refreshes under a per-user lock. A caller that queued behind another
   * refresh picks up the token that one stored instead of spending the
   * (single-use) refresh token again, or its failure if it was rejected.
   */
  private async renewAccessToken(userId: string, staleAccessToken: string): Promise<Result<string, 'AuthExpired'>> {
    this.refreshWaiters.set(userId, (this.refreshWaiters.get(userId) ?? 0) + 1);
    try {
      return await this.refreshLock.runExclusive(userId, () => this.refreshOnce(userId, staleAccessToken));
    } finally {
      const left = (this.refreshWaiters.get(userId) ?? 1) - 1;
      if (left > 0) {
        this.refreshWaiters.set(userId, left);
      } else {
        this.refreshWaiters.delete(userId);
        this.failedRefresh.delete(userId);
      }
    }
  }

  private async refreshOnce(userId: string, staleAccessToken: string): Promise<Result<string, 'AuthExpired'>> {
    const current = await this.credentials.get(userId);
    if (!current) return fail('AuthExpired', 'Credential disappeared during refresh');
    if (current.accessToken !== staleAccessToken) return ok(current.accessToken);

    const failed = this.failedRefresh.get(userId);
    if (failed?.staleAccessToken === staleAccessToken) return failed.failure;

    if (!current.refreshToken) return fail('AuthExpired', 'No refresh token on file');

    const grant = await this.auth.refreshTokens(current.refreshToken);
    if (!grant.ok) {
      console.warn(`⚠️ WHOOP refresh failed for user ${userId}: ${grant.error.message}`);
      const failure = fail('AuthExpired', grant.error.message, grant.error.status);
      this.failedRefresh.set(userId, { staleAccessToken, failure });
      return failure;
    }

    await this.credentials.put({
      userId,
      accessToken: grant.value.accessToken,
      refreshToken: grant.value.refreshToken ?? current.refreshToken,
      scope: grant.value.scope,
      updatedAt: this.clock(),
    });
    console.log(`✅ WHOOP token refreshed for user ${userId}`);
    return ok(grant.value.accessToken);
  }

  private async get(url: URL, accessToken: string): Promise<Attempt> {
    let response: Response;
    try {
      response = await this.fetchFn(url.toString(), {
        headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      console.error(`❌ WHOOP request to ${url.pathname} failed:`, errorMessage(error));
      return { status: 'error', message: `Request failed: ${errorMessage(error)}` };
    }

    if (response.status === 401 || response.status === 403) {
      return { status: 'unauthorized', code: response.status };
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      console.error('WHOOP API Error:', response.status, url.pathname, detail);
      return { status: 'error', code: response.status, message: `WHOOP responded ${response.status}` };
    }

    try {
      return { status: 'ok', body: await response.json() };
    } catch (error) {
      return { status: 'error', code: response.status, message: `Unreadable JSON: ${errorMessage(error)}` };
    }
  }
}
