import { fail, ok, type Result } from '../lib/result';
import { tokenResponseSchema } from './whoopTypes';

export type FetchFn = typeof fetch;

export interface WhoopOAuthOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scope: string[];
  authUrl: string;
  tokenUrl: string;
  requestTimeoutMs: number;
  fetchFn?: FetchFn;
}

export interface TokenGrant {
  accessToken: string;
  /** Absent when the token endpoint did not rotate it. */
  refreshToken?: string;
  scope: string[];
}

/**
 * Talks to the WHOOP authorization server: builds the consent URL and runs
 * both grant types against the token endpoint. Stateless; persisting the
 * returned pair is the caller's job.
 */
export class WhoopAuthService {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: WhoopOAuthOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get requestedScope(): string[] {
    return [...this.options.scope];
  }

  getAuthUrl(state: string): string {
    const url = new URL(this.options.authUrl);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', this.options.clientId);
    url.searchParams.set('redirect_uri', this.options.redirectUri);
    url.searchParams.set('scope', this.options.scope.join(' '));
    url.searchParams.set('state', state);
    return url.toString();
  }

  async exchangeCode(code: string): Promise<Result<TokenGrant, 'ExchangeFailed'>> {
    return this.requestGrant('authorization_code', {
      code,
      redirect_uri: this.options.redirectUri,
    });
  }

  async refreshTokens(refreshToken: string): Promise<Result<TokenGrant, 'ExchangeFailed'>> {
    return this.requestGrant('refresh_token', {
      refresh_token: refreshToken,
      scope: this.options.scope.join(' '),
    });
  }

  private async requestGrant(
    grantType: 'authorization_code' | 'refresh_token',
    params: Record<string, string>
  ): Promise<Result<TokenGrant, 'ExchangeFailed'>> {
    const body = new URLSearchParams({
      grant_type: grantType,
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      ...params,
    });

    let response: Response;
    try {
      response = await this.fetchFn(this.options.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
        body: body.toString(),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      console.error(`❌ WHOOP ${grantType} request failed:`, error);
      return fail('ExchangeFailed', `Token endpoint unreachable: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      console.error(`❌ WHOOP ${grantType} rejected:`, response.status, detail);
      return fail('ExchangeFailed', `Token endpoint responded ${response.status}`, response.status);
    }

    const payload: unknown = await response.json().catch(() => null);
    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      console.error(`❌ WHOOP ${grantType} returned an unexpected body`);
      return fail('ExchangeFailed', 'Token endpoint returned a malformed body', response.status);
    }

    return ok({
      accessToken: parsed.data.access_token,
      refreshToken: parsed.data.refresh_token,
      scope: parsed.data.scope ? parsed.data.scope.split(/\s+/).filter(Boolean) : this.requestedScope,
    });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
