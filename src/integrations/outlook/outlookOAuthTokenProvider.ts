import axios from 'axios';
import { TokenProvider } from '../base/capabilities';
import { DispatchError, getErrorMessage } from '../../errors';
import { OutlookCalendarSettings } from '../../types';
import { describeHttpError } from '../httpErrors';

export interface OutlookOAuthClientConfig {
  clientId: string;
  clientSecret: string;
  tenantId?: string;
  /** `{tenant}` is replaced with the tenant id. */
  tokenUrl?: string;
  timeoutMs?: number;
}

const DEFAULT_TOKEN_URL = 'https://login.microsoftonline.com/{tenant}/oauth2/v2.0/token';
const SCOPE = 'offline_access https://graph.microsoft.com/User.Read https://graph.microsoft.com/Calendars.ReadWrite';

interface TokenResponse {
  access_token?: string;
  refresh_token?: string;
  expires_in?: number;
}

/**
 * Microsoft identity platform tokens for one tenant. Microsoft rotates the
 * refresh token on every exchange; the newest one is kept for the next
 * refresh made by this instance.
 */
export class OutlookOAuthTokenProvider implements TokenProvider {
  private accessToken?: string;
  private refreshToken?: string;

  constructor(settings: OutlookCalendarSettings, private oauth: OutlookOAuthClientConfig) {
    this.accessToken = settings.accessToken;
    this.refreshToken = settings.refreshToken;
  }

  async getAccessToken(forceRefresh = false): Promise<string> {
    if (this.accessToken && !forceRefresh) {
      return this.accessToken;
    }
    this.accessToken = await this.refresh();
    return this.accessToken;
  }

  private async refresh(): Promise<string> {
    if (!this.refreshToken || !this.oauth.clientId || !this.oauth.clientSecret) {
      throw new DispatchError('outlook_calendar', 'Outlook access token expired and cannot be refreshed');
    }

    const tokenUrl = (this.oauth.tokenUrl || DEFAULT_TOKEN_URL).replace(
      '{tenant}',
      encodeURIComponent(this.oauth.tenantId || 'common')
    );

    try {
      const { data } = await axios.post<TokenResponse>(
        tokenUrl,
        new URLSearchParams({
          client_id: this.oauth.clientId,
          client_secret: this.oauth.clientSecret,
          refresh_token: this.refreshToken,
          grant_type: 'refresh_token',
          scope: SCOPE
        }).toString(),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: this.oauth.timeoutMs ?? 10000
        }
      );

      if (!data.access_token) {
        throw new DispatchError('outlook_calendar', 'Token refresh response did not include an access token');
      }
      if (data.refresh_token) {
        this.refreshToken = data.refresh_token;
      }
      return data.access_token;
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError(
        'outlook_calendar',
        `Token refresh failed: ${describeHttpError(error, 'Microsoft identity platform') ?? getErrorMessage(error)}`
      );
    }
  }
}
