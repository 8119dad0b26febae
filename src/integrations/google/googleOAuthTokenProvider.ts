import axios from 'axios';
import { TokenProvider } from '../base/capabilities';
import { DispatchError, getErrorMessage } from '../../errors';
import { GoogleCalendarSettings } from '../../types';
import { describeHttpError } from '../httpErrors';

export interface GoogleOAuthClientConfig {
  clientId: string;
  clientSecret: string;
  tokenUrl?: string;
  timeoutMs?: number;
}

interface TokenResponse {
  access_token?: string;
  expires_in?: number;
}

/**
 * Hands out the tenant's Google access token, exchanging the stored refresh
 * token for a new one when asked to or when no access token is stored.
 * Refreshed tokens live only as long as this provider instance.
 */
export class GoogleOAuthTokenProvider implements TokenProvider {
  private accessToken?: string;

  constructor(private settings: GoogleCalendarSettings, private oauth: GoogleOAuthClientConfig) {
    this.accessToken = settings.accessToken;
  }

  async getAccessToken(forceRefresh = false): Promise<string> {
    if (this.accessToken && !forceRefresh) {
      return this.accessToken;
    }
    this.accessToken = await this.refresh();
    return this.accessToken;
  }

  private async refresh(): Promise<string> {
    if (!this.settings.refreshToken || !this.oauth.clientId || !this.oauth.clientSecret) {
      throw new DispatchError('google_calendar', 'Google access token expired and cannot be refreshed');
    }

    try {
      const { data } = await axios.post<TokenResponse>(
        this.oauth.tokenUrl || 'https://oauth2.googleapis.com/token',
        new URLSearchParams({
          grant_type: 'refresh_token',
          refresh_token: this.settings.refreshToken,
          client_id: this.oauth.clientId,
          client_secret: this.oauth.clientSecret
        }).toString(),
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: this.oauth.timeoutMs ?? 10000
        }
      );

      if (!data.access_token) {
        throw new DispatchError('google_calendar', 'Token refresh response did not include an access token');
      }
      return data.access_token;
    } catch (error) {
      if (error instanceof DispatchError) {
        throw error;
      }
      throw new DispatchError(
        'google_calendar',
        `Token refresh failed: ${describeHttpError(error, 'Google OAuth') ?? getErrorMessage(error)}`
      );
    }
  }
}
