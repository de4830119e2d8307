import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import { RefreshedToken, TokenRefresher } from '../storage/credentials.js';
import { Config } from '../types/index.js';

const SCOPES = ['https://www.googleapis.com/auth/calendar'];

function toRefreshedToken(tokens: Auth.Credentials): RefreshedToken {
  if (!tokens.access_token) {
    throw new Error('Google did not return an access token');
  }
  return {
    accessToken: tokens.access_token,
    refreshToken: tokens.refresh_token ?? undefined,
    expiry: tokens.expiry_date ?? undefined,
  };
}

/** OAuth2 handshake and token refresh against Google. */
export class GoogleAuth implements TokenRefresher {
  constructor(private readonly settings: Config['google']) {}

  isConfigured(): boolean {
    return Boolean(this.settings.clientId && this.settings.clientSecret);
  }

  createClient(): Auth.OAuth2Client {
    if (!this.isConfigured()) {
      throw new Error('GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set');
    }
    return new google.auth.OAuth2(this.settings.clientId, this.settings.clientSecret, this.settings.redirectUri);
  }

  getAuthUrl(): string {
    return this.createClient().generateAuthUrl({
      access_type: 'offline',
      include_granted_scopes: true,
      prompt: 'consent',
      scope: SCOPES,
    });
  }

  async exchangeCode(code: string): Promise<RefreshedToken> {
    const { tokens } = await this.createClient().getToken(code);
    return toRefreshedToken(tokens);
  }

  async refresh(refreshToken: string): Promise<RefreshedToken> {
    const client = this.createClient();
    client.setCredentials({ refresh_token: refreshToken });
    const { credentials } = await client.refreshAccessToken();
    return toRefreshedToken(credentials);
  }
}
