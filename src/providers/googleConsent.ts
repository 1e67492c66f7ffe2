import http from 'node:http';
import { AuthenticationRequiredError } from '../errors.js';
import type { FetchLike } from '../http.js';
import { requestGoogleToken } from './google.js';

export const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GOOGLE_CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar';

/** Installed-app consent URL; `prompt=consent` makes Google issue a refresh token again. */
export function consentUrl(clientId: string, redirectUri: string): string {
  const u = new URL(GOOGLE_AUTH_URL);
  u.searchParams.set('client_id', clientId);
  u.searchParams.set('redirect_uri', redirectUri);
  u.searchParams.set('response_type', 'code');
  u.searchParams.set('scope', GOOGLE_CALENDAR_SCOPE);
  u.searchParams.set('access_type', 'offline');
  u.searchParams.set('prompt', 'consent');
  return u.toString();
}

export interface ExchangeCodeParams {
  clientId: string;
  clientSecret: string;
  code: string;
  redirectUri: string;
  fetcher?: FetchLike;
}

/** Authorization code → refresh token. Undefined when Google withholds one. */
export async function exchangeCode(p: ExchangeCodeParams): Promise<string | undefined> {
  const token = await requestGoogleToken(
    {
      code: p.code,
      client_id: p.clientId,
      client_secret: p.clientSecret,
      redirect_uri: p.redirectUri,
      grant_type: 'authorization_code',
    },
    { fetcher: p.fetcher },
  );
  return token.refresh_token;
}

/** Serve `http://localhost:<port>/callback` until Google redirects back once. */
export function awaitConsentCode(port: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const u = new URL(req.url ?? '/', `http://localhost:${port}`);
      if (u.pathname !== '/callback') {
        res.writeHead(404).end();
        return;
      }

      const code = u.searchParams.get('code');
      const error = u.searchParams.get('error') ?? 'no code returned';
      res.writeHead(code ? 200 : 400, { 'content-type': 'text/plain' });
      res.end(code ? 'taskcal: access granted, back to the terminal.' : `taskcal: consent failed (${error})`);
      server.close();

      if (code) resolve(code);
      else reject(new AuthenticationRequiredError('google', `consent failed: ${error}`));
    });
    server.on('error', reject);
    server.listen(port);
  });
}
