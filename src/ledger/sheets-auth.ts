/**
 * Google service-account authentication: a self-signed RS256 JWT exchanged
 * for an OAuth access token.
 */

import { readFileSync } from 'fs';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { errorFromResponse } from '../utils/http';
import { ConfigError } from '../utils/config';

const logger = createLogger('sheets-auth');

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
/** Refresh this long before the token actually expires */
const EXPIRY_MARGIN_MS = 60_000;

export const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
  token_uri: z.string().url().default(DEFAULT_TOKEN_URI),
});

export type ServiceAccountCredentials = z.infer<typeof serviceAccountSchema>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600),
});

export type AccessTokenProvider = () => Promise<string>;

export function loadServiceAccount(credentialsPath: string): ServiceAccountCredentials {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(credentialsPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read Google credentials at ${credentialsPath}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  const parsed = serviceAccountSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid Google service-account credentials',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function signServiceAccountAssertion(
  credentials: ServiceAccountCredentials,
  scope: string,
  nowMs: number = Date.now(),
): string {
  const iat = Math.floor(nowMs / 1000);
  return jwt.sign(
    { iss: credentials.client_email, scope, aud: credentials.token_uri, iat, exp: iat + 3600 },
    credentials.private_key,
    { algorithm: 'RS256' },
  );
}

/**
 * Token provider that caches the access token until shortly before expiry.
 */
export function createServiceAccountTokenProvider(
  credentials: ServiceAccountCredentials,
  scope: string = SHEETS_SCOPE,
): AccessTokenProvider {
  let cached: { token: string; expiresAt: number } | null = null;

  return async () => {
    const now = Date.now();
    if (cached && now < cached.expiresAt - EXPIRY_MARGIN_MS) {
      return cached.token;
    }

    const response = await fetch(credentials.token_uri, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
        assertion: signServiceAccountAssertion(credentials, scope, now),
      }).toString(),
    });
    if (!response.ok) {
      throw await errorFromResponse(response, 'Google token exchange');
    }

    const body = tokenResponseSchema.parse(await response.json());
    cached = { token: body.access_token, expiresAt: now + body.expires_in * 1000 };
    logger.debug({ account: credentials.client_email, expiresIn: body.expires_in }, 'Obtained Google access token');
    return body.access_token;
  };
}
