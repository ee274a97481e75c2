import crypto from 'node:crypto';

export interface ApiCredentials {
  apiKey: string;
  apiSecret: string;
}

export interface SignedRequest {
  body: string;
  headers: Record<string, string>;
}

export function signBody(secret: string, body: string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Serializes `payload` as compact JSON and signs exactly those bytes. The
 * returned body must be sent unchanged or the signature no longer matches.
 */
export function signPayload(creds: ApiCredentials, payload: object): SignedRequest {
  const body = JSON.stringify(payload);
  return {
    body,
    headers: {
      'Content-Type': 'application/json',
      'X-AUTH-APIKEY': creds.apiKey,
      'X-AUTH-SIGNATURE': signBody(creds.apiSecret, body),
    },
  };
}
