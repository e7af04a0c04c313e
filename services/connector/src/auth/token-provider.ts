import { fetch } from 'undici';
import { z } from 'zod';
import { AuthRejected } from '../errors.js';

export interface TokenProvider {
  /** Resolves a fresh session token or rejects with AuthRejected. */
  acquire(): Promise<string>;
}

/** Token handed in through the environment (already exchanged out of band). */
export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string | undefined) {}

  async acquire(): Promise<string> {
    if (!this.token) throw new AuthRejected('no ACCESS_TOKEN configured');
    return this.token;
  }
}

export type LoginCredentials = {
  apiKey: string;
  userId: string;
  password: string;
  totpSecret: string;
};

const LoginResponse = z.object({ access_token: z.string().min(1) });

/**
 * Delegates login + one-time-password exchange to a login bridge that
 * answers with `{ access_token }`.
 */
export class HttpTokenProvider implements TokenProvider {
  constructor(
    private readonly url: string,
    private readonly creds: LoginCredentials,
    private readonly timeoutMs = 15_000,
  ) {}

  async acquire(): Promise<string> {
    const res = await fetch(this.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({
        api_key: this.creds.apiKey,
        user_id: this.creds.userId,
        password: this.creds.password,
        totp_secret: this.creds.totpSecret,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    }).catch((err: unknown) => {
      throw new AuthRejected('login bridge unreachable', { cause: err });
    });
    if (!res.ok) throw new AuthRejected(`login bridge answered HTTP ${res.status}`);

    const body = LoginResponse.safeParse(await res.json());
    if (!body.success) throw new AuthRejected('login bridge returned no access_token');
    return body.data.access_token;
  }
}
