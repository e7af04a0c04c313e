import { AuthRejected } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { TokenProvider } from './token-provider.js';

/**
 * Single owner of the broker session token. Sockets read `token` on every
 * connect; `refresh()` is single-flight so a burst of rejections from several
 * sockets costs one login.
 */
export class SessionContext {
  private current: string | null = null;
  private refreshing: Promise<string> | null = null;
  private generation = 0;

  constructor(readonly apiKey: string, private readonly provider: TokenProvider) {}

  get token(): string {
    if (!this.current) throw new AuthRejected('session token not acquired yet');
    return this.current;
  }

  /** Bumped on every successful refresh; lets a rejected socket see whether its token was already replaced. */
  get tokenGeneration(): number {
    return this.generation;
  }

  refresh(): Promise<string> {
    if (this.refreshing) return this.refreshing;
    this.refreshing = this.provider
      .acquire()
      .then((token) => {
        this.current = token;
        this.generation++;
        logger.info({ generation: this.generation }, 'session token acquired');
        return token;
      })
      .finally(() => {
        this.refreshing = null;
      });
    return this.refreshing;
  }
}
