import type { IIssuedTokenStorage } from '../storage/interfaces/index.js';
import { getLogger, type Logger } from '../logging/index.js';

export interface SweepResult {
  expired: number;
  revoked: number;
}

export interface TokenMaintenanceOptions {
  issuedTokens: IIssuedTokenStorage;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Deletes refresh token rows that can never be used again
 */
export class TokenMaintenance {
  private readonly issuedTokens: IIssuedTokenStorage;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: TokenMaintenanceOptions) {
    this.issuedTokens = options.issuedTokens;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger('token-maintenance');
  }

  async sweep(): Promise<SweepResult> {
    const expired = await this.issuedTokens.deleteExpired(this.now());
    const revoked = await this.issuedTokens.deleteRevoked();

    this.logger.info({ expired, revoked }, 'Token sweep completed');

    return { expired, revoked };
  }

  /**
   * Run `sweep` every `intervalMs`. Does nothing for a non-positive interval.
   */
  start(intervalMs: number): void {
    if (intervalMs <= 0 || this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        this.logger.error({ err: error }, 'Token sweep failed');
      });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get running(): boolean {
    return this.timer !== null;
  }
}
