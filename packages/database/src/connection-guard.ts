import { ConnectivityError, type ProviderName, type TidemarkLogger } from '@tidemark/core';

/**
 * Watches a client connection that the server or network can drop while it
 * sits idle. Client libraries report that as an asynchronous `error` event;
 * after one arrives every statement fails with ConnectivityError before it
 * reaches the client.
 */
export class ConnectionGuard {
  private lost: Error | undefined;

  constructor(
    private readonly provider: ProviderName,
    private readonly logger: TidemarkLogger,
  ) {}

  /** Listener for the client's `error` event */
  readonly onError = (error: Error): void => {
    this.lost = error;
    this.logger.error('Connection lost', error, { provider: this.provider });
  };

  get broken(): boolean {
    return this.lost !== undefined;
  }

  /** @throws ConnectivityError once the connection has been lost */
  assertUsable(): void {
    if (this.lost) {
      throw new ConnectivityError(this.provider, this.lost, `The ${this.provider} connection was lost: ${this.lost.message}`);
    }
  }
}
