// packages/node-client/src/errors.ts

/**
 * not-found:   the node has no such block/tx (height beyond tip, unknown txid)
 * unavailable: network error, timeout, node busy; worth retrying
 * rejected:    the node refused the request (bad method, bad params, auth)
 * malformed:   the node answered but the payload does not parse
 * aborted:     the run was cancelled while the request was in flight
 */
export type NodeClientErrorKind = 'not-found' | 'unavailable' | 'rejected' | 'malformed' | 'aborted';

export class NodeClientError extends Error {
  constructor(
    public readonly kind: NodeClientErrorKind,
    public readonly method: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(`${method}: ${message}`);
    this.name = 'NodeClientError';
  }

  get retryable(): boolean {
    return this.kind === 'unavailable';
  }
}
