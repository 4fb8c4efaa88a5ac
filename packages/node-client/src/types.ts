// packages/node-client/src/types.ts

export type Hex = string;

export type TxOutput = {
  index: number;
  valueSats: bigint; // keep bigint
  script: Uint8Array;
};

export type RawTransaction = {
  txid: Hex;
  outputs: TxOutput[];
};

export type Block = {
  height: number;
  hash: Hex;
  /** header timestamp, unix seconds */
  time: number;
  transactions: RawTransaction[];
};

export type RequestOptions = {
  signal?: AbortSignal;
};

/**
 * What the scanner needs from a chain backend. Implementations translate their
 * transport failures into NodeClientError so callers never see transport details.
 */
export interface NodeClient {
  getBlockCount(): Promise<number>;
  getBlockByHeight(height: number, opts?: RequestOptions): Promise<Block>;
  getRawTransaction(txid: Hex, opts?: RequestOptions): Promise<RawTransaction>;
}
