/** Token listing entry from the chain-indexing service */
export interface IndexerToken {
  denom: string;
  exponent: number;
  display?: string;
  name?: string;
  /** USD price of one display unit, null when unpriced */
  price?: number | string | null;
  liquidity?: number | null;
  volume_24h?: number | null;
}

export interface IndexerPoolToken {
  denom?: string;
}

export interface IndexerPool {
  pool_id: number | string;
  type: string;
  code_id?: number | string | null;
  /** Concentrated pools use {asset0, asset1}, every other type a list */
  pool_tokens:
    | { asset0?: IndexerPoolToken; asset1?: IndexerPoolToken }
    | IndexerPoolToken[];
  liquidity: number;
  swap_fees?: number | string | null;
  taker_fee?: number | string | null;
}

export interface IndexerPoolPage {
  pools?: IndexerPool[];
  pagination?: { next_offset?: number | null };
}
