// Shapes of the JSON printed by `nft -j` and `ip -j neigh`.

export interface NftCounterStatement {
  packets: number;
  bytes: number;
}

export interface NftPayloadMatch {
  op: string;
  left: { payload?: { protocol: string; field: string } };
  right: unknown;
}

export type NftExpression =
  | { counter: NftCounterStatement }
  | { match: NftPayloadMatch }
  | Record<string, unknown>;

export interface NftRule {
  family: string;
  table: string;
  chain: string;
  handle: number;
  comment?: string;
  expr?: NftExpression[];
}

export interface NftChain {
  family: string;
  table: string;
  name: string;
  handle: number;
  type?: string;
  hook?: string;
  prio?: number;
  policy?: string;
}

export type NftObject =
  | { metainfo: Record<string, unknown> }
  | { table: Record<string, unknown> }
  | { chain: NftChain }
  | { rule: NftRule };

export interface NftListResponse {
  nftables: NftObject[];
}

export interface IpNeighborEntry {
  dst: string;
  dev?: string;
  lladdr?: string;
  state?: string[];
}
