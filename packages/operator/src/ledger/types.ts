/**
 * Asset Ledger Types
 *
 * External value-transfer and asset-transfer primitives. Each call is atomic
 * on its own; grouping several calls into one unit is the transactor's job.
 */

import type { Principal } from '../boundaries/principal.js';

export interface AssetLedger {
  /**
   * Move currency between accounts.
   * Zero is a no-op; negative amounts and overdrafts fail with TransferError.
   */
  transferFunds(from: Principal, to: Principal, amount: bigint): Promise<void>;

  /**
   * Move units of a minted asset between accounts.
   * Same failure rules as transferFunds.
   */
  transferAsset(assetId: number, from: Principal, to: Principal, amount: bigint): Promise<void>;

  balanceOf(account: Principal): Promise<bigint>;
  assetBalanceOf(assetId: number, account: Principal): Promise<bigint>;
}

export interface MintRequest {
  uri: string;
  amount: bigint;
  recipient: Principal;
}

export interface AssetMinter {
  /**
   * Mint a new asset and credit `amount` units to the recipient.
   * Returns the asset id, which doubles as the product id.
   */
  mint(request: MintRequest): Promise<number>;

  assetUri(assetId: number): Promise<string | null>;
}
