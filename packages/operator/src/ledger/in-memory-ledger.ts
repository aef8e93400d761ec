/**
 * In-Memory Asset Ledger
 *
 * For tests and local development. Balances live in Maps keyed by account.
 */

import type { Principal } from '../boundaries/principal.js';
import { TransferError, ValidationError } from '../boundaries/errors.js';
import type { Snapshottable } from '../catalog/store.js';
import type { AssetLedger, AssetMinter, MintRequest } from './types.js';

export interface LedgerState {
  funds: Map<Principal, bigint>;
  assets: Map<number, { uri: string; balances: Map<Principal, bigint> }>;
  lastAssetId: number;
}

export class InMemoryAssetLedger
  implements AssetLedger, AssetMinter, Snapshottable<LedgerState>
{
  private state: LedgerState = {
    funds: new Map(),
    assets: new Map(),
    lastAssetId: 0,
  };

  async transferFunds(from: Principal, to: Principal, amount: bigint): Promise<void> {
    move(this.state.funds, from, to, amount, 'funds');
  }

  async transferAsset(
    assetId: number,
    from: Principal,
    to: Principal,
    amount: bigint
  ): Promise<void> {
    const asset = this.state.assets.get(assetId);
    if (!asset) {
      throw new TransferError(`Unknown asset: ${assetId}`);
    }
    move(asset.balances, from, to, amount, `asset ${assetId}`);
  }

  async balanceOf(account: Principal): Promise<bigint> {
    return this.state.funds.get(account) ?? 0n;
  }

  async assetBalanceOf(assetId: number, account: Principal): Promise<bigint> {
    return this.state.assets.get(assetId)?.balances.get(account) ?? 0n;
  }

  async mint(request: MintRequest): Promise<number> {
    if (request.amount < 1n) {
      throw new ValidationError('Mint amount must be at least 1');
    }
    this.state.lastAssetId += 1;
    const assetId = this.state.lastAssetId;
    this.state.assets.set(assetId, {
      uri: request.uri,
      balances: new Map([[request.recipient, request.amount]]),
    });
    return assetId;
  }

  async assetUri(assetId: number): Promise<string | null> {
    return this.state.assets.get(assetId)?.uri ?? null;
  }

  /**
   * Fund an account out of thin air. Development and tests only.
   */
  credit(account: Principal, amount: bigint): void {
    this.state.funds.set(account, (this.state.funds.get(account) ?? 0n) + amount);
  }

  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  restore(snapshot: LedgerState): void {
    this.state = snapshot;
  }
}

function move(
  balances: Map<Principal, bigint>,
  from: Principal,
  to: Principal,
  amount: bigint,
  what: string
): void {
  if (amount < 0n) {
    throw new TransferError(`Cannot transfer a negative amount of ${what}`);
  }
  if (amount === 0n) return;

  const available = balances.get(from) ?? 0n;
  if (available < amount) {
    throw new TransferError(
      `Insufficient ${what} for ${from}: has ${available}, needs ${amount}`
    );
  }
  balances.set(from, available - amount);
  balances.set(to, (balances.get(to) ?? 0n) + amount);
}
