/**
 * Token Book — in-memory multi-asset balance ledger
 *
 * Plays the asset-transfer primitive for every participant: collateral,
 * tranches, the claim token and vault shares all live here as
 * (asset, account) → balance. Transfers that would overdraw an account
 * throw InsufficientBalance, which aborts the enclosing atomic call.
 */

import { AccountId, AssetId, TokenLedger } from '../types';
import { InsufficientBalance, UnacceptableParams } from '../core/errors';
import { Snapshottable } from '../state/atomic';

export interface TokenBookState {
    balances: Array<[AssetId, Array<[AccountId, bigint]>]>;
    supplies: Array<[AssetId, bigint]>;
}

export class TokenBook implements TokenLedger, Snapshottable<TokenBookState> {
    private balances = new Map<AssetId, Map<AccountId, bigint>>();
    private supplies = new Map<AssetId, bigint>();

    balanceOf(asset: AssetId, account: AccountId): bigint {
        return this.balances.get(asset)?.get(account) ?? 0n;
    }

    totalSupply(asset: AssetId): bigint {
        return this.supplies.get(asset) ?? 0n;
    }

    transfer(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void {
        this.assertAmount(amount);
        if (amount === 0n || from === to) {
            return;
        }
        const fromBal = this.balanceOf(asset, from);
        if (fromBal < amount) {
            throw new InsufficientBalance(`${from} holds ${fromBal} ${asset}, needs ${amount}`, {
                asset,
                account: from,
                balance: fromBal.toString(),
                amount: amount.toString(),
            });
        }
        this.setBalance(asset, from, fromBal - amount);
        this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
    }

    mint(asset: AssetId, to: AccountId, amount: bigint): void {
        this.assertAmount(amount);
        if (amount === 0n) {
            return;
        }
        this.setBalance(asset, to, this.balanceOf(asset, to) + amount);
        this.supplies.set(asset, this.totalSupply(asset) + amount);
    }

    burn(asset: AssetId, from: AccountId, amount: bigint): void {
        this.assertAmount(amount);
        if (amount === 0n) {
            return;
        }
        const fromBal = this.balanceOf(asset, from);
        if (fromBal < amount) {
            throw new InsufficientBalance(`burn amount exceeds balance of ${from}`, {
                asset,
                account: from,
                balance: fromBal.toString(),
                amount: amount.toString(),
            });
        }
        this.setBalance(asset, from, fromBal - amount);
        this.supplies.set(asset, this.totalSupply(asset) - amount);
    }

    snapshot(): TokenBookState {
        return {
            balances: Array.from(this.balances.entries()).map(([asset, accounts]) => [
                asset,
                Array.from(accounts.entries()),
            ]),
            supplies: Array.from(this.supplies.entries()),
        };
    }

    restore(state: TokenBookState): void {
        this.balances = new Map(state.balances.map(([asset, accounts]) => [asset, new Map(accounts)]));
        this.supplies = new Map(state.supplies);
    }

    private setBalance(asset: AssetId, account: AccountId, value: bigint): void {
        let accounts = this.balances.get(asset);
        if (!accounts) {
            accounts = new Map();
            this.balances.set(asset, accounts);
        }
        if (value === 0n) {
            accounts.delete(account);
        } else {
            accounts.set(account, value);
        }
    }

    private assertAmount(amount: bigint): void {
        if (amount < 0n) {
            throw new UnacceptableParams('negative token amount', { amount: amount.toString() });
        }
    }
}
