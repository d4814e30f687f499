/**
 * Staged building blocks shared by the entry points and the liquidation path.
 * Each one mutates the transaction's ledger view, records the matching event
 * and queues the collaborator call-outs with the action that reverses each
 * one; none of them checks health.
 */

import type { LedgerTransaction } from './LedgerTransaction.js';
import type { AssetCustody, StableCoin } from './types.js';

export interface EffectContext {
  engineAddress: string;
  dsc: StableCoin;
  custody: AssetCustody;
}

export function stageDepositCollateral(
  tx: LedgerTransaction,
  ctx: EffectContext,
  asset: string,
  amount: bigint,
  user: string
): void {
  tx.creditCollateral(user, asset, amount);
  tx.record({ name: 'CollateralDeposited', payload: { user, token: asset, amount } });
  tx.defer({
    phase: 'pull',
    failure: 'TransferFailed',
    description: `custody.transferFrom(${asset}, ${user} -> engine, ${amount})`,
    invoke: () => ctx.custody.transferFrom(asset, user, ctx.engineAddress, amount),
    compensate: () => ctx.custody.transfer(asset, user, amount)
  });
}

/**
 * Move `amount` of `asset` out of `from`'s position and out of custody to `to`
 */
export function stageRedeemCollateral(
  tx: LedgerTransaction,
  ctx: EffectContext,
  asset: string,
  amount: bigint,
  from: string,
  to: string
): void {
  tx.debitCollateral(from, asset, amount);
  tx.record({
    name: 'CollateralRedeemed',
    payload: { redeemedFrom: from, redeemedTo: to, token: asset, amount }
  });
  tx.defer({
    phase: 'push',
    failure: 'TransferFailed',
    description: `custody.transfer(${asset}, ${to}, ${amount})`,
    invoke: () => ctx.custody.transfer(asset, to, amount),
    compensate: () => ctx.custody.transferFrom(asset, to, ctx.engineAddress, amount)
  });
}

export function stageMintDsc(
  tx: LedgerTransaction,
  ctx: EffectContext,
  amount: bigint,
  user: string
): void {
  tx.increaseDebt(user, amount);
  tx.defer({
    phase: 'mint',
    failure: 'MintFailed',
    description: `dsc.mint(${user}, ${amount})`,
    invoke: () => ctx.dsc.mint(user, amount),
    compensate: async () => {
      if (!(await ctx.dsc.transferFrom(user, ctx.engineAddress, amount))) return false;
      await ctx.dsc.burn(amount);
      return true;
    }
  });
}

/**
 * Reduce `onBehalfOf`'s debt, funded by `dscFrom`'s tokens: pull them into the
 * engine, then burn them.
 */
export function stageBurnDsc(
  tx: LedgerTransaction,
  ctx: EffectContext,
  amount: bigint,
  onBehalfOf: string,
  dscFrom: string
): void {
  tx.decreaseDebt(onBehalfOf, amount);
  tx.defer({
    phase: 'pull',
    failure: 'TransferFailed',
    description: `dsc.transferFrom(${dscFrom} -> engine, ${amount})`,
    invoke: () => ctx.dsc.transferFrom(dscFrom, ctx.engineAddress, amount),
    compensate: () => ctx.dsc.transferFrom(ctx.engineAddress, dscFrom, amount)
  });
  tx.defer({
    phase: 'burn',
    failure: 'TransferFailed',
    description: `dsc.burn(${amount})`,
    invoke: async () => {
      await ctx.dsc.burn(amount);
      return true;
    },
    // Re-issued to the engine; the pull's compensation hands them back
    compensate: () => ctx.dsc.mint(ctx.engineAddress, amount)
  });
}
