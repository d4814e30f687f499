// Unit tests for serialized execution and re-entrancy rejection
import { describe, it, expect } from 'vitest';

import { InMemoryAssetCustody } from '../../src/collaborators/InMemoryAssetCustody.js';
import type { DscEngine } from '../../src/engine/DscEngine.js';
import { E18, ENGINE, LIQUIDATOR, STARTING_BALANCE, USER, WETH, createHarness } from '../helpers/engineHarness.js';

/**
 * Custody that calls back into the engine from inside transferFrom,
 * the way a hostile token hook would.
 */
class CallbackCustody extends InMemoryAssetCustody {
  engine?: DscEngine;
  nestedError?: unknown;

  async transferFrom(asset: string, from: string, to: string, amount: bigint): Promise<boolean> {
    const engine = this.engine;
    if (engine) {
      this.engine = undefined;
      try {
        await engine.mintDsc(from, 1n);
      } catch (err) {
        this.nestedError = err;
      }
    }
    return super.transferFrom(asset, from, to, amount);
  }
}

describe('DscEngine concurrency', () => {
  it('should serialize concurrent operations in arrival order', async () => {
    const { engine } = createHarness();
    await engine.depositCollateral(USER, WETH, 10n * E18);

    const results = await Promise.allSettled([
      engine.mintDsc(USER, 5000n * E18),
      engine.mintDsc(USER, 6000n * E18)
    ]);

    expect(results[0]).toEqual({ status: 'fulfilled', value: undefined });
    expect(results[1]).toMatchObject({
      status: 'rejected',
      reason: { code: 'BreakHealthFactor', healthFactor: 909090909090909090n }
    });
    expect(engine.getDscMinted(USER)).toBe(5000n * E18);
  });

  it('should apply independent accounts concurrently without losing updates', async () => {
    const { engine, custody } = createHarness();
    custody.fund(WETH, LIQUIDATOR, 10n * E18);

    await Promise.all([
      engine.depositCollateral(USER, WETH, 4n * E18),
      engine.depositCollateral(LIQUIDATOR, WETH, 3n * E18),
      engine.depositCollateral(USER, WETH, 2n * E18)
    ]);

    expect(engine.getCollateralBalanceOfUser(USER, WETH)).toBe(6n * E18);
    expect(engine.getCollateralBalanceOfUser(LIQUIDATOR, WETH)).toBe(3n * E18);
    expect(engine.getSystemTotals().collateral[WETH]).toBe(9n * E18);
  });

  it('should not expose staged balances to views while an operation is in flight', async () => {
    const { engine, dsc } = createHarness();
    await engine.depositCollateral(USER, WETH, 10n * E18);

    let debtSeenDuringMint: bigint | undefined;
    const originalMint = dsc.mint.bind(dsc);
    dsc.mint = async (to, amount) => {
      debtSeenDuringMint = engine.getDscMinted(USER);
      return originalMint(to, amount);
    };

    await engine.mintDsc(USER, 100n * E18);

    expect(debtSeenDuringMint).toBe(0n);
    expect(engine.getDscMinted(USER)).toBe(100n * E18);
  });
});

describe('DscEngine re-entrancy', () => {
  it('should reject a call made from inside a collaborator and abort the outer operation', async () => {
    const custody = new CallbackCustody(ENGINE);
    const { engine } = createHarness({ custody });
    custody.engine = engine;

    await expect(engine.depositCollateral(USER, WETH, 10n * E18)).rejects.toMatchObject({ code: 'ReentrantCall' });

    expect(custody.nestedError).toMatchObject({ code: 'ReentrantCall' });
    expect(engine.getCollateralBalanceOfUser(USER, WETH)).toBe(0n);
    expect(custody.balanceOf(WETH, USER)).toBe(STARTING_BALANCE);
    expect(custody.balanceOf(WETH, ENGINE)).toBe(0n);
    expect(engine.getDscMinted(USER)).toBe(0n);
  });

  it('should accept new operations once the aborted one has unwound', async () => {
    const custody = new CallbackCustody(ENGINE);
    const { engine } = createHarness({ custody });
    custody.engine = engine;

    await engine.depositCollateral(USER, WETH, E18).catch(() => undefined);
    await engine.depositCollateral(USER, WETH, E18);

    expect(engine.getCollateralBalanceOfUser(USER, WETH)).toBe(E18);
  });

  it('should let event listeners call back into the engine after the commit', async () => {
    const { engine } = createHarness();
    const followUp = new Promise<void>((resolve, reject) => {
      engine.once('CollateralDeposited', () => {
        setTimeout(() => {
          engine.mintDsc(USER, 100n * E18).then(resolve, reject);
        }, 10);
      });
    });

    await engine.depositCollateral(USER, WETH, 10n * E18);
    await followUp;

    expect(engine.getDscMinted(USER)).toBe(100n * E18);
  });

  it('should queue a mutating call made synchronously by a listener', async () => {
    const { engine } = createHarness();
    let nested: Promise<void> | undefined;
    engine.once('CollateralDeposited', () => {
      nested = engine.mintDsc(USER, 100n * E18);
    });

    await engine.depositCollateral(USER, WETH, 10n * E18);
    await nested;

    expect(nested).toBeDefined();
    expect(engine.getDscMinted(USER)).toBe(100n * E18);
  });
});
