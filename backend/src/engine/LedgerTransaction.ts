/**
 * LedgerTransaction: one atomic unit of work over the CollateralLedger.
 *
 * Writes are staged and only reach the ledger on commit(). Reads go through
 * the stage first, so health checks inside an operation see its own effects
 * while views on the committed ledger never observe a half-applied operation.
 * Collaborator call-outs and events are queued alongside and released by
 * settle()/commit(); rollback() drops all three. When a call-out fails,
 * settle() reverses the ones that already went through, newest first.
 */

import { ArithmeticUnderflowError, DscEngineError } from './errors.js';
import type { CollateralLedger, LedgerView } from './CollateralLedger.js';
import type { EngineEvent } from './types.js';

/** Inbound pulls settle before burns, burns before mints, outbound pushes last */
export type CalloutPhase = 'pull' | 'burn' | 'mint' | 'push';

const PHASE_ORDER: Record<CalloutPhase, number> = {
  pull: 0,
  burn: 1,
  mint: 2,
  push: 3
};

export interface Callout {
  phase: CalloutPhase;
  description: string;
  failure: 'TransferFailed' | 'MintFailed';
  invoke: () => Promise<boolean>;
  /** Undo a completed invoke; resolves false when the collaborator refused */
  compensate?: () => Promise<boolean>;
}

export interface SettleHooks {
  /** Runs after every call-out returns or throws, before its result is judged */
  afterCallout?: () => void;
  /** A compensation that failed; the original error is still the one rethrown */
  onCompensationFailed?: (callout: Callout, err: unknown) => void;
}

type TransactionState = 'open' | 'committed' | 'rolled_back';

export class LedgerTransaction implements LedgerView {
  private readonly stagedCollateral: Map<string, Map<string, bigint>> = new Map();
  private readonly stagedDebt: Map<string, bigint> = new Map();
  private readonly callouts: Callout[] = [];
  private readonly events: EngineEvent[] = [];
  private state: TransactionState = 'open';

  constructor(private readonly ledger: CollateralLedger) {}

  getCollateral(user: string, asset: string): bigint {
    return this.stagedCollateral.get(user)?.get(asset) ?? this.ledger.getCollateral(user, asset);
  }

  getDebt(user: string): bigint {
    return this.stagedDebt.get(user) ?? this.ledger.getDebt(user);
  }

  creditCollateral(user: string, asset: string, amount: bigint): void {
    this.stageCollateral(user, asset, this.getCollateral(user, asset) + amount);
  }

  /**
   * @throws ArithmeticUnderflowError when the position holds less than `amount`
   */
  debitCollateral(user: string, asset: string, amount: bigint): void {
    const available = this.getCollateral(user, asset);
    if (amount > available) {
      throw new ArithmeticUnderflowError(`Collateral ${asset} of ${user}`, amount, available);
    }
    this.stageCollateral(user, asset, available - amount);
  }

  increaseDebt(user: string, amount: bigint): void {
    this.assertOpen();
    this.stagedDebt.set(user, this.getDebt(user) + amount);
  }

  /**
   * @throws ArithmeticUnderflowError when the account owes less than `amount`
   */
  decreaseDebt(user: string, amount: bigint): void {
    this.assertOpen();
    const available = this.getDebt(user);
    if (amount > available) {
      throw new ArithmeticUnderflowError(`Debt of ${user}`, amount, available);
    }
    this.stagedDebt.set(user, available - amount);
  }

  record(event: EngineEvent): void {
    this.assertOpen();
    this.events.push(event);
  }

  defer(callout: Callout): void {
    this.assertOpen();
    this.callouts.push(callout);
  }

  get pendingCallouts(): readonly Callout[] {
    return this.callouts;
  }

  /**
   * Run queued call-outs in phase order (stable within a phase).
   * `afterCallout` lets a poisoned operation surface its own error first.
   * On any failure the completed call-outs are compensated in reverse order
   * before the error propagates.
   */
  async settle(hooks: SettleHooks = {}): Promise<void> {
    this.assertOpen();
    const ordered = [...this.callouts].sort((a, b) => PHASE_ORDER[a.phase] - PHASE_ORDER[b.phase]);
    const completed: Callout[] = [];

    try {
      for (const callout of ordered) {
        let succeeded: boolean;
        try {
          succeeded = await callout.invoke();
        } catch (err) {
          hooks.afterCallout?.();
          throw new DscEngineError(callout.failure, `${callout.description} threw`, { cause: err });
        }
        if (succeeded) completed.push(callout);
        hooks.afterCallout?.();
        if (!succeeded) {
          throw new DscEngineError(callout.failure, `${callout.description} returned false`);
        }
      }
    } catch (err) {
      await this.compensate(completed, hooks.onCompensationFailed);
      throw err;
    }
  }

  /**
   * Apply staged balances to the ledger and hand back the events to publish
   */
  commit(): EngineEvent[] {
    this.assertOpen();
    for (const [user, positions] of this.stagedCollateral) {
      for (const [asset, amount] of positions) {
        this.ledger.applyCollateral(user, asset, amount);
      }
    }
    for (const [user, amount] of this.stagedDebt) {
      this.ledger.applyDebt(user, amount);
    }
    this.state = 'committed';
    return [...this.events];
  }

  rollback(): void {
    if (this.state !== 'open') return;
    this.stagedCollateral.clear();
    this.stagedDebt.clear();
    this.callouts.length = 0;
    this.events.length = 0;
    this.state = 'rolled_back';
  }

  private async compensate(
    completed: readonly Callout[],
    onFailure: SettleHooks['onCompensationFailed']
  ): Promise<void> {
    for (const callout of [...completed].reverse()) {
      if (!callout.compensate) continue;
      try {
        if (!(await callout.compensate())) {
          onFailure?.(callout, new Error(`${callout.description} compensation returned false`));
        }
      } catch (err) {
        onFailure?.(callout, err);
      }
    }
  }

  private stageCollateral(user: string, asset: string, amount: bigint): void {
    this.assertOpen();
    let positions = this.stagedCollateral.get(user);
    if (!positions) {
      positions = new Map();
      this.stagedCollateral.set(user, positions);
    }
    positions.set(asset, amount);
  }

  private assertOpen(): void {
    if (this.state !== 'open') {
      throw new Error(`LedgerTransaction already ${this.state}`);
    }
  }
}
