import type { Logger } from "pino";
import { withTimeout } from "../async/timing";
import type { Combatant } from "../domain/combatant";
import { TurnCancelledError, TurnTimeoutError } from "../domain/errors";
import type { CombatantId } from "../domain/types";
import type { AiTurnDriver, BattleView } from "./aiTurnDriver";

export interface AiWindowSequencerOptions {
  battle: BattleView;
  driver?: AiTurnDriver;
  turnTimeoutMs: number;
  log: Logger;
}

/**
 * Drives non-player windows one unit at a time. Each unit gets its own
 * AbortController and a bounded wait; when the bound expires the turn is
 * aborted and ended on the unit's behalf.
 */
export class AiWindowSequencer {
  private running: Promise<void> | null = null;
  private runningGeneration = -1;
  private generation = 0;
  private current: { unitId: CombatantId; controller: AbortController } | null = null;

  constructor(private readonly opts: AiWindowSequencerOptions) {}

  ensureRunning(): void {
    if (this.running && this.runningGeneration === this.generation) return;

    const gen = this.generation;
    // deferred one microtask so `running` is set before any turn can end
    const run: Promise<void> = Promise.resolve()
      .then(() => this.drain(gen))
      .catch((err: unknown) => {
        this.opts.log.error({ err }, "AI window sequencer failed");
      })
      .finally(() => {
        if (this.running === run) this.running = null;
      });
    this.running = run;
    this.runningGeneration = gen;
  }

  /** Aborts the in-flight turn of `unitId` without ending it. */
  cancelUnit(unitId: CombatantId): void {
    if (this.current?.unitId === unitId) {
      this.current.controller.abort();
    }
  }

  /** Stops driving: the in-flight turn is aborted and no turn is ended on its behalf. */
  cancel(): void {
    this.generation += 1;
    this.current?.controller.abort();
    this.current = null;
  }

  async whenIdle(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  // ===== loop =====

  private async drain(gen: number): Promise<void> {
    const { battle } = this.opts;
    while (gen === this.generation) {
      if (battle.isCombatOver()) return;
      const head = battle.getCurrentWindow()[0];
      if (!head || battle.isPlayerControlled(head)) return;
      await this.runUnitTurn(head, gen);
    }
  }

  private async runUnitTurn(unit: Combatant, gen: number): Promise<void> {
    const { battle, driver, log } = this.opts;
    const controller = new AbortController();
    this.current = { unitId: unit.id, controller };

    let ended = false;
    const complete = (forced: boolean) => {
      if (ended) return;
      ended = true;
      if (gen !== this.generation) return;
      battle.endTurn(unit, { forced });
    };

    try {
      if (!driver) {
        log.error({ unit_id: unit.id }, "no AI driver attached; ending turn");
      } else {
        const task = driver.takeTurn(unit, {
          signal: controller.signal,
          complete: () => complete(false),
          battle,
        });
        await withTimeout(task, this.opts.turnTimeoutMs, unit.id, () => controller.abort());
      }
    } catch (err) {
      if (err instanceof TurnTimeoutError) {
        log.warn({ unit_id: unit.id, timeout_ms: err.timeoutMs }, "AI turn timed out; forcing end of turn");
      } else if (err instanceof TurnCancelledError) {
        log.debug({ unit_id: unit.id }, "AI turn cancelled");
      } else {
        log.error({ err, unit_id: unit.id }, "AI turn failed; forcing end of turn");
      }
    } finally {
      if (this.current?.controller === controller) this.current = null;
    }

    if (gen !== this.generation) return;
    if (!ended && battle.isUnitInCurrentWindow(unit)) complete(true);
  }
}
