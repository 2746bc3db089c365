import { GatewayError } from '@dap-gateway/core';
import type {
  PhaseChange,
  SessionPhase,
  SessionPhaseStatus,
} from '../types/index.js';

const ALLOWED: Record<SessionPhaseStatus, readonly SessionPhaseStatus[]> = {
  idle: ['started', 'cancelled'],
  started: ['cancelled'],
  cancelled: [],
};

/**
 * Exclusively owned cell holding the session phase.
 *
 * {@link SessionStateCell.transform} is the only way to change the phase. The
 * transform runs synchronously to completion, so no caller ever sees a phase
 * between reading and writing. A transform must not call `transform` again.
 * A transform may return the phase it was given (no change) or a phase
 * one step further along `idle -> started -> cancelled` / `idle -> cancelled`;
 * anything else throws.
 * @public
 */
export class SessionStateCell {
  private current: SessionPhase;
  private transforming = false;

  public constructor(
    initial: SessionPhase,
    private readonly onChange?: (change: PhaseChange) => void,
  ) {
    this.current = initial;
  }

  public get phase(): SessionPhase {
    return this.current;
  }

  /**
   * Applies `f` to the current phase and stores its result.
   * @returns The phase after the transform
   * @throws {GatewayError} With code `invalid_phase_transition` for a
   * backwards or skipped step, or a re-entrant call
   */
  public transform(f: (phase: SessionPhase) => SessionPhase): SessionPhase {
    if (this.transforming) {
      throw GatewayError.invalidPhaseTransition(
        this.current.status,
        '<re-entrant transform>',
      );
    }

    const from = this.current;
    let to: SessionPhase;
    this.transforming = true;
    try {
      to = f(from);
    } finally {
      this.transforming = false;
    }

    if (to === from) {
      return from;
    }
    if (!ALLOWED[from.status].includes(to.status)) {
      throw GatewayError.invalidPhaseTransition(from.status, to.status);
    }
    this.current = to;
    this.onChange?.({ from: from.status, to: to.status });
    return to;
  }
}
