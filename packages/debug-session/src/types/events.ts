import type { ExitVerdict } from '@dap-gateway/models';
import type { PhaseChange } from './session-phase.js';

// Event-driven session events with Emittery
export interface DebugSessionEvents {
  phaseChanged: PhaseChange;
  endOfConnection: undefined;
  exitVerdict: ExitVerdict;
}
