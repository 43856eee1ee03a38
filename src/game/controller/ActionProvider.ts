/**
 * ActionProvider.ts
 * How the hand controller asks humans and bots for decisions
 */

import { ActionRequest, ValidActions } from '../engine/BettingRound';
import { IllegalActionError } from '../engine/EngineErrors';
import { TableSnapshot } from '../engine/Snapshot';

/**
 * An action without the acting player's id; the controller fills it in
 */
export type ActionDecision = Omit<ActionRequest, 'playerId'>;

export interface ActionPrompt {
  readonly playerId: string;
  /** The table as the acting player sees it */
  readonly snapshot: TableSnapshot;
  readonly validActions: ValidActions;
  /** Why the previous answer was rejected, if it was */
  readonly lastError: IllegalActionError | null;
  /** Aborted when the action timeout expires */
  readonly signal: AbortSignal;
}

export interface ActionProvider {
  requestAction(prompt: ActionPrompt): Promise<ActionDecision>;
}
