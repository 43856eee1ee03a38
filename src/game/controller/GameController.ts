/**
 * GameController.ts
 * Async hand and session runners
 *
 * Asks each actor's provider for a decision, feeds it to the engine and
 * repeats until the hand completes. Illegal answers are re-prompted with
 * the rejection attached.
 */

import { TableEngine, HandResult } from '../engine/GameLoop';
import { IllegalActionError, EngineErrors, isRecoverableError } from '../engine/EngineErrors';
import { TimeoutPolicy } from '../config/TableConfig';
import { ActionDecision, ActionPrompt, ActionProvider } from './ActionProvider';

// ============================================================================
// Types
// ============================================================================

export type ActionProviders = ReadonlyMap<string, ActionProvider>;

export interface PlayHandOptions {
  /** Defaults to the table config */
  readonly actionTimeoutMs?: number;
  readonly timeoutPolicy?: TimeoutPolicy;
}

export interface PlaySessionOptions extends PlayHandOptions {
  /** Stop after this many hands; unlimited when omitted */
  readonly maxHands?: number;
  readonly onHandComplete?: (result: HandResult) => void;
}

export interface SessionResult {
  readonly hands: readonly HandResult[];
  readonly finalStacks: ReadonlyMap<string, number>;
  /** Set when a single seat holds every chip */
  readonly winnerId: string | null;
}

// ============================================================================
// Hand Runner
// ============================================================================

/**
 * Play one hand to completion
 */
export async function playHand(
  engine: TableEngine,
  providers: ActionProviders,
  options: PlayHandOptions = {}
): Promise<HandResult> {
  const config = engine.getConfig();
  const actionTimeoutMs = options.actionTimeoutMs ?? config.actionTimeoutMs;
  const timeoutPolicy = options.timeoutPolicy ?? config.timeoutPolicy;

  for (const seat of engine.getSeats()) {
    if (seat.stack > 0 && !seat.sittingOut && !providers.has(seat.id)) {
      throw EngineErrors.tableSetup(`No action provider for player ${seat.id}`, { playerId: seat.id });
    }
  }

  const handId = engine.startHand();
  let lastError: IllegalActionError | null = null;

  try {
    while (engine.isHandInProgress()) {
      const playerId = engine.getCurrentActorId();
      const provider = playerId ? providers.get(playerId) : undefined;
      if (!playerId || !provider) {
        throw EngineErrors.tableSetup(`Hand ${handId} is waiting on nobody`);
      }

      const decision = await requestWithTimeout(
        provider,
        signal => ({
          playerId,
          snapshot: engine.getSnapshot(playerId),
          validActions: engine.getValidActions(),
          lastError,
          signal,
        }),
        actionTimeoutMs
      );

      if (decision === null) {
        if (timeoutPolicy === 're-prompt') {
          console.warn(`${playerId} did not act within ${actionTimeoutMs}ms, asking again`);
          continue;
        }
        console.warn(`${playerId} did not act within ${actionTimeoutMs}ms, folding`);
      }

      try {
        engine.act({ playerId, ...(decision ?? { type: 'fold' }) });
        lastError = null;
      } catch (error) {
        if (!isRecoverableError(error)) {
          throw error;
        }
        console.warn(`Rejected action from ${playerId}: ${error.message}`);
        lastError = error;
      }
    }
  } catch (error) {
    engine.abortHand(error);
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Hand ${handId} aborted: ${message}`);
    throw error;
  }

  const result = engine.getLastHandResult();
  if (!result || result.handId !== handId) {
    throw EngineErrors.tableSetup(`Hand ${handId} ended without a result`);
  }
  return result;
}

// ============================================================================
// Session Runner
// ============================================================================

/**
 * Play hands until one seat holds all the chips or `maxHands` is reached.
 * Busted seats are sat out between hands.
 */
export async function playSession(
  engine: TableEngine,
  providers: ActionProviders,
  options: PlaySessionOptions = {}
): Promise<SessionResult> {
  const hands: HandResult[] = [];
  const minPlayers = Math.max(2, engine.getConfig().minPlayers);

  while (options.maxHands === undefined || hands.length < options.maxHands) {
    for (const seat of engine.getSeats()) {
      if (seat.stack === 0 && !seat.sittingOut) {
        engine.setSittingOut(seat.id, true);
      }
    }

    const withChips = engine.getSeats().filter(s => s.stack > 0 && !s.sittingOut);
    if (withChips.length < minPlayers) {
      break;
    }

    const result = await playHand(engine, providers, options);
    hands.push(result);
    options.onHandComplete?.(result);
  }

  const seats = engine.getSeats();
  const holders = seats.filter(s => s.stack > 0);

  return {
    hands,
    finalStacks: new Map(seats.map(s => [s.id, s.stack] as const)),
    winnerId: holders.length === 1 ? holders[0].id : null,
  };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Resolves to null when the timeout expires first
 */
async function requestWithTimeout(
  provider: ActionProvider,
  buildPrompt: (signal: AbortSignal) => ActionPrompt,
  timeoutMs: number
): Promise<ActionDecision | null> {
  const controller = new AbortController();
  const prompt = buildPrompt(controller.signal);

  if (timeoutMs <= 0) {
    return provider.requestAction(prompt);
  }

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<null>(resolve => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(null);
    }, timeoutMs);
  });

  try {
    return await Promise.race([provider.requestAction(prompt), expired]);
  } finally {
    clearTimeout(timer);
  }
}
