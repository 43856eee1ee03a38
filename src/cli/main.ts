#!/usr/bin/env node
/**
 * main.ts
 * Console front end: humans and rule-based bots at one table
 */

import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';

import { TableEngine } from '../game/engine/GameLoop';
import { ValidActions } from '../game/engine/BettingRound';
import { tableConfigFromEnv, MAX_TABLE_PLAYERS } from '../game/config/TableConfig';
import { ActionDecision, ActionPrompt, ActionProvider } from '../game/controller/ActionProvider';
import { createSimpleAgent, AIStyle } from '../game/controller/SimpleAI';
import { playSession } from '../game/controller/GameController';
import { formatHistoryEvent } from '../game/controller/HandHistory';
import { parseActionInput, ACTION_INPUT_HELP } from './parseActionInput';
import { renderTable } from './renderTable';

const DEFAULT_STARTING_STACK = 1000;
const BOT_STYLES: readonly AIStyle[] = ['neutral', 'aggressive', 'passive'];

// ============================================================================
// Human Provider
// ============================================================================

function describeValidActions(valid: ValidActions): string {
  const options: string[] = ['fold'];
  if (valid.canCheck) options.push('check');
  if (valid.canCall) options.push(`call ${valid.callAmount}`);
  if (valid.canRaise) options.push(`raise ${valid.minRaiseTo}-${valid.maxRaiseTo}`);
  if (valid.canAllIn) options.push(`all-in ${valid.allInAmount}`);
  return options.join(' | ');
}

/**
 * Prompts on the terminal until the line parses
 */
export function createConsoleProvider(rl: readline.Interface): ActionProvider {
  return {
    async requestAction(prompt: ActionPrompt): Promise<ActionDecision> {
      console.log('');
      console.log(renderTable(prompt.snapshot));
      if (prompt.lastError) {
        console.log(`Rejected: ${prompt.lastError.message}`);
      }
      console.log(`Options: ${describeValidActions(prompt.validActions)}`);
      console.log(`Type: ${ACTION_INPUT_HELP}`);

      for (;;) {
        const line = await rl.question(`${prompt.playerId}> `, { signal: prompt.signal });
        const parsed = parseActionInput(line);
        if (parsed.valid) {
          return parsed.decision;
        }
        console.log(parsed.error);
      }
    },
  };
}

// ============================================================================
// Setup
// ============================================================================

async function askCount(
  rl: readline.Interface,
  question: string,
  min: number,
  max: number
): Promise<number> {
  for (;;) {
    const answer = (await rl.question(`${question} (${min}-${max}): `)).trim();
    const value = Number(answer);
    if (/^\d+$/.test(answer) && value >= min && value <= max) {
      return value;
    }
    console.log(`Please enter a whole number from ${min} to ${max}`);
  }
}

function readStartingStack(env: NodeJS.ProcessEnv): number {
  const raw = env.HOLDEM_STARTING_STACK;
  if (!raw) return DEFAULT_STARTING_STACK;
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new Error(`HOLDEM_STARTING_STACK has invalid value '${raw}'`);
  }
  return Number(raw);
}

// ============================================================================
// Entry Point
// ============================================================================

export async function main(): Promise<void> {
  const config = tableConfigFromEnv();
  const startingStack = readStartingStack(process.env);
  const rl = readline.createInterface({ input, output });

  try {
    const maxPlayers = Math.min(config.maxPlayers, MAX_TABLE_PLAYERS);
    const humans = await askCount(rl, 'Human players', 0, maxPlayers);
    const minBots = Math.max(0, Math.max(2, config.minPlayers) - humans);
    const bots = await askCount(rl, 'Computer players', minBots, maxPlayers - humans);

    const engine = new TableEngine(config);
    const providers = new Map<string, ActionProvider>();
    const names = new Map<string, string>();
    const humanProvider = createConsoleProvider(rl);

    for (let i = 1; i <= humans; i++) {
      const id = `human-${i}`;
      engine.seatPlayer({ id, name: `Player ${i}`, stack: startingStack });
      providers.set(id, humanProvider);
      names.set(id, `Player ${i}`);
    }
    for (let i = 1; i <= bots; i++) {
      const id = `bot-${i}`;
      engine.seatPlayer({ id, name: `Bot ${i}`, stack: startingStack });
      providers.set(id, createSimpleAgent(BOT_STYLES[(i - 1) % BOT_STYLES.length]));
      names.set(id, `Bot ${i}`);
    }

    engine.onEvent(event => {
      const line = formatHistoryEvent(event, names);
      if (line) console.log(line);
    });

    const result = await playSession(engine, providers);

    console.log('');
    console.log(`Session over after ${result.hands.length} hands`);
    for (const [id, stack] of result.finalStacks) {
      console.log(`  ${names.get(id) ?? id}: ${stack}`);
    }
    if (result.winnerId) {
      console.log(`${names.get(result.winnerId) ?? result.winnerId} wins the table`);
    }
  } finally {
    rl.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
