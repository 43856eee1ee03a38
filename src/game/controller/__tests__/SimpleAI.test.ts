/**
 * SimpleAI.test.ts
 */

import { makeAIDecision, createSimpleAgent, AI_STYLES } from '../SimpleAI';
import { ActionPrompt } from '../ActionProvider';
import { TableEngine } from '../../engine/GameLoop';

function engineWith(stacks: number[]): TableEngine {
  const engine = new TableEngine();
  const ids = ['a', 'b', 'c'];
  stacks.forEach((stack, i) => engine.seatPlayer({ id: ids[i], stack }));
  engine.startHand();
  return engine;
}

function promptFor(engine: TableEngine): ActionPrompt {
  const playerId = engine.getCurrentActorId();
  if (!playerId) throw new Error('nobody to act');
  return {
    playerId,
    snapshot: engine.getSnapshot(playerId),
    validActions: engine.getValidActions(),
    lastError: null,
    signal: new AbortController().signal,
  };
}

const always = (value: number) => () => value;

describe('makeAIDecision', () => {
  test('checks when nothing is owed and it does not bet', () => {
    const engine = engineWith([1000, 1000]);
    engine.act({ playerId: 'a', type: 'call' });

    expect(makeAIDecision(promptFor(engine), AI_STYLES.neutral, always(0.99))).toEqual({ type: 'check' });
  });

  test('bets within the legal range', () => {
    const engine = engineWith([1000, 1000]);
    engine.act({ playerId: 'a', type: 'call' });

    // pot 40, factor 0.5: raise to 20 + 20
    expect(makeAIDecision(promptFor(engine), AI_STYLES.neutral, always(0))).toEqual({ type: 'raise', amount: 40 });
  });

  test('raise size is clamped to the stack', () => {
    const engine = engineWith([1000, 50]);
    engine.act({ playerId: 'a', type: 'call' });

    expect(makeAIDecision(promptFor(engine), AI_STYLES.aggressive, always(0.999))).toEqual({ type: 'check' });

    // factor 0.8 wants 20 + 32, the stack allows 50
    expect(makeAIDecision(promptFor(engine), AI_STYLES.aggressive, always(0.3))).toEqual({ type: 'raise', amount: 50 });
  });

  test('calls a small bet with good odds', () => {
    const engine = engineWith([1000, 1000, 1000]);
    expect(makeAIDecision(promptFor(engine), AI_STYLES.neutral, always(0.99))).toEqual({ type: 'call' });
  });

  test('folds when the call is too large a share of the stack', () => {
    const engine = engineWith([30, 1000]);
    const prompt = promptFor(engine);

    expect(prompt.validActions.callAmount).toBe(10);
    expect(makeAIDecision(prompt, AI_STYLES.passive, always(0.99))).toEqual({ type: 'fold' });
    expect(makeAIDecision(prompt, AI_STYLES.neutral, always(0.99))).toEqual({ type: 'call' });
  });

  test('only picks actions it is offered', () => {
    const engine = engineWith([1000, 1000, 1000]);
    const prompt = promptFor(engine);
    for (const value of [0, 0.1, 0.3, 0.5, 0.9]) {
      const decision = makeAIDecision(prompt, AI_STYLES.aggressive, always(value));
      if (decision.type === 'raise') {
        expect(decision.amount).toBeGreaterThanOrEqual(prompt.validActions.minRaiseTo);
        expect(decision.amount).toBeLessThanOrEqual(prompt.validActions.maxRaiseTo);
      } else {
        expect(['call', 'fold']).toContain(decision.type);
      }
    }
  });
});

describe('createSimpleAgent', () => {
  test('answers asynchronously', async () => {
    const engine = engineWith([1000, 1000]);
    engine.act({ playerId: 'a', type: 'call' });

    await expect(createSimpleAgent('passive', always(0.99)).requestAction(promptFor(engine)))
      .resolves.toEqual({ type: 'check' });
  });
});
