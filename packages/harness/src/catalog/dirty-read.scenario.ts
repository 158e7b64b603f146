import type { IsolationLevel, ScenarioDefinition } from '@anomaly-lab/domain';

const ITEM_ID = 1;
const COMMITTED_PRICE = 150;
const UNCOMMITTED_DELTA = 50;

function dirtyRead(id: string, readerLevel: IsolationLevel): ScenarioDefinition {
  return {
    id,
    title: `Dirty read attempt, reader at ${readerLevel}`,
    description:
      'A raises the price of item 1 without committing and keeps its transaction open; ' +
      'B reads the row meanwhile, then A rolls back. READ UNCOMMITTED is served as ' +
      'READ COMMITTED, so B can only ever see the committed price.',
    fixture: { rows: [{ id: ITEM_ID, name: 'Apple', price: COMMITTED_PRICE }] },
    actors: [
      { role: 'A', isolationLevel: 'READ_COMMITTED' },
      { role: 'B', isolationLevel: readerLevel },
    ],
    steps: [
      { actor: 'A', action: 'BEGIN' },
      { actor: 'A', action: 'UPDATE', itemId: ITEM_ID, delta: UNCOMMITTED_DELTA },
      { actor: 'A', action: 'SLEEP', durationMs: 5_000 },
      { actor: 'B', action: 'BEGIN' },
      { actor: 'B', action: 'READ', itemId: ITEM_ID, label: 'concurrent-read' },
      { actor: 'B', action: 'COMMIT' },
      { actor: 'A', action: 'ROLLBACK' },
    ],
    observe: { itemId: ITEM_ID },
    assertion: {
      description: `B reads the committed price ${COMMITTED_PRICE}, never the uncommitted ${COMMITTED_PRICE + UNCOMMITTED_DELTA}`,
      evaluate: (view) =>
        view.valueOf('concurrent-read') === COMMITTED_PRICE && view.final?.price === COMMITTED_PRICE,
    },
  };
}

export const dirtyReadScenario = dirtyRead('dirty-read', 'READ_COMMITTED');

export const dirtyReadReadUncommittedScenario = dirtyRead(
  'dirty-read-read-uncommitted',
  'READ_UNCOMMITTED',
);
