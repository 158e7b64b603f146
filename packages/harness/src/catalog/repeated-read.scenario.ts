import type { IsolationLevel, ScenarioDefinition } from '@anomaly-lab/domain';

const WRITER_DELTA = 1;

interface RepeatedReadOptions {
  id: string;
  title: string;
  description: string;
  readerLevel: IsolationLevel;
  item: { id: number; name: string; price: number };
  assertion: ScenarioDefinition['assertion'];
}

/** A reads one row twice; B changes it and commits in between. */
function repeatedRead(opts: RepeatedReadOptions): ScenarioDefinition {
  const itemId = opts.item.id;
  return {
    id: opts.id,
    title: opts.title,
    description: opts.description,
    fixture: { rows: [opts.item] },
    actors: [
      { role: 'A', isolationLevel: opts.readerLevel },
      { role: 'B', isolationLevel: 'READ_COMMITTED' },
    ],
    steps: [
      { actor: 'A', action: 'BEGIN' },
      { actor: 'A', action: 'READ', itemId, label: 'first-read' },
      { actor: 'A', action: 'SLEEP', durationMs: 2_000 },
      { actor: 'B', action: 'BEGIN' },
      { actor: 'B', action: 'UPDATE', itemId, delta: WRITER_DELTA },
      { actor: 'B', action: 'COMMIT' },
      { actor: 'A', action: 'READ', itemId, label: 'second-read' },
      { actor: 'A', action: 'COMMIT' },
    ],
    observe: { itemId },
    assertion: opts.assertion,
  };
}

export const nonRepeatableReadScenario = repeatedRead({
  id: 'non-repeatable-read',
  title: 'Non-repeatable read under READ COMMITTED',
  description:
    'A reads the price of item 1, B adds 1 and commits, A reads again inside the same ' +
    'transaction and sees the new value.',
  readerLevel: 'READ_COMMITTED',
  item: { id: 1, name: 'Apple', price: 150 },
  assertion: {
    description: `A's second read exceeds the first by B's delta (${WRITER_DELTA})`,
    evaluate: (view) => {
      const first = view.valueOf('first-read');
      const second = view.valueOf('second-read');
      return first !== undefined && second !== undefined && second - first === WRITER_DELTA;
    },
  },
});

export const repeatableReadScenario = repeatedRead({
  id: 'repeatable-read-no-anomaly',
  title: 'No non-repeatable read under REPEATABLE READ',
  description:
    'Same interleaving with A at REPEATABLE READ: both reads come from the snapshot taken ' +
    "by A's first statement, although B's change is committed.",
  readerLevel: 'REPEATABLE_READ',
  item: { id: 100, name: 'rr-demo', price: 50 },
  assertion: {
    description: "A's two reads are equal",
    evaluate: (view) => {
      const first = view.valueOf('first-read');
      return first !== undefined && view.valueOf('second-read') === first;
    },
  },
});
