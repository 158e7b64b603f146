import { describePredicate } from '@anomaly-lab/domain';
import type {
  CountPredicate,
  FixtureSpec,
  IsolationLevel,
  ScenarioDefinition,
  ScenarioStep,
} from '@anomaly-lab/domain';

export const PHANTOM_PREDICATE: CountPredicate = { minPrice: 50 };

/** Three rows match the predicate; the last two miss it on price and on `deleted`. */
const PHANTOM_FIXTURE: FixtureSpec = {
  rows: [
    { id: 1, name: 'widget', price: 100 },
    { id: 2, name: 'gadget', price: 75 },
    { id: 3, name: 'gizmo', price: 50 },
    { id: 4, name: 'trinket', price: 10 },
    { id: 5, name: 'relic', price: 120, deleted: true },
  ],
};

const INSERTED_ROWS = 1;

function phantomSteps(insertedName: string): ScenarioStep[] {
  return [
    { actor: 'A', action: 'BEGIN' },
    { actor: 'A', action: 'COUNT', predicate: PHANTOM_PREDICATE, label: 'first-count' },
    { actor: 'A', action: 'SLEEP', durationMs: 2_000 },
    { actor: 'B', action: 'BEGIN' },
    { actor: 'B', action: 'INSERT', row: { name: insertedName, price: 100 } },
    { actor: 'B', action: 'COMMIT' },
    { actor: 'A', action: 'COUNT', predicate: PHANTOM_PREDICATE, label: 'second-count' },
    { actor: 'A', action: 'COMMIT', label: 'reader-commit' },
  ];
}

function actors(readerLevel: IsolationLevel): ScenarioDefinition['actors'] {
  return [
    { role: 'A', isolationLevel: readerLevel },
    { role: 'B', isolationLevel: 'READ_COMMITTED' },
  ];
}

export const phantomReadScenario: ScenarioDefinition = {
  id: 'phantom-read',
  title: 'Phantom read under READ COMMITTED',
  description:
    `A counts rows where ${describePredicate(PHANTOM_PREDICATE)}, B inserts a matching row ` +
    'and commits, A counts again and sees the extra row.',
  fixture: PHANTOM_FIXTURE,
  actors: actors('READ_COMMITTED'),
  steps: phantomSteps('phantom-1'),
  assertion: {
    description: `A's second count exceeds the first by the inserted rows (${INSERTED_ROWS})`,
    evaluate: (view) => {
      const first = view.valueOf('first-count');
      const second = view.valueOf('second-count');
      return first !== undefined && second !== undefined && second - first === INSERTED_ROWS;
    },
  },
};

export const serializableNoPhantomScenario: ScenarioDefinition = {
  id: 'serializable-no-phantom',
  title: 'No phantom under SERIALIZABLE',
  description:
    'Same interleaving with A at SERIALIZABLE. Either both counts agree and A commits, ' +
    'or the store rejects A\'s commit with a serialization failure.',
  fixture: PHANTOM_FIXTURE,
  actors: actors('SERIALIZABLE'),
  steps: phantomSteps('serial-1'),
  assertion: {
    description:
      "A's counts are equal and its commit succeeds, or its commit fails with SerializationFailure",
    evaluate: (view) => {
      const commit = view.outcomeOf('reader-commit');
      if (commit === undefined) return false;
      if (commit.status === 'error') return commit.kind === 'SerializationFailure';
      const first = view.valueOf('first-count');
      return first !== undefined && view.valueOf('second-count') === first;
    },
  },
};
