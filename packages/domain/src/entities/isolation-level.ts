export type IsolationLevel =
  | 'READ_UNCOMMITTED'
  | 'READ_COMMITTED'
  | 'REPEATABLE_READ'
  | 'SERIALIZABLE';

/** Weakest first. */
export const ISOLATION_LEVELS: readonly IsolationLevel[] = [
  'READ_UNCOMMITTED',
  'READ_COMMITTED',
  'REPEATABLE_READ',
  'SERIALIZABLE',
];

const SQL_SPELLING: Record<IsolationLevel, string> = {
  READ_UNCOMMITTED: 'READ UNCOMMITTED',
  READ_COMMITTED: 'READ COMMITTED',
  REPEATABLE_READ: 'REPEATABLE READ',
  SERIALIZABLE: 'SERIALIZABLE',
};

export function isolationLevelSql(level: IsolationLevel): string {
  return SQL_SPELLING[level];
}

export function isolationRank(level: IsolationLevel): number {
  return ISOLATION_LEVELS.indexOf(level);
}

/** True when the level keeps one snapshot for the whole transaction. */
export function usesTransactionSnapshot(level: IsolationLevel): boolean {
  return isolationRank(level) >= isolationRank('REPEATABLE_READ');
}
