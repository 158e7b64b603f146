export interface Item {
  readonly id: number;
  readonly name: string;
  readonly price: number;
  readonly deleted: boolean;
}

/** A row to seed or insert; `id` is assigned by the store when omitted. */
export interface ItemSeed {
  readonly id?: number;
  readonly name: string;
  readonly price: number;
  readonly deleted?: boolean;
}

/** `price >= minPrice AND deleted = deleted` */
export interface CountPredicate {
  readonly minPrice: number;
  readonly deleted?: boolean;
}

export function matchesPredicate(item: Item, predicate: CountPredicate): boolean {
  return item.price >= predicate.minPrice && item.deleted === (predicate.deleted ?? false);
}

export function describePredicate(predicate: CountPredicate): string {
  return `price >= ${predicate.minPrice} AND deleted = ${predicate.deleted ?? false}`;
}
