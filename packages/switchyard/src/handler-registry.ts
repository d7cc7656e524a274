/**
 * Handler Registry
 *
 * Priority-ordered handler lists keyed by event or by transition.
 * Lists stay sorted on insert (lower priority first, ties in insertion
 * order), so dispatch only has to merge the lists that apply.
 */

import type { Equality } from './equality.js';
import { KeyedMap } from './keyed-map.js';
import type { HandlerInfo } from './types.js';

/**
 * Insert after every entry whose priority is lower or equal
 */
export const insertHandler = <S, E>(list: HandlerInfo<S, E>[], info: HandlerInfo<S, E>): void => {
  let index = list.length;
  while (index > 0 && list[index - 1].priority > info.priority) {
    index--;
  }
  list.splice(index, 0, info);
};

/**
 * Remove the entry with `id` and mark it inactive
 * @returns true if an entry was removed
 */
export const removeHandler = <S, E>(list: HandlerInfo<S, E>[], id: number): boolean => {
  const index = list.findIndex((info) => info.id === id);
  if (index === -1) {
    return false;
  }
  const [removed] = list.splice(index, 1);
  removed.active = false;
  return true;
};

/**
 * Concatenate lists and stable-sort by priority.
 * Equal priorities keep their list order, then their order within a list.
 */
export const mergeByPriority = <S, E>(
  lists: ReadonlyArray<readonly HandlerInfo<S, E>[] | undefined>
): HandlerInfo<S, E>[] => {
  const merged: HandlerInfo<S, E>[] = [];
  for (const list of lists) {
    if (list) {
      merged.push(...list);
    }
  }
  return merged.sort((a, b) => a.priority - b.priority);
};

/**
 * Handler lists keyed by K (an event identity or a transition)
 */
export class HandlerRegistry<K, S, E = never> {
  private lists: KeyedMap<K, HandlerInfo<S, E>[]>;

  constructor(equality: Equality<K>) {
    this.lists = new KeyedMap(equality);
  }

  /**
   * @returns the size of the list after insertion
   */
  add(key: K, info: HandlerInfo<S, E>): number {
    const list = this.lists.ensure(key, () => []);
    insertHandler(list, info);
    return list.length;
  }

  remove(key: K, id: number): boolean {
    const list = this.lists.get(key);
    if (!list || !removeHandler(list, id)) {
      return false;
    }
    if (list.length === 0) {
      this.lists.delete(key);
    }
    return true;
  }

  get(key: K): readonly HandlerInfo<S, E>[] | undefined {
    return this.lists.get(key);
  }

  /**
   * Merged, priority-sorted snapshot of the lists under `keys`
   */
  collect(keys: readonly K[]): HandlerInfo<S, E>[] {
    return mergeByPriority(keys.map((key) => this.lists.get(key)));
  }

  count(): number {
    let total = 0;
    for (const list of this.lists.values()) {
      total += list.length;
    }
    return total;
  }

  clear(): void {
    for (const list of this.lists.values()) {
      for (const info of list) {
        info.active = false;
      }
    }
    this.lists.clear();
  }
}
