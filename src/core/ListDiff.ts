/**
 * Snapshot diffing.
 *
 * Sections are matched by id, items by id across the whole list. A surviving
 * element is reported as moved only when it changed section, or when it is
 * not part of the longest run of survivors that kept their relative order.
 * Every item that appears or disappears is reported, including the items of
 * inserted and deleted sections, so a transaction can be replayed on the
 * previous snapshot alone (see `applyTransaction`).
 */

import type { IndexPath, ItemMove, ListTransaction, SectionMove } from '../types';
import { ComponentError } from './errors';
import { ListSnapshot } from './ListSnapshot';
import type { SnapshotSection } from './ListSnapshot';

export function emptyTransaction(): ListTransaction {
  return {
    deletedSections: [],
    insertedSections: [],
    movedSections: [],
    deletedItems: [],
    insertedItems: [],
    movedItems: []
  };
}

export function isEmptyTransaction(transaction: ListTransaction): boolean {
  return (
    transaction.deletedSections.length === 0 &&
    transaction.insertedSections.length === 0 &&
    transaction.movedSections.length === 0 &&
    transaction.deletedItems.length === 0 &&
    transaction.insertedItems.length === 0 &&
    transaction.movedItems.length === 0
  );
}

export function diffSnapshots(previous: ListSnapshot, next: ListSnapshot): ListTransaction {
  const transaction = emptyTransaction();

  const previousSections = previous.sectionIds;
  const nextSections = next.sectionIds;

  previousSections.forEach((id, index) => {
    if (!next.hasSection(id)) {
      transaction.deletedSections.push({ id, index });
    }
  });

  nextSections.forEach((id, index) => {
    if (!previous.hasSection(id)) {
      transaction.insertedSections.push({ id, index });
    }
  });

  const survivingSections = nextSections.filter(id => previous.hasSection(id));
  transaction.movedSections = findMoves(
    survivingSections,
    id => previous.indexOfSection(id)
  ).map<SectionMove>(id => ({
    id,
    from: previous.indexOfSection(id),
    to: next.indexOfSection(id)
  }));

  for (const sectionId of previousSections) {
    previous.itemIds(sectionId).forEach(id => {
      if (!next.hasItem(id)) {
        transaction.deletedItems.push({ id, at: requireIndexPath(previous, id) });
      }
    });
  }

  for (const sectionId of nextSections) {
    const itemIds = next.itemIds(sectionId);

    itemIds.forEach(id => {
      if (!previous.hasItem(id)) {
        transaction.insertedItems.push({ id, at: requireIndexPath(next, id) });
      } else if (previous.sectionOf(id) !== sectionId) {
        transaction.movedItems.push(itemMove(previous, next, id));
      }
    });

    if (!previous.hasSection(sectionId)) continue;

    const previousOrder = previous.itemIds(sectionId);
    const stayed = itemIds.filter(id => previous.sectionOf(id) === sectionId);
    for (const id of findMoves(stayed, itemId => previousOrder.indexOf(itemId))) {
      transaction.movedItems.push(itemMove(previous, next, id));
    }
  }

  return transaction;
}

/**
 * Replays a transaction on the snapshot it was computed from.
 */
export function applyTransaction(previous: ListSnapshot, transaction: ListTransaction): ListSnapshot {
  const movedSectionIds = new Set(transaction.movedSections.map(move => move.id));
  const deletedSectionIds = new Set(transaction.deletedSections.map(change => change.id));

  const removedItemIds = new Set([
    ...transaction.deletedItems.map(change => change.id),
    ...transaction.movedItems.map(move => move.id)
  ]);

  const sectionOrder = placeInOrder(
    previous.sectionIds.filter(id => !deletedSectionIds.has(id) && !movedSectionIds.has(id)),
    [
      ...transaction.insertedSections.map(change => ({ id: change.id, index: change.index })),
      ...transaction.movedSections.map(move => ({ id: move.id, index: move.to }))
    ]
  );

  const placedItems: Array<{ id: string; at: IndexPath }> = [
    ...transaction.insertedItems,
    ...transaction.movedItems.map(move => ({ id: move.id, at: move.to }))
  ];

  const sections: SnapshotSection[] = sectionOrder.map((sectionId, sectionIndex) => {
    const kept = previous.hasSection(sectionId)
      ? previous.itemIds(sectionId).filter(id => !removedItemIds.has(id))
      : [];
    const placed = placedItems
      .filter(entry => entry.at.section === sectionIndex)
      .map(entry => ({ id: entry.id, index: entry.at.item }));
    return { id: sectionId, itemIds: placeInOrder(kept, placed) };
  });

  return ListSnapshot.fromJSON(sections);
}

/**
 * Indices (into `sequence`) of one longest strictly increasing subsequence.
 */
export function longestIncreasingSubsequence(sequence: ReadonlyArray<number>): number[] {
  // tails[k]: index of the smallest tail of an increasing run of length k + 1
  const tails: number[] = [];
  const predecessors: number[] = new Array(sequence.length).fill(-1);

  sequence.forEach((value, index) => {
    let low = 0;
    let high = tails.length;
    while (low < high) {
      const mid = (low + high) >> 1;
      if (sequence[tails[mid]] < value) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    if (low > 0) {
      predecessors[index] = tails[low - 1];
    }
    tails[low] = index;
  });

  const result: number[] = [];
  let cursor = tails.length > 0 ? tails[tails.length - 1] : -1;
  while (cursor !== -1) {
    result.push(cursor);
    cursor = predecessors[cursor];
  }
  return result.reverse();
}

/** Ids of `ordered` that fall outside the longest run kept in previous order. */
function findMoves(ordered: ReadonlyArray<string>, previousIndex: (id: string) => number): string[] {
  const stable = new Set(
    longestIncreasingSubsequence(ordered.map(previousIndex)).map(index => ordered[index])
  );
  return ordered.filter(id => !stable.has(id));
}

function itemMove(previous: ListSnapshot, next: ListSnapshot, id: string): ItemMove {
  return { id, from: requireIndexPath(previous, id), to: requireIndexPath(next, id) };
}

function requireIndexPath(snapshot: ListSnapshot, id: string): IndexPath {
  const indexPath = snapshot.indexPathOf(id);
  if (!indexPath) {
    throw new ComponentError('UNKNOWN_ITEM', `Item not in snapshot: ${id}`);
  }
  return indexPath;
}

/** Puts each placed id at its final index and fills the gaps with `kept`, in order. */
function placeInOrder(kept: ReadonlyArray<string>, placed: ReadonlyArray<{ id: string; index: number }>): string[] {
  const result: Array<string | undefined> = new Array(kept.length + placed.length).fill(undefined);
  for (const entry of placed) {
    result[entry.index] = entry.id;
  }
  let cursor = 0;
  return result.map(id => {
    if (id !== undefined) return id;
    return kept[cursor++];
  });
}
