import { SectionedListReconciler } from '../SectionedListReconciler';
import { DuplicateItemError, IndexOutOfRangeError } from '../errors';
import { applyTransaction, emptyTransaction, isEmptyTransaction } from '../ListDiff';
import { ListSnapshot } from '../ListSnapshot';
import type { ListItem, ListSection } from '../../types';

const item = (id: string): ListItem => ({ id, title: id.toUpperCase() });

const stored = (...ids: string[]): ListSection => ({
  id: 'stored',
  header: { title: 'Stored cards', editingStyle: 'delete' },
  items: ids.map(item)
});

const regular = (...ids: string[]): ListSection => ({
  id: 'regular',
  header: { title: 'Pay with', editingStyle: 'none' },
  items: ids.map(item)
});

describe('SectionedListReconciler', () => {
  let onTransaction: jest.Mock;
  let onEditingChange: jest.Mock;
  let list: SectionedListReconciler;

  beforeEach(() => {
    onTransaction = jest.fn();
    onEditingChange = jest.fn();
    list = new SectionedListReconciler({ onTransaction, onEditingChange });
  });

  describe('reload', () => {
    it('drops empty sections', () => {
      const transaction = list.reload([
        { id: 'a', items: [] },
        { id: 'b', items: [item('x'), item('y')] }
      ]);

      expect(list.numberOfSections).toBe(1);
      expect(list.rowCount(0)).toBe(2);
      expect(list.section(0).id).toBe('b');
      expect(transaction.insertedSections).toEqual([{ id: 'b', index: 0 }]);
      expect(transaction.insertedItems).toEqual([
        { id: 'x', at: { section: 0, item: 0 } },
        { id: 'y', at: { section: 0, item: 1 } }
      ]);
      expect(transaction.deletedSections).toEqual([]);
    });

    it('drops empty sections before checking section ids', () => {
      const transaction = list.reload([
        { id: 'x', items: [] },
        { id: 'x', items: [item('a')] }
      ]);

      expect(list.numberOfSections).toBe(1);
      expect(list.section(0).items).toEqual([item('a')]);
      expect(transaction.insertedSections).toEqual([{ id: 'x', index: 0 }]);
      expect(transaction.insertedItems).toEqual([{ id: 'a', at: { section: 0, item: 0 } }]);
    });

    it('hands each transaction to the listener', () => {
      const transaction = list.reload([regular('ideal')]);

      expect(onTransaction).toHaveBeenCalledTimes(1);
      expect(onTransaction).toHaveBeenCalledWith(transaction);
    });

    it('reports swapped sections as a section move only', () => {
      list.reload([
        { id: 'A', items: [item('x'), item('y')] },
        { id: 'B', items: [item('z')] }
      ]);

      const transaction = list.reload([
        { id: 'B', items: [item('z')] },
        { id: 'A', items: [item('x'), item('y')] }
      ]);

      expect(transaction.movedSections).toEqual([{ id: 'B', from: 1, to: 0 }]);
      expect(transaction.insertedSections).toEqual([]);
      expect(transaction.deletedSections).toEqual([]);
      expect(transaction.insertedItems).toEqual([]);
      expect(transaction.deletedItems).toEqual([]);
      expect(transaction.movedItems).toEqual([]);
    });

    it('produces an empty transaction when reloaded with the same input', () => {
      const input = [stored('card-1', 'card-2'), regular('ideal')];

      list.reload(input);
      const transaction = list.reload(input);

      expect(isEmptyTransaction(transaction)).toBe(true);
      expect(transaction).toEqual(emptyTransaction());
    });

    it('moves an item between sections', () => {
      list.reload([stored('card-1', 'card-2'), regular('ideal')]);

      const transaction = list.reload([stored('card-2'), regular('card-1', 'ideal')]);

      expect(transaction.movedItems).toEqual([
        { id: 'card-1', from: { section: 0, item: 0 }, to: { section: 1, item: 0 } }
      ]);
      expect(transaction.insertedItems).toEqual([]);
      expect(transaction.deletedItems).toEqual([]);
    });

    it('rejects duplicate item ids and keeps the committed list', () => {
      list.reload([regular('ideal')]);

      expect(() => list.reload([stored('card-1'), regular('card-1')])).toThrow(DuplicateItemError);
      expect(list.numberOfSections).toBe(1);
      expect(list.item({ section: 0, item: 0 }).id).toBe('ideal');
      expect(onTransaction).toHaveBeenCalledTimes(1);
    });

    it('does not keep references to the caller arrays', () => {
      const section = stored('card-1');
      list.reload([section]);

      section.items.push(item('card-2'));

      expect(list.rowCount(0)).toBe(1);
    });

    it('turns edit mode off when no section is editable any more', () => {
      list.reload([stored('card-1'), regular('ideal')]);
      list.setEditing(true);

      list.reload([regular('ideal')]);

      expect(list.isEditable).toBe(false);
      expect(list.isEditing).toBe(false);
      expect(onEditingChange.mock.calls).toEqual([[true], [false]]);
    });
  });

  describe('deleteItem', () => {
    it('removes the item and the section it empties in one transaction', () => {
      list.reload([stored('card-1')]);
      list.setEditing(true);
      onTransaction.mockClear();

      const transaction = list.deleteItem({ section: 0, item: 0 });

      expect(list.numberOfSections).toBe(0);
      expect(list.isEditable).toBe(false);
      expect(list.isEditing).toBe(false);
      expect(onEditingChange).toHaveBeenLastCalledWith(false);
      expect(onTransaction).toHaveBeenCalledTimes(1);
      expect(transaction.deletedItems).toEqual([{ id: 'card-1', at: { section: 0, item: 0 } }]);
      expect(transaction.deletedSections).toEqual([{ id: 'stored', index: 0 }]);
    });

    it('keeps a section that still has items', () => {
      list.reload([stored('card-1', 'card-2'), regular('ideal')]);

      const transaction = list.deleteItem({ section: 0, item: 1 });

      expect(list.numberOfSections).toBe(2);
      expect(list.rowCount(0)).toBe(1);
      expect(list.item({ section: 0, item: 0 }).id).toBe('card-1');
      expect(transaction.deletedItems).toEqual([{ id: 'card-2', at: { section: 0, item: 1 } }]);
      expect(transaction.deletedSections).toEqual([]);
      expect(list.isEditable).toBe(true);
    });

    it('turns edit mode off after the last editable section goes', () => {
      list.reload([stored('card-1'), regular('ideal')]);
      list.setEditing(true);

      list.deleteItem({ section: 0, item: 0 });

      expect(list.numberOfSections).toBe(1);
      expect(list.section(0).id).toBe('regular');
      expect(list.isEditing).toBe(false);
    });

    it('keeps the snapshot in step with the committed list', () => {
      list.reload([stored('card-1', 'card-2'), regular('ideal')]);
      const before = list.currentSnapshot();

      const transaction = list.deleteItem({ section: 0, item: 0 });

      expect(applyTransaction(before, transaction).toJSON()).toEqual(list.currentSnapshot().toJSON());
      expect(list.currentSnapshot().toJSON()).toEqual(
        ListSnapshot.fromSections(list.sections).toJSON()
      );
    });

    it.each([
      [{ section: 1, item: 0 }],
      [{ section: 0, item: 2 }],
      [{ section: -1, item: 0 }],
      [{ section: 0, item: 0.5 }]
    ])('rejects %p without touching the list', (at) => {
      list.reload([stored('card-1', 'card-2')]);
      onTransaction.mockClear();

      expect(() => list.deleteItem(at)).toThrow(IndexOutOfRangeError);
      expect(list.rowCount(0)).toBe(2);
      expect(onTransaction).not.toHaveBeenCalled();
    });
  });

  describe('edit mode', () => {
    it('ignores edit mode on a list without editable sections', () => {
      list.reload([regular('ideal')]);

      list.setEditing(true);

      expect(list.isEditing).toBe(false);
      expect(onEditingChange).not.toHaveBeenCalled();
    });

    it('only notifies actual changes', () => {
      list.reload([stored('card-1')]);

      list.setEditing(true);
      list.setEditing(true);
      list.setEditing(false);

      expect(onEditingChange.mock.calls).toEqual([[true], [false]]);
    });

    it('tells which rows can be deleted', () => {
      list.reload([stored('card-1'), { id: 'plain', items: [item('ideal')] }]);

      expect(list.canEditRow({ section: 0, item: 0 })).toBe(true);
      expect(list.canEditRow({ section: 1, item: 0 })).toBe(false);
    });
  });

  describe('loading state', () => {
    it('marks and clears items without producing transactions', () => {
      list.reload([stored('card-1', 'card-2')]);
      onTransaction.mockClear();
      const card = list.item({ section: 0, item: 1 });

      list.startLoading(card);
      expect(list.isLoading(card)).toBe(true);
      expect(list.isLoading(list.item({ section: 0, item: 0 }))).toBe(false);

      list.stopLoading();
      expect(list.isLoading(card)).toBe(false);
      expect(onTransaction).not.toHaveBeenCalled();
    });
  });

  describe('queries', () => {
    it('rejects out of range sections', () => {
      expect(() => list.rowCount(0)).toThrow(IndexOutOfRangeError);
      expect(() => list.section(0)).toThrow('Section 0 out of range (0 sections)');
    });

    it('locates items by identity', () => {
      list.reload([stored('card-1'), regular('ideal', 'sepa')]);

      expect(list.indexPathOf(item('sepa'))).toEqual({ section: 1, item: 1 });
      expect(list.indexPathOf(item('gone'))).toBeNull();
    });
  });
});
