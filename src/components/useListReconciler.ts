import { useCallback, useEffect, useRef, useState } from 'react';
import { SectionedListReconciler } from '../core/SectionedListReconciler';
import type { IndexPath, ListItem, ListSection, ListTransaction } from '../types';

export interface UseListReconcilerOptions {
  /** Called with each transaction, e.g. to drive row animations */
  onTransaction?: (transaction: ListTransaction) => void;

  /** Debug mode */
  debug?: boolean;
}

export interface ListReconcilerState<Item extends ListItem> {
  sections: ReadonlyArray<ListSection<Item>>;
  isEditable: boolean;
  isEditing: boolean;
  lastTransaction: ListTransaction | null;
  setEditing: (editing: boolean) => void;
  deleteItem: (item: Item) => void;
  canEditRow: (at: IndexPath) => boolean;
  startLoading: (item: Item) => void;
  stopLoading: () => void;
  isLoading: (item: Item) => boolean;
}

/**
 * Keeps a `SectionedListReconciler` for the lifetime of the component and
 * reloads it whenever `sections` changes identity.
 */
export function useListReconciler<Item extends ListItem>(
  sections: ReadonlyArray<ListSection<Item>>,
  { onTransaction, debug = false }: UseListReconcilerOptions = {}
): ListReconcilerState<Item> {
  const [, setVersion] = useState(0);
  const [isEditing, setIsEditing] = useState(false);
  const [lastTransaction, setLastTransaction] = useState<ListTransaction | null>(null);

  const onTransactionRef = useRef(onTransaction);
  onTransactionRef.current = onTransaction;

  const reconcilerRef = useRef<SectionedListReconciler<Item> | null>(null);
  if (!reconcilerRef.current) {
    reconcilerRef.current = new SectionedListReconciler<Item>({
      onTransaction: (transaction) => {
        setLastTransaction(transaction);
        onTransactionRef.current?.(transaction);
      },
      onEditingChange: setIsEditing,
      debug
    });
  }
  const reconciler = reconcilerRef.current;

  const rerender = useCallback(() => setVersion(version => version + 1), []);

  useEffect(() => {
    reconciler.reload(sections);
  }, [reconciler, sections]);

  const deleteItem = useCallback((item: Item) => {
    const at = reconciler.indexPathOf(item);
    if (at) {
      reconciler.deleteItem(at);
    }
  }, [reconciler]);

  const startLoading = useCallback((item: Item) => {
    reconciler.startLoading(item);
    rerender();
  }, [reconciler, rerender]);

  const stopLoading = useCallback(() => {
    reconciler.stopLoading();
    rerender();
  }, [reconciler, rerender]);

  return {
    sections: reconciler.sections,
    isEditable: reconciler.isEditable,
    isEditing,
    lastTransaction,
    setEditing: (editing: boolean) => reconciler.setEditing(editing),
    deleteItem,
    canEditRow: (at: IndexPath) => reconciler.canEditRow(at),
    startLoading,
    stopLoading,
    isLoading: (item: Item) => reconciler.isLoading(item)
  };
}
