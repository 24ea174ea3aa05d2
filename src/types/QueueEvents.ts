interface ItemEvents<T> {
  'item:added': T;
  'item:removed': T;
}

interface QueueStateEvents {
  'queue:full': void;
  'queue:drained': void;
  'queue:cleared': { discarded: number };
  'queue:closed': void;
}

interface OperationEvents {
  'operation:timeout': { operation: 'add' | 'take'; timeoutMs: number };
}

export type QueueEventMap<T> = ItemEvents<T> & QueueStateEvents & OperationEvents;
