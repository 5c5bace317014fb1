/** Emitted once the column mapping is resolved, before the first row is pulled. */
export interface FilterStartedEvent {
  readonly type: 'filter:started';
  /** Zero-based indices of the columns that carry a modifier. */
  readonly columns: readonly number[];
  readonly hasHeader: boolean;
  readonly timestamp: number;
}

/** Emitted after every data row has had its modifiers applied. */
export interface RowTransformedEvent {
  readonly type: 'row:transformed';
  /** Zero-based index of the data row (the header row is not counted). */
  readonly rowIndex: number;
  readonly columns: readonly number[];
  readonly timestamp: number;
}

/** Emitted when the upstream source is exhausted. */
export interface FilterCompletedEvent {
  readonly type: 'filter:completed';
  /** Number of data rows yielded. */
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted when applying a modifier fails; the stream ends at that row. */
export interface FilterFailedEvent {
  readonly type: 'filter:failed';
  readonly rowIndex: number;
  readonly error: string;
  readonly timestamp: number;
}

export type DomainEvent = FilterStartedEvent | RowTransformedEvent | FilterCompletedEvent | FilterFailedEvent;

export type EventType = DomainEvent['type'];

/** Extract the event payload type for a given event type string. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
