export type PayloadValue =
  | string
  | number
  | boolean
  | null
  | PayloadValue[]
  | { [key: string]: PayloadValue };

/**
 * Free-form event data. Well-known keys read by the core:
 * `participants` (agent ids for relationship routing), `relationship_impact`,
 * `relationship_reason`, and any string fields for free-text memory search.
 */
export type EventPayload = Readonly<Record<string, PayloadValue>>;

export interface SimulationEvent {
  readonly id: string;
  readonly kind: string;
  readonly timestamp: Date;
  readonly source?: string;
  readonly target?: string;
  readonly payload: EventPayload;
}

export interface EventInit {
  kind: string;
  source?: string;
  target?: string;
  payload?: Record<string, PayloadValue>;
  timestamp?: Date;
  id?: string;
}

export type EventRecord = {
  id: string;
  kind: string;
  timestamp: string;
  source: string | null;
  target: string | null;
  payload: Record<string, PayloadValue>;
};

export type EventHandler = (event: SimulationEvent) => void | Promise<void>;
export type EventFilter = (event: SimulationEvent) => boolean;
