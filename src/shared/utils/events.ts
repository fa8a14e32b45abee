import { EventEmitter } from 'eventemitter3';

export type EngineEventType =
  | 'replay:started'
  | 'replay:warning'
  | 'replay:completed'
  | 'prediction:made';

export interface EngineEvent {
  type: EngineEventType;
  timestamp: number;
  runId: string;
  data: Record<string, unknown>;
}

// Typed event emitter for replay and prediction activity
type EventMap = {
  [K in EngineEventType]: (event: EngineEvent) => void;
} & {
  '*': (event: EngineEvent) => void;
};

export class EngineEventBus extends EventEmitter<EventMap> {
  private history: EngineEvent[] = [];
  private maxHistorySize = 500;

  publish(event: EngineEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistorySize) {
      this.history.shift();
    }

    this.emit(event.type, event);
    this.emit('*', event);
  }

  getHistory(filter?: { type?: EngineEventType; runId?: string; since?: number }): EngineEvent[] {
    let events = this.history;

    if (filter?.type) {
      events = events.filter(e => e.type === filter.type);
    }
    if (filter?.runId) {
      events = events.filter(e => e.runId === filter.runId);
    }
    const since = filter?.since;
    if (since !== undefined) {
      events = events.filter(e => e.timestamp >= since);
    }

    return events;
  }

  clearHistory(): void {
    this.history = [];
  }
}

export const eventBus = new EngineEventBus();

export function createEngineEvent(
  type: EngineEventType,
  runId: string,
  data: Record<string, unknown> = {}
): EngineEvent {
  return {
    type,
    timestamp: Date.now(),
    runId,
    data,
  };
}
