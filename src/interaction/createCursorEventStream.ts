import type { ChartPoint } from '../data/chartPoint';
import { isSameChartPoint } from '../data/chartPoint';

export type CursorEvent =
  | Readonly<{ type: 'begin' }>
  | Readonly<{ type: 'moved'; point: ChartPoint }>
  | Readonly<{ type: 'endMoved' }>;

export type CursorEventCallback = (event: CursorEvent) => void;

export interface CursorEventStream {
  emit(event: CursorEvent): void;
  subscribe(callback: CursorEventCallback): () => void;
  readonly subscriberCount: number;
  destroy(): void;
}

export const cursorBegin: CursorEvent = Object.freeze({ type: 'begin' });
export const cursorEndMoved: CursorEvent = Object.freeze({ type: 'endMoved' });
export const cursorMoved = (point: ChartPoint): CursorEvent => ({ type: 'moved', point });

export function isSameCursorEvent(a: CursorEvent, b: CursorEvent): boolean {
  if (a.type === 'moved' && b.type === 'moved') return isSameChartPoint(a.point, b.point);
  return a.type === b.type;
}

/**
 * Synchronous fan-out of cursor events.
 *
 * - Subscribers run in subscription order on the emitting call stack.
 * - A subscriber that throws is reported and skipped; the others still receive the event.
 * - Emitting iterates a snapshot, so (un)subscribing during an emit affects only later emits.
 */
export function createCursorEventStream(): CursorEventStream {
  const listeners = new Set<CursorEventCallback>();
  let destroyed = false;

  const emit: CursorEventStream['emit'] = (event) => {
    if (destroyed) return;
    const snapshot = Array.from(listeners);
    for (const cb of snapshot) {
      try {
        cb(event);
      } catch (error) {
        console.error(`LineChart: error in cursor "${event.type}" event handler:`, error);
      }
    }
  };

  const subscribe: CursorEventStream['subscribe'] = (callback) => {
    if (destroyed) return () => {};
    listeners.add(callback);
    return () => {
      listeners.delete(callback);
    };
  };

  const destroy: CursorEventStream['destroy'] = () => {
    destroyed = true;
    listeners.clear();
  };

  return {
    emit,
    subscribe,
    get subscriberCount() {
      return listeners.size;
    },
    destroy,
  };
}
