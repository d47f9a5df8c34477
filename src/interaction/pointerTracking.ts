/**
 * Pointer-driven cursor state machine.
 *
 * ```
 * idle --down--> active            (begin)
 * active --move--> active          (move: re-resolve the cursor)
 * active --up|cancel--> idle       (end: hide visuals)
 * ```
 *
 * Anything else is ignored: moves without a preceding down, a second down while active, an end
 * while idle.
 *
 * @module pointerTracking
 */

export type PointerPhase = 'down' | 'move' | 'up' | 'cancel';

/** Pointer sample in chart-view CSS pixels. */
export interface ChartPointerEvent {
  readonly phase: PointerPhase;
  readonly x: number;
  readonly y: number;
}

export type CursorPhase = 'idle' | 'active';

export type CursorAction = 'begin' | 'move' | 'end' | 'ignore';

export interface CursorTransition {
  readonly next: CursorPhase;
  readonly action: CursorAction;
}

export function transitionCursor(current: CursorPhase, pointer: PointerPhase): CursorTransition {
  if (current === 'idle') {
    return pointer === 'down' ? { next: 'active', action: 'begin' } : { next: 'idle', action: 'ignore' };
  }
  switch (pointer) {
    case 'move':
      return { next: 'active', action: 'move' };
    case 'up':
    case 'cancel':
      return { next: 'idle', action: 'end' };
    case 'down':
      return { next: 'active', action: 'ignore' };
  }
}
