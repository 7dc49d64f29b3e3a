/**
 * named-model — Diagnostics
 *
 * Decoding is best-effort and never throws; whatever it cannot model is
 * either kept in an overflow bag or dropped. Both outcomes are reported
 * here as typed events so callers can log or count them.
 *
 * @example
 * ```ts
 * const config = decode(tree.nodes, {
 *   onDiagnostic: createDiagnosticObserver(),
 * });
 * // [named-model] dropped   zone "example.com" masters { 10.0.0.1; } (unknown statement)
 * ```
 */

/** Content that was discarded. */
export interface DroppedEvent {
  readonly type: 'dropped';
  /** The block being decoded, e.g. `zone "example.com"`. */
  readonly scope: string;
  readonly text: string;
  readonly reason: string;
}

/** An unknown child statement kept verbatim in the block's overflow bag. */
export interface CapturedEvent {
  readonly type: 'captured';
  readonly scope: string;
  readonly name: string;
}

/** A second `controls`, `logging` or `options` block; the last one wins. */
export interface DuplicateEvent {
  readonly type: 'duplicate';
  readonly scope: string;
  readonly keyword: string;
}

export type DiagnosticEvent = DroppedEvent | CapturedEvent | DuplicateEvent;

export type DiagnosticObserverFn = (event: DiagnosticEvent) => void;

/**
 * Create a diagnostic observer.
 *
 * With a handler, events go to it unchanged. Without one, each event is
 * printed on one line through `console.debug`.
 */
export function createDiagnosticObserver(handler?: DiagnosticObserverFn): DiagnosticObserverFn {
  if (handler) return handler;

  return (event: DiagnosticEvent): void => {
    const prefix = '[named-model]';

    switch (event.type) {
      case 'dropped':
        console.debug(`${prefix} dropped   ${event.scope} ${event.text} (${event.reason})`);
        break;

      case 'captured':
        console.debug(`${prefix} captured  ${event.scope} ${event.name}`);
        break;

      case 'duplicate':
        console.debug(`${prefix} duplicate ${event.scope} ${event.keyword}`);
        break;
    }
  };
}
