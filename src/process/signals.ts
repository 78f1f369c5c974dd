/**
 * Signal handling port.
 *
 * Abstracts `process.on` / `process.off` so the supervisor can be driven
 * by fake signals in tests and embedded without leaking global handlers.
 */

export type SignalHandler = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(signal: NodeJS.Signals, handler: SignalHandler): unknown;
  off(signal: NodeJS.Signals, handler: SignalHandler): unknown;
}

/**
 * Register `handler` for each of `signals` on `source`.
 *
 * Returns a dispose function that removes exactly the listeners added here.
 * Calling it more than once is a no-op.
 */
export function installSignalHandlers<S extends NodeJS.Signals>(
  source: SignalSource,
  signals: readonly S[],
  handler: (signal: S) => void,
): () => void {
  const listeners = signals.map((signal) => {
    const listener: SignalHandler = () => handler(signal);
    source.on(signal, listener);
    return { signal, listener };
  });

  let disposed = false;
  return () => {
    if (disposed) return;
    disposed = true;
    for (const { signal, listener } of listeners) {
      source.off(signal, listener);
    }
  };
}
