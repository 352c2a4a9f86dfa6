/**
 * Child signal that aborts when `parent` aborts or after `timeoutMs`, whichever
 * comes first. `dispose` must be called once the guarded work settles.
 */
export function linkedSignal(
  parent: AbortSignal | undefined,
  timeoutMs: number,
  onTimeout: () => Error
): { signal: AbortSignal; dispose: () => void } {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(onTimeout()), Math.max(0, timeoutMs));
  timer.unref?.();

  const onParentAbort = () => ac.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) ac.abort(parent.reason);
    else parent.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: ac.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  };
}
