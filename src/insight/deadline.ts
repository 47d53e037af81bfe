/**
 * Races a unit of work against a time budget and an optional abort signal.
 *
 * The work is abandoned, not pre-empted: when the deadline or the signal wins,
 * its eventual result (or rejection) is observed and ignored.
 */

export type RaceOutcome<T> =
  | { status: 'done'; value: T }
  | { status: 'error'; error: unknown }
  | { status: 'timeout' }
  | { status: 'aborted' };

export function raceWithDeadline<T>(work: Promise<T>, budgetMs: number, signal?: AbortSignal): Promise<RaceOutcome<T>> {
  return new Promise<RaceOutcome<T>>((resolve) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => finish({ status: 'aborted' });
    function finish(outcome: RaceOutcome<T>): void {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    }

    work.then(
      (value) => finish({ status: 'done', value }),
      (error: unknown) => finish({ status: 'error', error })
    );

    if (signal?.aborted) {
      finish({ status: 'aborted' });
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    timer = setTimeout(() => finish({ status: 'timeout' }), Math.max(0, budgetMs));
  });
}

/** Child controller that aborts when the parent signal does. Call `dispose` when done. */
export function linkedAbortController(parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  if (!parent) return { controller, dispose: () => {} };
  const onAbort = (): void => controller.abort(parent.reason);
  if (parent.aborted) controller.abort(parent.reason);
  else parent.addEventListener('abort', onAbort, { once: true });
  return { controller, dispose: () => parent.removeEventListener('abort', onAbort) };
}
