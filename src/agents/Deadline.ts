import { AgentError, AgentTimeoutError, errorMessage } from '../errors.js';

/**
 * Runs an agent request under a deadline.
 *
 * `run` receives a signal that fires on expiry or when `parent` aborts. The returned
 * promise settles at the deadline even if `run` ignores its signal.
 */
export function withDeadline<T>(
  agentId: string,
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      settle();
    };

    const onParentAbort = (): void => {
      controller.abort();
      finish(() => reject(new AgentError(agentId, `Request to ${agentId} cancelled`)));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new AgentTimeoutError(agentId, timeoutMs)));
    }, timeoutMs);

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    run(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) =>
        finish(() =>
          reject(
            err instanceof AgentError
              ? err
              : new AgentError(agentId, `Agent ${agentId} failed: ${errorMessage(err)}`, { cause: err }),
          ),
        ),
    );
  });
}

