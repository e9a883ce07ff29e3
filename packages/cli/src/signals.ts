/**
 * Turn SIGINT into an AbortSignal for the duration of a command. A second
 * SIGINT exits immediately.
 */
export function interruptSignal(onInterrupt?: () => void): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const handler = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    onInterrupt?.();
    controller.abort();
  };
  process.on('SIGINT', handler);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', handler);
    },
  };
}
