import { CancelledError } from "@trackpress/core";
import type { Logger } from "./logger";

// First SIGINT/SIGTERM cancels the run; a second one exits immediately.
export function installCancellationHandlers(
  controller: AbortController,
  logger: Logger,
): () => void {
  let received = 0;

  const listeners = (["SIGINT", "SIGTERM"] as const).map((signal) => {
    const listener = (): void => {
      received += 1;
      if (received > 1) {
        logger.error(`Received ${signal} again, exiting without cleanup`);
        process.exit(130);
      }
      logger.warn(`Received ${signal}, cancelling the run (press Ctrl+C again to force exit)`);
      controller.abort(new CancelledError(`Run interrupted by ${signal}`));
    };
    process.on(signal, listener);
    return { signal, listener };
  });

  return () => {
    for (const { signal, listener } of listeners) {
      process.off(signal, listener);
    }
  };
}
