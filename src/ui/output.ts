import { CodetypeError } from "../errors";
import type { Logger } from "../logger";

/** The part of a write stream whose errors are watched */
export interface WatchedOutput {
  on(event: "error", listener: (error: Error) => void): unknown;
  off(event: "error", listener: (error: Error) => void): unknown;
}

/**
 * Log asynchronous write errors of the terminal (EPIPE, EIO) as render
 * failures instead of letting them crash the process. Returns the function
 * that removes the listener.
 */
export function watchOutput(output: WatchedOutput, logger: Logger): () => void {
  let failures = 0;
  const onError = (error: Error) => {
    failures++;
    const failure = new CodetypeError("RenderFailure", "terminal write failed", { cause: error });
    logger.debug(failure.message, { failures, error: error.message });
  };

  output.on("error", onError);
  return () => {
    output.off("error", onError);
  };
}
