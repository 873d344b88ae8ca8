import type { Writable } from "node:stream";

import { PreconditionError, StreamIOError } from "./errors";

export type Sink = Writable | null | undefined;

/**
 * Checked before anything is written, so a bad sink never gets a partial
 * artifact.
 */
export function assertWritable(sink: Sink, what: string): asserts sink is Writable {
  if (!sink) {
    throw new PreconditionError(`${what} sink cannot be null`);
  }
  if (!sink.writable || sink.destroyed) {
    throw new PreconditionError(`${what} sink is not open for writing`);
  }
}

/**
 * Write text and wait until the sink has taken it. Write failures reject
 * with StreamIOError instead of surfacing as an unhandled 'error' event.
 */
export function writeText(sink: Writable, text: string, what: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(new StreamIOError(`could not write ${what}`, error));
    // Stays attached on failure: the sink emits 'error' after the callback.
    sink.once("error", onError);
    sink.write(text, "utf8", (error) => {
      if (error) {
        reject(new StreamIOError(`could not write ${what}`, error));
        return;
      }
      sink.off("error", onError);
      resolve();
    });
  });
}
