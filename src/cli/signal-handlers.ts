/**
 * Two-stage shutdown for `refwatch run`.
 * The first SIGINT/SIGTERM stops scheduling and lets in-flight build chains finish.
 * A second one exits at once with the conventional 128 + signal number code.
 */

const SIGNAL_NUMBERS = { SIGINT: 2, SIGTERM: 15 } as const;

export type ShutdownSignal = keyof typeof SIGNAL_NUMBERS;

export type ShutdownHandler = {
  signal: AbortSignal;
  /** The signal that requested shutdown, if any. */
  requestedBy: () => ShutdownSignal | null;
  dispose: () => void;
};

/** The part of `process` the handler listens on. */
export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

export type ShutdownHandlerOptions = {
  notify: (line: string) => void;
  forceExit?: (code: number) => void;
  source?: SignalSource;
};

export function installShutdownHandler(opts: ShutdownHandlerOptions): ShutdownHandler {
  const controller = new AbortController();
  const source: SignalSource = opts.source ?? process;
  const forceExit = opts.forceExit ?? ((code: number) => process.exit(code));
  let requestedBy: ShutdownSignal | null = null;

  const handle = (signal: ShutdownSignal): void => {
    if (requestedBy === null) {
      requestedBy = signal;
      opts.notify(
        `Received ${signal}. Waiting for in-flight build chains; send ${signal} again to exit now.`,
      );
      controller.abort(signal);
      return;
    }

    opts.notify(`Received ${signal} again. Exiting without waiting for build chains.`);
    forceExit(128 + SIGNAL_NUMBERS[signal]);
  };

  const onSigint = (): void => handle("SIGINT");
  const onSigterm = (): void => handle("SIGTERM");
  source.on("SIGINT", onSigint);
  source.on("SIGTERM", onSigterm);

  return {
    signal: controller.signal,
    requestedBy: () => requestedBy,
    dispose: () => {
      source.off("SIGINT", onSigint);
      source.off("SIGTERM", onSigterm);
    },
  };
}
