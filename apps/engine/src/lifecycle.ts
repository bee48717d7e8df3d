const TAG = '[plotline]';

const DEFAULT_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGUSR2'];

export interface SignalTarget {
    on(signal: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownHookOptions {
    target?: SignalTarget;
    signals?: NodeJS.Signals[];
    exit?: (code: number) => void;
}

/**
 * Shuts the engine down once on SIGTERM/SIGINT/SIGUSR2 and exits. Active runs
 * are detached, not cancelled, so the next process recovers them.
 */
export function installShutdownHooks(engine: { shutdown(): Promise<void> }, options: ShutdownHookOptions = {}): void {
    const target = options.target ?? process;
    const exit = options.exit ?? ((code: number) => process.exit(code));
    let stopping = false;

    const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        if (stopping) return;
        stopping = true;
        console.log(`${TAG} ${signal} received, shutting down...`);
        try {
            await engine.shutdown();
            exit(0);
        } catch (err) {
            console.error(`${TAG} shutdown failed:`, err);
            exit(1);
        }
    };

    for (const signal of options.signals ?? DEFAULT_SIGNALS) {
        target.on(signal, () => {
            shutdown(signal).catch((err) => console.error(`${TAG} fatal:`, err));
        });
    }
}
