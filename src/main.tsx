import chalk from "chalk";
import { configPath } from "./config/paths";
import { type ConsoleConfig, DEFAULT_CONFIG, readConsoleConfig, resolveAddress } from "./config/console-config";
import { EventDispatcher } from "./commands/dispatcher";
import type { CommandContext } from "./commands/types";
import { InkRenderer } from "./ink-control";
import { createActivityLog } from "./services/activity-log";
import { GrpcDaemonClient } from "./services/daemon-client";
import { setupGlobalErrorHandlers } from "./services/error-handler";
import { EventQueue } from "./services/event-queue";
import { EventSource } from "./services/event-source";
import { initializeLogger, log } from "./services/logger";
import { runMainLoop } from "./services/main-loop";
import { acquireTerminal } from "./services/terminal-session";
import { createInitialState, StateStore } from "./state/app-state";
import type { AppEvent } from "./types/events";

const args = process.argv.slice(2);

async function main(): Promise<number> {
    const path = configPath();
    const configResult = await readConsoleConfig(path);
    let config: ConsoleConfig = DEFAULT_CONFIG;
    let configWarning: string | null = null;
    if (configResult.isErr()) {
        configWarning = `Config ${path} ignored: ${configResult.error.message}`;
        console.warn(chalk.yellow(`⚠ ${configWarning}`));
    } else {
        config = configResult.value;
    }

    const loggerResult = await initializeLogger({ keepSessions: config.logKeepSessions });
    if (loggerResult.isErr()) {
        console.error(chalk.red(`❌ Failed to initialize logger: ${loggerResult.error.message}`));
        return 1;
    }
    const logger = loggerResult.value;

    const address = resolveAddress(args.find((arg) => !arg.startsWith("-")), config);
    log.info("Console session started", "main", {
        sessionId: logger.getSessionId(),
        logFile: logger.getLogFilePath(),
        configPath: path,
        address,
    });

    const terminalResult = acquireTerminal();
    if (terminalResult.isErr()) {
        log.error("Terminal unavailable", "main", terminalResult.error);
        console.error(chalk.red(`❌ ${terminalResult.error.message}`));
        await logger.close();
        return 1;
    }
    const terminal = terminalResult.value;
    const removeErrorHandlers = setupGlobalErrorHandlers(() => terminal.release());

    const store = new StateStore(
        createInitialState({
            address,
            terminal: { rows: process.stdout.rows ?? 24, cols: process.stdout.columns ?? 80 },
        }),
    );
    if (configWarning) store.dispatch({ type: "SET_STATUS_MESSAGE", payload: configWarning });

    const activity = createActivityLog(store.dispatch);
    activity.info("Daemon Controller started");
    activity.info(`Target: ${address}`);

    const client = new GrpcDaemonClient({
        connectTimeoutMs: config.connectTimeoutMs,
        callTimeoutMs: config.callTimeoutMs,
    });
    const context: CommandContext = {
        getState: store.getState,
        dispatch: store.dispatch,
        client,
        activity,
    };

    const events = new EventQueue<AppEvent>();
    const eventSource = new EventSource(events, {
        tickIntervalMs: config.tickIntervalMs,
        resizeSource: process.stdout,
    });
    const renderer = new InkRenderer({
        onInput: eventSource.emitInput,
        logFilePath: logger.getLogFilePath(),
    });

    eventSource.start();
    try {
        const exit = await runMainLoop({
            events,
            renderer,
            dispatcher: new EventDispatcher(),
            context,
        });
        log.info("Console exiting", "main", { reason: exit });
    } finally {
        eventSource.stop();
        renderer.unmount();
        client.disconnect();
        terminal.release();
        removeErrorHandlers();
        const closed = await logger.close();
        if (closed.isErr()) console.error(chalk.yellow(`⚠ ${closed.error.message}`));
    }
    return 0;
}

main().then(
    (code) => process.exit(code),
    (error: unknown) => {
        console.error(chalk.red("❌ Failed to start console:"), error);
        process.exit(1);
    },
);
