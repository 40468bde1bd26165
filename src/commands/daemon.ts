import { currentAction } from "../selectors/dashboard";
import { CONTROL_ACTION_LABELS } from "../types/domain";
import type { Command, CommandContext } from "./types";

/**
 * Fetch status then metrics, one after the other. A failed fetch keeps the
 * previous snapshot and leaves the connection status alone.
 */
export class RefreshCommand implements Command {
  description = "Refresh daemon status and metrics";

  canExecute(context: CommandContext): boolean {
    return context.client.isConnected();
  }

  async execute(context: CommandContext): Promise<void> {
    const { client, dispatch, activity } = context;

    const status = await client.getStatus();
    if (status.isOk()) {
      dispatch({ type: "SET_DAEMON_STATUS", payload: status.value });
    } else {
      activity.error(`Failed to get status: ${status.error.message}`);
    }

    const metrics = await client.getMetrics();
    if (metrics.isOk()) {
      dispatch({ type: "SET_DAEMON_METRICS", payload: metrics.value });
    } else {
      activity.error(`Failed to get metrics: ${metrics.error.message}`);
    }
  }
}

export class ConnectCommand implements Command {
  description = "Connect to the daemon";

  async execute(context: CommandContext): Promise<void> {
    const { client, dispatch, activity, getState } = context;

    if (client.isConnected()) {
      activity.warn("Already connected");
      return;
    }

    dispatch({ type: "SET_CONNECTION_STATUS", payload: { kind: "connecting" } });
    activity.info("Connecting to daemon...");

    const result = await client.connect(getState().address);
    if (result.isErr()) {
      dispatch({
        type: "SET_CONNECTION_STATUS",
        payload: { kind: "error", message: "Connection failed" },
      });
      activity.error(`Connection failed: ${result.error.message}`);
      return;
    }

    dispatch({ type: "SET_CONNECTION_STATUS", payload: { kind: "connected" } });
    activity.info("Connected successfully");
    await new RefreshCommand().execute(context);
  }
}

export class DisconnectCommand implements Command {
  description = "Disconnect from the daemon";

  execute(context: CommandContext): void {
    const { client, dispatch, activity } = context;

    if (!client.isConnected()) {
      activity.warn("Not connected");
      return;
    }

    client.disconnect();
    // Leaving "connected" also drops both snapshots
    dispatch({
      type: "SET_CONNECTION_STATUS",
      payload: { kind: "disconnected" },
    });
    activity.info("Disconnected from daemon");
  }
}

export class ExecuteActionCommand implements Command {
  description = "Send the selected control action to the daemon";

  async execute(context: CommandContext): Promise<void> {
    const { client, activity, getState } = context;

    if (!client.isConnected()) {
      activity.warn("Not connected - press 'c' to connect");
      return;
    }

    const action = currentAction(getState());
    activity.info(`Executing: ${CONTROL_ACTION_LABELS[action]}`);

    const result = await client.sendControl(action);
    if (result.isErr()) {
      activity.error(`Command failed: ${result.error.message}`);
      return;
    }

    if (result.value.success) {
      activity.info(`Success: ${result.value.message}`);
    } else {
      activity.warn(`Failed: ${result.value.message}`);
    }
  }
}
