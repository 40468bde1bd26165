import { err, ok } from "neverthrow";
import { describe, expect, test } from "vitest";
import { EventDispatcher } from "../../commands/dispatcher";
import { createInitialState } from "../../state/app-state";
import { charKey, namedKey } from "../../types/events";
import {
  createConnectedState,
  createMetrics,
  createStatus,
  createTestHarness,
  FakeDaemonClient,
  logLines,
  TEST_ADDRESS,
} from "../test-utils";

const dispatcher = new EventDispatcher();

function connectedHarness() {
  const client = new FakeDaemonClient();
  client.connected = true;
  return createTestHarness(createConnectedState(), client);
}

describe("EventDispatcher", () => {
  describe("connect", () => {
    test("success connects and fetches both snapshots", async () => {
      const { store, client, context } = createTestHarness();

      await dispatcher.dispatch(charKey("c"), context);

      const state = store.getState();
      expect(client.calls).toEqual([`connect ${TEST_ADDRESS}`, "getStatus", "getMetrics"]);
      expect(state.connection.status).toEqual({ kind: "connected" });
      expect(state.connection.daemonStatus).toEqual(createStatus());
      expect(state.connection.daemonMetrics).toEqual(createMetrics());
      expect(logLines(state)).toEqual([
        "INFO Connecting to daemon...",
        "INFO Connected successfully",
      ]);
    });

    test("failure ends in the error status with one error entry", async () => {
      const client = new FakeDaemonClient();
      client.connectResult = err({ kind: "unavailable", message: "connection refused" });
      const { store, context } = createTestHarness(undefined, client);
      const seen: string[] = [];
      const dispatch = context.dispatch;
      context.dispatch = (action) => {
        if (action.type === "SET_CONNECTION_STATUS") seen.push(action.payload.kind);
        dispatch(action);
      };

      await dispatcher.dispatch(charKey("c"), context);

      const state = store.getState();
      expect(seen).toEqual(["connecting", "error"]);
      expect(state.connection.status).toEqual({ kind: "error", message: "Connection failed" });
      expect(logLines(state)).toEqual([
        "INFO Connecting to daemon...",
        "ERROR Connection failed: connection refused",
      ]);
      expect(client.calls).toEqual([`connect ${TEST_ADDRESS}`]);
    });

    test("connecting twice only warns", async () => {
      const { store, client, context } = connectedHarness();

      await dispatcher.dispatch(charKey("c"), context);

      expect(client.calls).toEqual([]);
      expect(logLines(store.getState())).toEqual(["WARN Already connected"]);
    });
  });

  describe("disconnect", () => {
    test("drops the session and both snapshots", async () => {
      const { store, client, context } = connectedHarness();

      await dispatcher.dispatch(charKey("d"), context);

      const state = store.getState();
      expect(client.calls).toEqual(["disconnect"]);
      expect(state.connection).toEqual({
        status: { kind: "disconnected" },
        daemonStatus: null,
        daemonMetrics: null,
      });
      expect(logLines(state)).toEqual(["INFO Disconnected from daemon"]);
    });

    test("a second disconnect only warns", async () => {
      const { store, context } = connectedHarness();

      await dispatcher.dispatch(charKey("d"), context);
      await dispatcher.dispatch(charKey("D"), context);

      expect(logLines(store.getState())).toEqual([
        "INFO Disconnected from daemon",
        "WARN Not connected",
      ]);
    });
  });

  describe("execute", () => {
    function focusedControls(selectedAction: number) {
      const base = createConnectedState();
      return { ...base, navigation: { focusedPanel: "controls" as const, selectedAction } };
    }

    test("while disconnected only warns", async () => {
      const base = createInitialState({ address: TEST_ADDRESS, startedAt: 0 });
      const { store, client, context } = createTestHarness({
        ...base,
        navigation: { focusedPanel: "controls", selectedAction: 0 },
      });

      await dispatcher.dispatch(namedKey("enter"), context);

      expect(client.calls).toEqual([]);
      expect(logLines(store.getState())).toEqual(["WARN Not connected - press 'c' to connect"]);
    });

    test("sends the selected action and reports success", async () => {
      const client = new FakeDaemonClient();
      client.connected = true;
      client.controlResult = ok({ success: true, message: "Restarted" });
      const { store, context } = createTestHarness(focusedControls(2), client);

      await dispatcher.dispatch(namedKey("enter"), context);

      expect(client.calls).toEqual(["control restart"]);
      expect(logLines(store.getState())).toEqual([
        "INFO Executing: Restart",
        "INFO Success: Restarted",
      ]);
    });

    test("a refused action is a warning", async () => {
      const client = new FakeDaemonClient();
      client.connected = true;
      client.controlResult = ok({ success: false, message: "already running" });
      const { store, context } = createTestHarness(focusedControls(0), client);

      await dispatcher.dispatch(namedKey("enter"), context);

      expect(logLines(store.getState())).toEqual([
        "INFO Executing: Start",
        "WARN Failed: already running",
      ]);
    });

    test("a transport failure is an error", async () => {
      const client = new FakeDaemonClient();
      client.connected = true;
      client.controlResult = err({ kind: "timeout", message: "Deadline exceeded" });
      const { store, context } = createTestHarness(focusedControls(3), client);

      await dispatcher.dispatch(namedKey("enter"), context);

      expect(logLines(store.getState())).toEqual([
        "INFO Executing: Reload",
        "ERROR Command failed: Deadline exceeded",
      ]);
    });
  });

  describe("tick", () => {
    test("does nothing while disconnected", async () => {
      const { store, client, context } = createTestHarness();
      const before = store.getState();

      await dispatcher.dispatch({ type: "tick" }, context);

      expect(client.calls).toEqual([]);
      expect(store.getState()).toBe(before);
    });

    test("refreshes both snapshots while connected", async () => {
      const { store, client, context } = connectedHarness();
      client.statusResult = ok(createStatus({ version: "9.9.9" }));

      await dispatcher.dispatch({ type: "tick" }, context);

      expect(client.calls).toEqual(["getStatus", "getMetrics"]);
      expect(store.getState().connection.daemonStatus?.version).toBe("9.9.9");
    });

    test("a failed fetch keeps the last good snapshot", async () => {
      const { store, client, context } = connectedHarness();
      client.statusResult = err({ kind: "timeout", message: "Deadline exceeded" });
      client.metricsResult = ok(createMetrics({ errorsTotal: 99 }));

      await dispatcher.dispatch({ type: "tick" }, context);

      const state = store.getState();
      expect(state.connection.status).toEqual({ kind: "connected" });
      expect(state.connection.daemonStatus).toEqual(createStatus());
      expect(state.connection.daemonMetrics?.errorsTotal).toBe(99);
      expect(logLines(state)).toEqual(["ERROR Failed to get status: Deadline exceeded"]);
    });
  });

  describe("navigation and ui", () => {
    test("tab cycles focus", async () => {
      const { store, context } = createTestHarness();
      await dispatcher.dispatch(namedKey("tab"), context);
      expect(store.getState().navigation.focusedPanel).toBe("controls");
      await dispatcher.dispatch(namedKey("backTab"), context);
      await dispatcher.dispatch(namedKey("backTab"), context);
      expect(store.getState().navigation.focusedPanel).toBe("logs");
    });

    test("q sets the quit flag", async () => {
      const { store, context } = createTestHarness();
      await dispatcher.dispatch(charKey("q"), context);
      expect(store.getState().ui.shouldQuit).toBe(true);
    });

    test("resize updates the terminal size", async () => {
      const { store, context } = createTestHarness();
      await dispatcher.dispatch({ type: "resize", columns: 100, rows: 30 }, context);
      expect(store.getState().ui.terminal).toEqual({ rows: 30, cols: 100 });
    });

    test("pointer events are ignored", async () => {
      const { store, context } = createTestHarness();
      const before = store.getState();
      await dispatcher.dispatch({ type: "pointer", action: "down", column: 3, row: 4 }, context);
      expect(store.getState()).toBe(before);
    });

    test("a key press clears the status message", async () => {
      const { store, context } = createTestHarness();
      store.dispatch({ type: "SET_STATUS_MESSAGE", payload: "Config ignored" });
      await dispatcher.dispatch(charKey("x"), context);
      expect(store.getState().ui.statusMessage).toBeNull();
    });
  });
});
