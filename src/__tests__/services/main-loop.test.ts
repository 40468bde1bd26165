import { describe, expect, test } from "vitest";
import { EventDispatcher } from "../../commands/dispatcher";
import { EventQueue } from "../../services/event-queue";
import { type FrameRenderer, runMainLoop } from "../../services/main-loop";
import type { AppState } from "../../state/app-state";
import { type AppEvent, charKey, namedKey } from "../../types/events";
import { createTestHarness } from "../test-utils";

class RecordingRenderer implements FrameRenderer {
  frames: AppState[] = [];

  render(state: AppState): void {
    this.frames.push(state);
  }
}

describe("runMainLoop", () => {
  test("renders before every event and stops on quit", async () => {
    const { context } = createTestHarness();
    const events = new EventQueue<AppEvent>();
    const renderer = new RecordingRenderer();
    events.push(namedKey("tab"));
    events.push(namedKey("tab"));
    events.push(charKey("q"));
    events.push(namedKey("tab"));

    const exit = await runMainLoop({
      events,
      renderer,
      dispatcher: new EventDispatcher(),
      context,
    });

    expect(exit).toBe("quit");
    expect(renderer.frames.map((s) => s.navigation.focusedPanel)).toEqual([
      "status",
      "controls",
      "logs",
    ]);
    expect(context.getState().navigation.focusedPanel).toBe("logs");
    expect(events.isClosed).toBe(true);
  });

  test("stops when the event stream ends", async () => {
    const { context } = createTestHarness();
    const events = new EventQueue<AppEvent>();
    const renderer = new RecordingRenderer();
    events.push(namedKey("tab"));
    events.end();

    const exit = await runMainLoop({
      events,
      renderer,
      dispatcher: new EventDispatcher(),
      context,
    });

    expect(exit).toBe("stream-ended");
    expect(renderer.frames).toHaveLength(2);
  });

  test("events arriving during a dispatch wait their turn", async () => {
    const { context, client } = createTestHarness();
    const events = new EventQueue<AppEvent>();
    const renderer = new RecordingRenderer();
    const connect = client.connect.bind(client);
    client.connect = (address) => {
      events.push(charKey("q"));
      return connect(address);
    };
    events.push(charKey("c"));

    const exit = await runMainLoop({
      events,
      renderer,
      dispatcher: new EventDispatcher(),
      context,
    });

    expect(exit).toBe("quit");
    expect(client.calls).toEqual(["connect 127.0.0.1:50051", "getStatus", "getMetrics"]);
    expect(context.getState().connection.daemonMetrics).not.toBeNull();
  });

  test("closes the queue when a render throws", async () => {
    const { context } = createTestHarness();
    const events = new EventQueue<AppEvent>();
    const renderer: FrameRenderer = {
      render() {
        throw new Error("render failed");
      },
    };

    await expect(
      runMainLoop({ events, renderer, dispatcher: new EventDispatcher(), context }),
    ).rejects.toThrow("render failed");
    expect(events.isClosed).toBe(true);
  });
});
