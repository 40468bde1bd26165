import type { EventDispatcher } from "../commands/dispatcher";
import type { CommandContext } from "../commands/types";
import type { AppState } from "../state/app-state";
import type { AppEvent } from "../types/events";
import type { EventQueue } from "./event-queue";
import { log } from "./logger";

/**
 * The render function's contract: draw one frame from one state snapshot.
 */
export interface FrameRenderer {
  render(state: AppState): void;
}

export type LoopExit = "quit" | "stream-ended";

export interface MainLoopOptions {
  events: EventQueue<AppEvent>;
  renderer: FrameRenderer;
  dispatcher: EventDispatcher;
  context: CommandContext;
}

/**
 * render -> wait for one event -> dispatch -> check quit, until the quit
 * flag is set or the event stream runs dry. Events are handled strictly in
 * arrival order; anything arriving during a dispatch waits in the queue.
 *
 * The queue is closed on the way out, which stops its producers.
 */
export async function runMainLoop({
  events,
  renderer,
  dispatcher,
  context,
}: MainLoopOptions): Promise<LoopExit> {
  try {
    for (;;) {
      renderer.render(context.getState());

      const next = await events.next();
      if (next.done) {
        log.info("Event stream ended", "main-loop");
        return "stream-ended";
      }

      await dispatcher.dispatch(next.value, context);

      if (context.getState().ui.shouldQuit) {
        log.info("Quit requested", "main-loop");
        return "quit";
      }
    }
  } finally {
    events.close();
  }
}
