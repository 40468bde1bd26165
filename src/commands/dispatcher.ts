import { log } from "../services/logger";
import type { AppEvent } from "../types/events";
import { RefreshCommand } from "./daemon";
import { createDefaultInputHandlers, resolveKeyCommand } from "./handlers/keyboard";
import type { Command, CommandContext, InputHandler } from "./types";

/**
 * Turns one event into state changes and client calls. Resolves only after
 * every call the event triggered has completed.
 */
export class EventDispatcher {
  constructor(
    private readonly handlers: readonly InputHandler[] = createDefaultInputHandlers(),
  ) {}

  async dispatch(event: AppEvent, context: CommandContext): Promise<void> {
    switch (event.type) {
      case "tick":
        await this.run(new RefreshCommand(), context);
        return;

      case "key": {
        if (context.getState().ui.statusMessage !== null) {
          context.dispatch({ type: "CLEAR_STATUS_MESSAGE" });
        }
        const command = resolveKeyCommand(this.handlers, event, context);
        if (!command) return;
        log.debug(command.description, "dispatcher");
        await this.run(command, context);
        return;
      }

      case "resize":
        context.dispatch({
          type: "SET_TERMINAL_SIZE",
          payload: { rows: event.rows, cols: event.columns },
        });
        return;

      case "pointer":
        // No pointer bindings
        return;
    }
  }

  private async run(command: Command, context: CommandContext): Promise<void> {
    if (command.canExecute && !command.canExecute(context)) return;
    await command.execute(context);
  }
}
