import type { Command, CommandContext } from "./types";

export class FocusCommand implements Command {
  constructor(private readonly direction: "next" | "prev") {}

  get description() {
    return this.direction === "next"
      ? "Focus the next panel"
      : "Focus the previous panel";
  }

  execute({ dispatch }: CommandContext): void {
    dispatch({ type: this.direction === "next" ? "FOCUS_NEXT" : "FOCUS_PREV" });
  }
}

export class MoveSelectionCommand implements Command {
  constructor(private readonly direction: "up" | "down") {}

  get description() {
    return `Move the control selection ${this.direction}`;
  }

  execute({ dispatch }: CommandContext): void {
    dispatch({
      type: this.direction === "up" ? "SELECT_PREV_ACTION" : "SELECT_NEXT_ACTION",
    });
  }
}

export class ScrollLogsCommand implements Command {
  constructor(private readonly direction: "up" | "down") {}

  get description() {
    return `Scroll the activity log ${this.direction}`;
  }

  execute({ dispatch }: CommandContext): void {
    dispatch({
      type: this.direction === "up" ? "SCROLL_LOGS_UP" : "SCROLL_LOGS_DOWN",
    });
  }
}
