import type { Command, CommandContext } from "./types";

export class QuitCommand implements Command {
  description = "Exit the console";

  execute(context: CommandContext): void {
    context.dispatch({ type: "QUIT" });
  }
}
