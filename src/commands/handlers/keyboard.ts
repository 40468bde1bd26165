import type { NamedKey, KeyInputEvent } from "../../types/events";
import {
  ConnectCommand,
  DisconnectCommand,
  ExecuteActionCommand,
} from "../daemon";
import { FocusCommand, MoveSelectionCommand, ScrollLogsCommand } from "../navigation";
import { QuitCommand } from "../system";
import type { Command, CommandContext, InputHandler } from "../types";

export function isChar(event: KeyInputEvent, ...chars: string[]): boolean {
  return event.code.kind === "char" && chars.includes(event.code.char);
}

export function isNamed(event: KeyInputEvent, name: NamedKey): boolean {
  return event.code.kind === "named" && event.code.name === name;
}

function isUp(event: KeyInputEvent): boolean {
  return isNamed(event, "up") || isChar(event, "k");
}

function isDown(event: KeyInputEvent): boolean {
  return isNamed(event, "down") || isChar(event, "j");
}

/**
 * Bindings that apply whatever panel has focus. Checked in this order:
 * quit, Ctrl+C, focus next, focus previous, connect, disconnect.
 */
export class GlobalInputHandler implements InputHandler {
  priority = 100;

  canHandle(): boolean {
    return true;
  }

  handleInput(event: KeyInputEvent): Command | null {
    if (isChar(event, "q", "Q")) return new QuitCommand();
    if (event.modifiers.ctrl && isChar(event, "c")) return new QuitCommand();
    if (isNamed(event, "tab")) return new FocusCommand("next");
    if (isNamed(event, "backTab")) return new FocusCommand("prev");
    if (isChar(event, "c", "C")) return new ConnectCommand();
    if (isChar(event, "d", "D")) return new DisconnectCommand();
    return null;
  }
}

export class ControlsInputHandler implements InputHandler {
  priority = 10;

  canHandle(context: CommandContext): boolean {
    return context.getState().navigation.focusedPanel === "controls";
  }

  handleInput(event: KeyInputEvent): Command | null {
    if (isUp(event)) return new MoveSelectionCommand("up");
    if (isDown(event)) return new MoveSelectionCommand("down");
    if (isNamed(event, "enter")) return new ExecuteActionCommand();
    return null;
  }
}

export class LogsInputHandler implements InputHandler {
  priority = 10;

  canHandle(context: CommandContext): boolean {
    return context.getState().navigation.focusedPanel === "logs";
  }

  handleInput(event: KeyInputEvent): Command | null {
    if (isUp(event)) return new ScrollLogsCommand("up");
    if (isDown(event)) return new ScrollLogsCommand("down");
    return null;
  }
}

export function createDefaultInputHandlers(): InputHandler[] {
  return [
    new GlobalInputHandler(),
    new ControlsInputHandler(),
    new LogsInputHandler(),
  ];
}

/**
 * First command bound to the key, asking handlers by descending priority
 */
export function resolveKeyCommand(
  handlers: readonly InputHandler[],
  event: KeyInputEvent,
  context: CommandContext,
): Command | null {
  const ordered = [...handlers].sort((a, b) => b.priority - a.priority);
  for (const handler of ordered) {
    if (!handler.canHandle(context)) continue;
    const command = handler.handleInput(event, context);
    if (command) return command;
  }
  return null;
}
