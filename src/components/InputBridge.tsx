import { type Key, useInput } from "ink";
import type React from "react";
import type { InputEvent, KeyInputEvent, NamedKey } from "../types/events";

// The subset of Ink's key flags the console binds
export type InkKey = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "tab"
  | "backspace"
  | "delete"
  | "ctrl"
  | "shift"
  | "meta"
>;

function namedKeyFrom(key: InkKey): NamedKey | null {
  if (key.upArrow) return "up";
  if (key.downArrow) return "down";
  if (key.leftArrow) return "left";
  if (key.rightArrow) return "right";
  if (key.pageUp) return "pageUp";
  if (key.pageDown) return "pageDown";
  if (key.return) return "enter";
  if (key.escape) return "escape";
  if (key.tab) return key.shift ? "backTab" : "tab";
  if (key.backspace) return "backspace";
  if (key.delete) return "delete";
  return null;
}

export function keyEventFromInk(input: string, key: InkKey): KeyInputEvent {
  const name = namedKeyFrom(key);
  return {
    type: "key",
    code: name ? { kind: "named", name } : { kind: "char", char: input },
    modifiers: { ctrl: key.ctrl, shift: key.shift, meta: key.meta },
  };
}

interface InputBridgeProps {
  onInput: (event: InputEvent) => void;
}

/**
 * Render-less component that forwards terminal key presses
 */
export const InputBridge: React.FC<InputBridgeProps> = ({ onInput }) => {
  useInput((input, key) => {
    onInput(keyEventFromInk(input, key));
  });
  return null;
};
