export type NamedKey =
  | "up"
  | "down"
  | "left"
  | "right"
  | "pageUp"
  | "pageDown"
  | "enter"
  | "escape"
  | "tab"
  | "backTab"
  | "backspace"
  | "delete";

export type KeyCode =
  | { kind: "char"; char: string }
  | { kind: "named"; name: NamedKey };

export type KeyModifiers = Readonly<{
  ctrl: boolean;
  shift: boolean;
  meta: boolean;
}>;

export type KeyInputEvent = {
  type: "key";
  code: KeyCode;
  modifiers: KeyModifiers;
};

export type PointerInputEvent = {
  type: "pointer";
  action: "down" | "up" | "move" | "scrollUp" | "scrollDown";
  column: number;
  row: number;
};

export type ResizeEvent = {
  type: "resize";
  columns: number;
  rows: number;
};

export type TickEvent = { type: "tick" };

export type InputEvent = KeyInputEvent | PointerInputEvent | ResizeEvent;

export type AppEvent = TickEvent | InputEvent;

export const NO_MODIFIERS: KeyModifiers = Object.freeze({
  ctrl: false,
  shift: false,
  meta: false,
});

export function charKey(
  char: string,
  modifiers: Partial<KeyModifiers> = {},
): KeyInputEvent {
  return {
    type: "key",
    code: { kind: "char", char },
    modifiers: { ...NO_MODIFIERS, ...modifiers },
  };
}

export function namedKey(
  name: NamedKey,
  modifiers: Partial<KeyModifiers> = {},
): KeyInputEvent {
  return {
    type: "key",
    code: { kind: "named", name },
    modifiers: { ...NO_MODIFIERS, ...modifiers },
  };
}
