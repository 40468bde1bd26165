import { describe, expect, test } from "vitest";
import { type InkKey, keyEventFromInk } from "../../components/InputBridge";
import { charKey, namedKey } from "../../types/events";

function key(overrides: Partial<InkKey> = {}): InkKey {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    pageUp: false,
    pageDown: false,
    return: false,
    escape: false,
    tab: false,
    backspace: false,
    delete: false,
    ctrl: false,
    shift: false,
    meta: false,
    ...overrides,
  };
}

describe("keyEventFromInk", () => {
  test("printable characters", () => {
    expect(keyEventFromInk("q", key())).toEqual(charKey("q"));
    expect(keyEventFromInk("C", key({ shift: true }))).toEqual(charKey("C", { shift: true }));
  });

  test("ctrl combinations keep the letter", () => {
    expect(keyEventFromInk("c", key({ ctrl: true }))).toEqual(charKey("c", { ctrl: true }));
  });

  test("named keys", () => {
    expect(keyEventFromInk("", key({ upArrow: true }))).toEqual(namedKey("up"));
    expect(keyEventFromInk("", key({ downArrow: true }))).toEqual(namedKey("down"));
    expect(keyEventFromInk("\r", key({ return: true }))).toEqual(namedKey("enter"));
    expect(keyEventFromInk("", key({ escape: true }))).toEqual(namedKey("escape"));
  });

  test("shift+tab is back-tab", () => {
    expect(keyEventFromInk("\t", key({ tab: true }))).toEqual(namedKey("tab"));
    expect(keyEventFromInk("", key({ tab: true, shift: true }))).toEqual(
      namedKey("backTab", { shift: true }),
    );
  });
});
