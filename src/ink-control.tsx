import { type Instance as InkInstance, render } from "ink";
import { ConsoleRoot } from "./components/ConsoleRoot";
import type { FrameRenderer } from "./services/main-loop";
import type { AppState } from "./state/app-state";
import type { InputEvent } from "./types/events";

export interface InkRendererOptions {
  onInput: (event: InputEvent) => void;
  logFilePath?: string | null;
  now?: () => number;
}

/**
 * Draws frames through a single Ink instance: mounted on the first frame,
 * re-rendered with each later snapshot.
 */
export class InkRenderer implements FrameRenderer {
  private inkInstance: InkInstance | null = null;
  private readonly now: () => number;

  constructor(private readonly options: InkRendererOptions) {
    this.now = options.now ?? (() => Date.now());
  }

  render(state: AppState): void {
    const tree = (
      <ConsoleRoot
        state={state}
        now={this.now()}
        onInput={this.options.onInput}
        logFilePath={this.options.logFilePath}
      />
    );

    if (this.inkInstance) {
      this.inkInstance.rerender(tree);
      return;
    }

    this.inkInstance = render(tree, {
      exitOnCtrlC: false,
      patchConsole: false,
    });
  }

  // Unmounting hands stdin back in cooked mode
  unmount(): void {
    this.inkInstance?.unmount();
    this.inkInstance = null;
  }
}
