import type React from "react";
import type { AppState } from "../state/app-state";
import type { InputEvent } from "../types/events";
import { ErrorBoundary } from "./ErrorBoundary";
import { InputBridge } from "./InputBridge";
import { Dashboard } from "./views/Dashboard";

interface ConsoleRootProps {
  state: AppState;
  now: number;
  onInput: (event: InputEvent) => void;
  logFilePath?: string | null;
}

// Input stays outside the boundary so 'q' still works after a render crash
export const ConsoleRoot: React.FC<ConsoleRootProps> = ({
  state,
  now,
  onInput,
  logFilePath,
}) => (
  <>
    <InputBridge onInput={onInput} />
    <ErrorBoundary logFilePath={logFilePath}>
      <Dashboard state={state} now={now} />
    </ErrorBoundary>
  </>
);
