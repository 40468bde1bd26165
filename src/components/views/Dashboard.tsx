import { Box } from "ink";
import type React from "react";
import { visibleLogs } from "../../selectors/dashboard";
import type { AppState } from "../../state/app-state";
import { ControlsPanel } from "../panels/ControlsPanel";
import { LogsPanel } from "../panels/LogsPanel";
import { MetricsPanel } from "../panels/MetricsPanel";
import { StatusPanel } from "../panels/StatusPanel";
import { Footer } from "./Footer";
import { Header } from "./Header";

interface DashboardProps {
  state: AppState;
  now: number;
}

/**
 * Pure projection of one state snapshot to a frame
 */
export const Dashboard: React.FC<DashboardProps> = ({ state, now }) => {
  const { connection, navigation, activity, ui } = state;
  const focused = navigation.focusedPanel;

  return (
    <Box flexDirection="column" width={ui.terminal.cols} height={ui.terminal.rows}>
      <Header
        status={connection.status}
        address={state.address}
        runningSeconds={(now - state.startedAt) / 1000}
      />

      <Box flexDirection="row" flexGrow={1}>
        <Box flexDirection="column" width="40%">
          <StatusPanel status={connection.daemonStatus} focused={focused === "status"} />
          <MetricsPanel metrics={connection.daemonMetrics} />
        </Box>
        <ControlsPanel
          width="30%"
          selected={navigation.selectedAction}
          focused={focused === "controls"}
        />
        <LogsPanel
          width="30%"
          entries={visibleLogs(state)}
          total={activity.logs.length}
          focused={focused === "logs"}
        />
      </Box>

      <Footer message={ui.statusMessage} />
    </Box>
  );
};
