import { Text } from "ink";
import type React from "react";
import { daemonStateLabel } from "../../selectors/dashboard";
import type { DaemonStatus } from "../../types/domain";
import { colorForState, formatDuration } from "../../utils/formatters";
import { Panel } from "./Panel";

interface StatusPanelProps {
  status: DaemonStatus | null;
  focused: boolean;
}

export const StatusPanel: React.FC<StatusPanelProps> = ({ status, focused }) => (
  <Panel title="Status" focused={focused}>
    {status ? (
      <>
        <Text wrap="truncate-end">
          State:{" "}
          <Text bold {...colorForState(status.state)}>
            {daemonStateLabel(status)}
          </Text>
        </Text>
        <Text wrap="truncate-end">Version: {status.version || "N/A"}</Text>
        <Text wrap="truncate-end">Uptime: {formatDuration(status.uptimeSeconds)}</Text>
        <Text wrap="wrap">Message: {status.message}</Text>
      </>
    ) : (
      <Text dimColor>No data available</Text>
    )}
  </Panel>
);
