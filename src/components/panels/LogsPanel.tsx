import { Text } from "ink";
import type React from "react";
import type { LogEntry } from "../../types/domain";
import { colorForLevel } from "../../utils/formatters";
import { Panel } from "./Panel";

interface LogsPanelProps {
  entries: readonly LogEntry[];
  total: number;
  focused: boolean;
  width?: number | string;
}

export const LogsPanel: React.FC<LogsPanelProps> = ({
  entries,
  total,
  focused,
  width,
}) => (
  <Panel title={`Logs (${total})`} focused={focused} width={width}>
    {entries.map((entry, i) => (
      <Text key={`${i}-${entry.timestamp}`} wrap="truncate-end">
        <Text dimColor>[{entry.timestamp}] </Text>
        <Text color={colorForLevel(entry.level)}>{entry.level.padEnd(5)} </Text>
        {entry.message}
      </Text>
    ))}
  </Panel>
);
