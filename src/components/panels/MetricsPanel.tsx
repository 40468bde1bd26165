import { Box, Text } from "ink";
import type React from "react";
import { cpuGauge, memoryGauge } from "../../selectors/dashboard";
import type { DaemonMetrics } from "../../types/domain";
import { formatNumber } from "../../utils/formatters";
import { Gauge } from "./Gauge";
import { Panel } from "./Panel";

interface MetricsPanelProps {
  metrics: DaemonMetrics | null;
}

export const MetricsPanel: React.FC<MetricsPanelProps> = ({ metrics }) => {
  if (!metrics) {
    return (
      <Panel title="Metrics">
        <Text dimColor>No metrics available</Text>
      </Panel>
    );
  }

  const cpu = cpuGauge(metrics);
  const memory = memoryGauge(metrics);

  return (
    <Panel title="Metrics">
      <Gauge label={cpu.label} ratio={cpu.ratio} color="cyan" />
      <Gauge label={memory.label} ratio={memory.ratio} color="magenta" />
      <Box flexDirection="column" marginTop={1}>
        <Text>Connections: {formatNumber(metrics.connectionsActive)}</Text>
        <Text>Requests: {formatNumber(metrics.requestsTotal)}</Text>
        <Text>Errors: {formatNumber(metrics.errorsTotal)}</Text>
      </Box>
    </Panel>
  );
};
