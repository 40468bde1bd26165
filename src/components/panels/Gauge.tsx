import { Box, Text } from "ink";
import type React from "react";
import { clamp01 } from "../../selectors/dashboard";

interface GaugeProps {
  label: string;
  ratio: number;
  color: string;
  width?: number;
}

export function gaugeBar(ratio: number, width: number): string {
  const filled = Math.round(clamp01(ratio) * width);
  return `${"█".repeat(filled)}${"░".repeat(width - filled)}`;
}

export const Gauge: React.FC<GaugeProps> = ({ label, ratio, color, width = 24 }) => (
  <Box flexDirection="column">
    <Text wrap="truncate-end">{label}</Text>
    <Text color={color}>{gaugeBar(ratio, width)}</Text>
  </Box>
);
