import { Box, Text } from "ink";
import type React from "react";

const HINTS: ReadonlyArray<{ key: string; label: string; color: string }> = [
  { key: "q", label: "Quit", color: "red" },
  { key: "Tab", label: "Switch Panel", color: "cyan" },
  { key: "c", label: "Connect", color: "green" },
  { key: "d", label: "Disconnect", color: "red" },
  { key: "Enter", label: "Execute", color: "yellow" },
  { key: "j/k", label: "Navigate", color: "magenta" },
];

interface FooterProps {
  message: string | null;
}

export const Footer: React.FC<FooterProps> = ({ message }) => (
  <Box borderStyle="round" paddingX={1} flexShrink={0}>
    {message ? (
      <Text color="yellow" wrap="truncate-end">
        {message}
      </Text>
    ) : (
      <Text wrap="truncate-end">
        {HINTS.map((hint, i) => (
          <Text key={hint.key}>
            {i > 0 && <Text dimColor> • </Text>}
            <Text color={hint.color}>{hint.key}</Text> {hint.label}
          </Text>
        ))}
      </Text>
    )}
  </Box>
);
