import { Box, Text } from "ink";
import type React from "react";
import { connectionLabel } from "../../selectors/dashboard";
import type { ConnectionStatus } from "../../types/domain";
import { formatDuration } from "../../utils/formatters";

interface HeaderProps {
  status: ConnectionStatus;
  address: string;
  runningSeconds: number;
}

export const Header: React.FC<HeaderProps> = ({ status, address, runningSeconds }) => {
  const connection = connectionLabel(status);
  return (
    <Box borderStyle="round" borderColor="cyan" paddingX={1} flexShrink={0}>
      <Text wrap="truncate-end">
        <Text color="cyan" bold>
          Daemon Controller
        </Text>
        <Text dimColor> | </Text>
        <Text color={connection.color}>{connection.text}</Text>
        <Text dimColor> | </Text>
        <Text>{address}</Text>
        <Text dimColor> | up {formatDuration(runningSeconds)}</Text>
      </Text>
    </Box>
  );
};
