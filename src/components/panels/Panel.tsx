import { Box, Text } from "ink";
import type React from "react";

interface PanelProps {
  title: string;
  focused?: boolean;
  width?: number | string;
  flexGrow?: number;
  children?: React.ReactNode;
}

export const Panel: React.FC<PanelProps> = ({
  title,
  focused = false,
  width,
  flexGrow = 1,
  children,
}) => (
  <Box
    flexDirection="column"
    borderStyle="round"
    borderColor={focused ? "yellow" : "white"}
    paddingX={1}
    width={width}
    flexGrow={flexGrow}
    overflow="hidden"
  >
    <Text bold color={focused ? "yellow" : undefined} wrap="truncate-end">
      {title}
    </Text>
    {children}
  </Box>
);
