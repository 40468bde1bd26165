import { Box, Text } from "ink";
import React from "react";
import { logReactError } from "../services/error-handler";

interface ErrorBoundaryState {
  error: Error | null;
}

interface ErrorBoundaryProps {
  children: React.ReactNode;
  logFilePath?: string | null;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): Partial<ErrorBoundaryState> {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    logReactError(error, errorInfo);
  }

  render() {
    if (this.state.error) {
      return <ErrorDisplay error={this.state.error} logFilePath={this.props.logFilePath ?? null} />;
    }

    return this.props.children;
  }
}

function ErrorDisplay({ error, logFilePath }: { error: Error; logFilePath: string | null }) {
  return (
    <Box flexDirection="column">
      <Box
        flexDirection="column"
        borderStyle="round"
        borderColor="red"
        paddingX={2}
        paddingY={1}
      >
        <Box justifyContent="center" marginBottom={1}>
          <Text color="red" bold>Dashboard Error</Text>
        </Box>

        <Box flexDirection="column" marginBottom={1}>
          <Text color="red">Something went wrong while drawing the dashboard:</Text>
          <Text wrap="wrap">{error.message}</Text>
        </Box>

        {error.stack && (
          <Box flexDirection="column" marginBottom={1}>
            <Text color="gray" dimColor>Stack trace:</Text>
            <Text wrap="wrap" dimColor>{error.stack}</Text>
          </Box>
        )}

        <Text dimColor>
          {logFilePath
            ? `This error has been logged to ${logFilePath}`
            : "This error has been logged to the session log."}
        </Text>
      </Box>

      <Box paddingX={1} marginTop={1}>
        <Text>Press </Text>
        <Text color="cyan">q</Text>
        <Text dimColor> to exit</Text>
      </Box>
    </Box>
  );
}
