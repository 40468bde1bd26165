import { Text } from "ink";
import type React from "react";
import { CONTROL_ACTION_LABELS, CONTROL_ACTIONS } from "../../types/domain";
import { Panel } from "./Panel";

interface ControlsPanelProps {
  selected: number;
  focused: boolean;
  width?: number | string;
}

export const ControlsPanel: React.FC<ControlsPanelProps> = ({
  selected,
  focused,
  width,
}) => (
  <Panel title="Controls" focused={focused} width={width}>
    {CONTROL_ACTIONS.map((action, i) => {
      const isSelected = i === selected;
      return (
        <Text
          key={action}
          bold={isSelected}
          inverse={isSelected && focused}
          color={isSelected && !focused ? "yellow" : undefined}
        >
          {isSelected ? "›" : " "} {CONTROL_ACTION_LABELS[action]}{" "}
        </Text>
      );
    })}
  </Panel>
);
