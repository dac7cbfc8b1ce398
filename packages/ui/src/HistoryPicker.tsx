import React, { useReducer, useState } from "react";
import { Box, Text, useApp, useInput } from "ink";
import type { HistoryEntry } from "../../core/models/HistoryEntry";
import { formatRow } from "./format";
import { initialPickerState, pickerReducer, visibleWindow } from "./navigation";

export type HistoryPickerProps = {
  entries: readonly HistoryEntry[];
  /** Called with the chosen entry right before the picker exits */
  onSelect: (entry: HistoryEntry) => void;
  onClear: () => void;
  /** Re-read the history; the picker shows what it returns */
  onRefresh: () => readonly HistoryEntry[];
  windowSize?: number;
};

export const HistoryPicker = ({
  entries,
  onSelect,
  onClear,
  onRefresh,
  windowSize = 15,
}: HistoryPickerProps) => {
  const { exit } = useApp();
  const [items, setItems] = useState(entries);
  const [state, dispatch] = useReducer(pickerReducer, initialPickerState);

  useInput((input, key) => {
    if (state.confirmingClear) {
      if (input === "y") {
        onClear();
        setItems([]);
        dispatch({ type: "reset" });
      } else if (input === "n" || key.escape) {
        dispatch({ type: "cancelClear" });
      }
      return;
    }

    if (key.upArrow || input === "k") {
      dispatch({ type: "up" });
    } else if (key.downArrow || input === "j") {
      dispatch({ type: "down", count: items.length });
    } else if (key.return) {
      const entry = items[state.selected];
      if (!entry) return;
      onSelect(entry);
      exit();
    } else if (key.escape || input === "q") {
      exit();
    } else if (input === "c" && items.length > 0) {
      dispatch({ type: "askClear" });
    } else if (input === "r") {
      setItems(onRefresh());
      dispatch({ type: "reset" });
    }
  });

  const { start, end } = visibleWindow(state.selected, items.length, windowSize);

  return (
    <Box flexDirection="column">
      <Text bold>Clipboard History</Text>
      {items.length === 0 && <Text dimColor>No clipboard history.</Text>}
      {start > 0 && <Text dimColor>  ↑ {start} more</Text>}
      {items.slice(start, end).map((entry, i) => {
        const index = start + i;
        const selected = index === state.selected;
        return (
          <Text key={`${index}-${entry.timestamp}`} color={selected ? "cyan" : undefined}>
            {selected ? "›" : " "} {formatRow(entry)}
          </Text>
        );
      })}
      {end < items.length && <Text dimColor>  ↓ {items.length - end} more</Text>}
      {state.confirmingClear ? (
        <Text color="yellow">Clear all clipboard history? (y/n)</Text>
      ) : (
        <Text dimColor>↑/↓ move · Enter paste · c clear · r refresh · Esc close</Text>
      )}
    </Box>
  );
};
