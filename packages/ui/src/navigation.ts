export type PickerState = {
  selected: number;
  confirmingClear: boolean;
};

export type PickerAction =
  | { type: "up" }
  | { type: "down"; count: number }
  | { type: "reset" }
  | { type: "askClear" }
  | { type: "cancelClear" };

export const initialPickerState: PickerState = { selected: 0, confirmingClear: false };

export function pickerReducer(state: PickerState, action: PickerAction): PickerState {
  switch (action.type) {
    case "up":
      return { ...state, selected: Math.max(0, state.selected - 1) };
    case "down":
      return { ...state, selected: Math.max(0, Math.min(action.count - 1, state.selected + 1)) };
    case "reset":
      return initialPickerState;
    case "askClear":
      return { ...state, confirmingClear: true };
    case "cancelClear":
      return { ...state, confirmingClear: false };
  }
}

export type VisibleWindow = { start: number; end: number };

/** Slice of the list to render so the selected row stays roughly centred. */
export function visibleWindow(selected: number, count: number, windowSize: number): VisibleWindow {
  if (windowSize <= 0 || windowSize >= count) return { start: 0, end: count };
  const start = Math.max(0, Math.min(selected - Math.floor(windowSize / 2), count - windowSize));
  return { start, end: start + windowSize };
}
