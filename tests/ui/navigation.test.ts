import { initialPickerState, pickerReducer, visibleWindow } from "../../packages/ui/src/navigation";

describe("pickerReducer", () => {
  test("moves within bounds", () => {
    let state = pickerReducer(initialPickerState, { type: "up" });
    expect(state.selected).toBe(0);
    state = pickerReducer(state, { type: "down", count: 2 });
    expect(state.selected).toBe(1);
    state = pickerReducer(state, { type: "down", count: 2 });
    expect(state.selected).toBe(1);
    state = pickerReducer(state, { type: "up" });
    expect(state.selected).toBe(0);
  });

  test("stays at zero on an empty list", () => {
    expect(pickerReducer(initialPickerState, { type: "down", count: 0 }).selected).toBe(0);
  });

  test("tracks the clear confirmation", () => {
    const asking = pickerReducer({ selected: 3, confirmingClear: false }, { type: "askClear" });
    expect(asking).toEqual({ selected: 3, confirmingClear: true });
    expect(pickerReducer(asking, { type: "cancelClear" })).toEqual({ selected: 3, confirmingClear: false });
    expect(pickerReducer(asking, { type: "reset" })).toEqual(initialPickerState);
  });
});

describe("visibleWindow", () => {
  test("shows everything when it fits", () => {
    expect(visibleWindow(3, 5, 10)).toEqual({ start: 0, end: 5 });
  });

  test("centres the selection", () => {
    expect(visibleWindow(10, 20, 5)).toEqual({ start: 8, end: 13 });
  });

  test("clamps at both ends", () => {
    expect(visibleWindow(0, 20, 5)).toEqual({ start: 0, end: 5 });
    expect(visibleWindow(19, 20, 5)).toEqual({ start: 15, end: 20 });
  });
});
