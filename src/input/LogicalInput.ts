/** Logical menu inputs as bit flags. Several may be set in one mask. */
export enum LogicalInputs {
  Up = 1 << 0,
  Down = 1 << 1,
  Left = 1 << 2,
  Right = 1 << 3,
  Select = 1 << 4,
  Cancel = 1 << 5,
}
