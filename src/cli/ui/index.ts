/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export {
  formatAction,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
  truncate,
} from "./formatters";
// Output
export {
  cancel,
  color,
  error,
  info,
  intro,
  LOGO,
  note,
  outro,
  step,
  success,
  VERSION,
  warn,
} from "./output";

import * as output from "./output";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  cancel: output.cancel,
  note: output.note,
  info: output.info,
  success: output.success,
  warn: output.warn,
  error: output.error,
  step: output.step,
};
