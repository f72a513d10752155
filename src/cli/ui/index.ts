/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
export {
  csvField,
  formatCsvRow,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  TABLE_WIDTHS,
} from "./formatters";
export { cancel, color, error, info, intro, message, NAME, note, outro, step, success, VERSION, warn } from "./output";
export { isCancel, isInteractive, select } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

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
  message: output.message,
  select: prompts.select,
  isCancel: prompts.isCancel,
  isInteractive: prompts.isInteractive,
};
