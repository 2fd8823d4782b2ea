/**
 * CLI UI module exports
 */

export type { SummaryItem } from "./formatters";
// Formatters
export { formatSummary, formatTableRow, formatTableSeparator, TABLE_WIDTHS } from "./formatters";
// Output
export {
  color,
  error,
  info,
  intro,
  LOGO,
  message,
  note,
  outro,
  step,
  VERSION,
  warn,
} from "./output";
// Prompts
export { confirmRemoval } from "./prompts";

import * as output from "./output";
import * as prompts from "./prompts";

export const ui = {
  intro: output.intro,
  outro: output.outro,
  note: output.note,
  info: output.info,
  warn: output.warn,
  error: output.error,
  step: output.step,
  message: output.message,
  confirmRemoval: prompts.confirmRemoval,
};
