/**
 * CLI UI module exports
 */

import * as output from "./output";

export type { SummaryItem } from "./formatters";
export {
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  snapshotOption,
  TABLE_WIDTHS,
} from "./formatters";
export { banner, color, LOGO, VERSION } from "./output";

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
  spinner: output.spinner,
  confirm: output.confirm,
  select: output.select,
  isCancel: output.isCancel,
};
