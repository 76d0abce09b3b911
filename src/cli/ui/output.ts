/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;

export const LOGO = String.raw`
   _____ __         ______ __ __
  / ___// /_  ___  / / __// //_/___  ___  ____  ___  _____
  \__ \/ __ \/ _ \/ / /_ / ,<  / _ \/ _ \/ __ \/ _ \/ ___/
 ___/ / / / /  __/ / __// /| |/  __/  __/ /_/ /  __/ /
/____/_/ /_/\___/_/_/  /_/ |_|\___/\___/ .___/\___/_/
                                      /_/
`;

/**
 * Logo, version and the command being run
 */
export function banner(command: string): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(
    `${color.cyan("ShelfKeeper")} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`,
  );
}

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
export const message = (message: string) => p.log.message(message);

export const spinner = p.spinner;

export const confirm = p.confirm;
export const select = p.select;
export const isCancel = p.isCancel;
