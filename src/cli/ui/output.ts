/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;

export const LOGO = String.raw`
       _                _             _ _
  ___ | |__  ___       (_) __ _ _ __ (_) |_ ___  _ __
 / _ \| '_ \/ __|_____ | |/ _' | '_ \| | __/ _ \| '__|
|  __/| |_) \__ \_____|| | (_| | | | | | || (_) | |
 \___||_.__/|___/     _/ |\__,_|_| |_|_|\__\___/|_|
                     |__/
`;

export const intro = (title: string) => p.intro(color.bgCyan(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
export const message = (message: string) => p.log.message(message);
