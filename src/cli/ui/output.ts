/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;

export const LOGO = String.raw`
  ___ ___ ___ ___  ____      _____ ___ ___
 / __| __| __|   \/ __\ \    / / __| __| _ \
 \__ \ _|| _|| |) \__ \\ \/\/ /| _|| _||  _/
 |___/___|___|___/|___/ \_/\_/ |___|___|_|
`;

export const intro = (title: string) => p.intro(color.bgGreen(color.black(` ${title} `)));
export const outro = (message: string) => p.outro(color.green(message));
export const cancel = (message: string) => p.cancel(message);
export const note = (message: string, title?: string) => p.note(message, title);

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const warn = (message: string) => p.log.warn(message);
export const error = (message: string) => p.log.error(message);
export const step = (message: string) => p.log.step(message);
