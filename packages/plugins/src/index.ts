export { createHelpPlugin, HELP_REQUESTED } from "./help/index.js";
export { renderAppHelp, renderCommandHelp, renderGroupHelp, usageLine } from "./help/render.js";
export { createVersionPlugin, VERSION_REQUESTED } from "./version.js";
export { createNotFoundPlugin } from "./not-found.js";
export type { NotFoundOptions } from "./not-found.js";
