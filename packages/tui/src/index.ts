/**
 * @srvdeck/tui — Barrel Export
 */

export { launchConsole, type LaunchOptions } from './main.js';
export { createViews, type ViewOptions } from './views/registry.js';
