/**
 * @srvdeck/shared — Barrel Export
 *
 * Single entry point for shared constants, configuration and host detection.
 */

export * from './constants.js';
export * from './config/config-store.js';
export * from './system/os-detect.js';
export * from './utils/error-message.js';
