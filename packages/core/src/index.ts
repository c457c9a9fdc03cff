/**
 * @srvdeck/core — Barrel Export
 *
 * The view-navigation and command-execution engine, the command
 * providers, form models, the command log and the monitoring client.
 */

export * from './errors.js';

// Engine
export * from './engine/execution-queue.js';
export * from './engine/queue-driver.js';
export * from './engine/command-runner.js';
export * from './engine/scripted-runner.js';
export * from './engine/completion-bridge.js';
export * from './engine/batch.js';
export * from './engine/effects.js';
export * from './engine/messages.js';
export * from './engine/navigation.js';
export * from './engine/view.js';
export * from './engine/shared-context.js';
export * from './engine/controller.js';
export * from './engine/program.js';

// Providers
export * from './providers/plan.js';
export * from './providers/install.js';
export * from './providers/services.js';
export * from './providers/mysql-backup.js';
export * from './providers/security.js';
export * from './providers/sites.js';
export * from './providers/system-status.js';
export * from './providers/templates.js';

// Forms
export * from './forms/validation.js';
export * from './forms/form-model.js';
export * from './forms/form-definitions.js';

export * from './logging/command-logger.js';
export * from './monitoring/metrics-client.js';
