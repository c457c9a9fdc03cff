/**
 * @srvdeck/core — Provider Templates
 *
 * Configuration files and scripts shipped next to the providers. Plans
 * reference them by absolute path so the shell can copy or run them.
 */

import { fileURLToPath } from 'node:url';

export const TEMPLATE_NAMES = ['jail.local', '20auto-upgrades', '50unattended-upgrades', 'security-summary.sh'] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export function templatePath(name: TemplateName): string {
    return fileURLToPath(new URL(`./templates/${name}`, import.meta.url));
}
