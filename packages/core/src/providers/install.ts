/**
 * @srvdeck/core — Install Provider
 *
 * Install recipes for the core services, read from install-catalog.json.
 * Each service has per-OS steps (or one `any` list) and check commands
 * whose success means "already installed".
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { OsFamily } from '@srvdeck/shared';
import type { CommandRunner } from '../engine/command-runner.js';
import { ProviderError } from '../errors.js';
import type { CommandPlan } from './plan.js';

// ─── Catalog Schema ───────────────────────────────────────────────

const StepSchema = z.object({
    run: z.string().min(1),
    description: z.string().min(1),
});

const ServiceEntrySchema = z.object({
    label: z.string(),
    checks: z.array(z.string().min(1)).min(1),
    steps: z.object({
        ubuntu: z.array(StepSchema).optional(),
        fedora: z.array(StepSchema).optional(),
        any: z.array(StepSchema).optional(),
    }),
});

const InstallCatalogSchema = z.object({
    services: z.record(ServiceEntrySchema),
});

export type InstallCatalog = z.infer<typeof InstallCatalogSchema>;
export type ServiceEntry = z.infer<typeof ServiceEntrySchema>;

let cachedCatalog: InstallCatalog | undefined;

export function loadInstallCatalog(): InstallCatalog {
    if (cachedCatalog === undefined) {
        const raw: unknown = JSON.parse(readFileSync(new URL('./install-catalog.json', import.meta.url), 'utf-8'));
        cachedCatalog = InstallCatalogSchema.parse(raw);
    }
    return cachedCatalog;
}

/** Service keys in catalog order */
export function installableServices(catalog: InstallCatalog = loadInstallCatalog()): string[] {
    return Object.keys(catalog.services);
}

// ─── Planning ─────────────────────────────────────────────────────

export function planInstall(
    service: string,
    os: OsFamily,
    catalog: InstallCatalog = loadInstallCatalog(),
): CommandPlan {
    const entry = catalog.services[service];
    if (entry === undefined) {
        throw new ProviderError(`Unknown service: ${service}`);
    }

    const steps = (os === 'unknown' ? undefined : entry.steps[os]) ?? entry.steps.any;
    if (steps === undefined) {
        throw new ProviderError(`unsupported operating system: ${os}`);
    }

    return {
        label: entry.label,
        commands: steps.map((step) => ({ invocation: step.run, description: step.description })),
    };
}

// ─── Probing ──────────────────────────────────────────────────────

async function isInstalled(runner: CommandRunner, entry: ServiceEntry): Promise<boolean> {
    for (const check of entry.checks) {
        const result = await runner.run(check);
        if (result.exitCode === 0) return true;
    }
    return false;
}

/** service key → installed, checking every service concurrently */
export async function detectInstalledServices(
    runner: CommandRunner,
    catalog: InstallCatalog = loadInstallCatalog(),
): Promise<Record<string, boolean>> {
    const entries = Object.entries(catalog.services);
    const flags = await Promise.all(entries.map(([, entry]) => isInstalled(runner, entry)));
    return Object.fromEntries(entries.map(([key], i) => [key, flags[i] ?? false]));
}
