/**
 * @srvdeck/core — Field Validation
 *
 * zod schemas for the values operators type into forms, and the adapter
 * that turns a schema into a per-field validator returning the first
 * error message (or null).
 */

import { z } from 'zod';

export type FieldValidator = (value: string) => string | null;

export const SiteNameSchema = z
    .string()
    .min(2, 'site name must be at least 2 characters')
    .max(50, 'site name must be at most 50 characters')
    .regex(/^[\p{L}\p{N}_-]+$/u, 'site name can only contain letters, numbers, hyphens, and underscores');

export const DomainSchema = z
    .string()
    .min(1, 'domain is required')
    .max(253, 'domain name too long')
    .refine((value) => !/\s/.test(value), 'domain cannot contain spaces')
    .refine((value) => value.includes('.'), 'domain must contain at least one dot');

const GIT_SCHEMES = new Set(['https:', 'http:', 'git:']);

export const GitUrlSchema = z
    .string()
    .min(1, 'git URL is required')
    .superRefine((value, ctx) => {
        let url: URL;
        try {
            url = new URL(value);
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid URL format' });
            return;
        }
        if (!GIT_SCHEMES.has(url.protocol)) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'URL must use https, http, or git scheme' });
            return;
        }
        if (!value.includes('git')) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'URL does not appear to be a Git repository' });
        }
    });

export const BranchSchema = z.string().regex(/^[\w./-]+$/, 'branch name contains invalid characters');

export const PortSchema = z
    .string()
    .regex(/^\d+$/, 'port must be a number')
    .refine((value) => {
        const port = Number(value);
        return port >= 1024 && port <= 65535;
    }, 'port must be between 1024 and 65535');

export const EmailSchema = z.string().email('invalid email address');

export const UrlSchema = z.string().url('invalid URL');

/** First issue message, or null when the value passes. */
export function validatorFrom(schema: z.ZodType<unknown, z.ZodTypeDef, string>): FieldValidator {
    return (value) => {
        const result = schema.safeParse(value);
        return result.success ? null : (result.error.issues[0]?.message ?? 'invalid value');
    };
}

export const validateSiteName = validatorFrom(SiteNameSchema);
export const validateDomain = validatorFrom(DomainSchema);
export const validateGitUrl = validatorFrom(GitUrlSchema);
export const validateBranch = validatorFrom(BranchSchema);
export const validatePort = validatorFrom(PortSchema);
export const validateEmail = validatorFrom(EmailSchema);
export const validateUrl = validatorFrom(UrlSchema);
