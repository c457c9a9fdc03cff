/**
 * @srvdeck/core — Security Provider
 *
 * Hardening plans (SSH, firewall, Fail2ban, automatic updates) and a
 * read-only assessment. Assessment steps never fail on a missing tool:
 * they report it instead, so the queue always runs to the summary.
 */

import { z } from 'zod';
import type { OsFamily } from '@srvdeck/shared';
import { ConfigurationError, ProviderError } from '../errors.js';
import { planOf, shellQuote, type CommandPlan } from './plan.js';
import { templatePath } from './templates.js';

// ─── Schema ───────────────────────────────────────────────────────

export const SecurityHardeningSchema = z.object({
    /** Leave unset to keep port 22 */
    sshPort: z
        .number()
        .int()
        .min(1024, 'SSH port must be between 1024 and 65535')
        .max(65535, 'SSH port must be between 1024 and 65535')
        .optional(),
    disableRootLogin: z.boolean().default(true),
    disablePasswordAuth: z.boolean().default(false),
    firewall: z.boolean().default(true),
    fail2ban: z.boolean().default(true),
    autoUpdates: z.boolean().default(true),
});

export type SecurityHardeningInput = z.input<typeof SecurityHardeningSchema>;
export type SecurityHardeningConfig = z.output<typeof SecurityHardeningSchema>;

const SSHD_CONFIG = '/etc/ssh/sshd_config';

const SSH_DIRECTIVES = [
    'MaxAuthTries 3',
    'ClientAliveInterval 300',
    'ClientAliveCountMax 2',
    'X11Forwarding no',
    'PermitEmptyPasswords no',
] as const;

type Step = [string, string];

function compactStamp(now: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}-${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

/** Set `key value` in sshd_config, uncommenting or appending as needed. */
function sshdSet(key: string, value: string): string {
    return `sudo sed -i -E 's/^#?${key} .*/${key} ${value}/' ${SSHD_CONFIG} && (grep -q '^${key} ' ${SSHD_CONFIG} || echo '${key} ${value}' | sudo tee -a ${SSHD_CONFIG} > /dev/null)`;
}

// ─── Sections ─────────────────────────────────────────────────────

function sshSteps(config: SecurityHardeningConfig, os: 'ubuntu' | 'fedora', now: Date): Step[] {
    const steps: Step[] = [
        [`sudo cp ${SSHD_CONFIG} ${SSHD_CONFIG}.backup.${compactStamp(now)}`, 'Backing up SSH configuration...'],
    ];
    if (config.sshPort !== undefined) {
        steps.push([sshdSet('Port', String(config.sshPort)), `Changing SSH port to ${config.sshPort}...`]);
    }
    if (config.disableRootLogin) {
        steps.push([sshdSet('PermitRootLogin', 'no'), 'Disabling SSH root login...']);
    }
    if (config.disablePasswordAuth) {
        steps.push([sshdSet('PasswordAuthentication', 'no'), 'Disabling SSH password authentication...']);
    }
    for (const directive of SSH_DIRECTIVES) {
        const [key = directive] = directive.split(' ');
        steps.push([
            `grep -q '^${key} ' ${SSHD_CONFIG} || echo '${directive}' | sudo tee -a ${SSHD_CONFIG} > /dev/null`,
            `Configuring SSH: ${directive}...`,
        ]);
    }
    steps.push(['sudo sshd -t', 'Testing SSH configuration...']);
    steps.push([`sudo systemctl restart ${os === 'ubuntu' ? 'ssh' : 'sshd'}`, 'Restarting SSH service...']);
    return steps;
}

function firewallSteps(sshPort: number, os: 'ubuntu' | 'fedora'): Step[] {
    if (os === 'fedora') {
        return [
            ['sudo dnf install -y firewalld', 'Installing firewalld...'],
            ['sudo systemctl enable --now firewalld', 'Starting firewalld...'],
            [`sudo firewall-cmd --permanent --add-port=${sshPort}/tcp`, `Allowing SSH on port ${sshPort}...`],
            ['sudo firewall-cmd --permanent --add-service=http --add-service=https', 'Allowing HTTP and HTTPS traffic...'],
            ['sudo firewall-cmd --reload', 'Reloading firewall rules...'],
        ];
    }
    return [
        ['command -v ufw > /dev/null || (sudo apt-get update && sudo apt-get install -y ufw)', 'Installing UFW firewall if needed...'],
        ['sudo ufw default deny incoming && sudo ufw default allow outgoing', 'Setting default firewall policies...'],
        [`sudo ufw allow ${sshPort}/tcp comment 'SSH'`, `Allowing SSH on port ${sshPort}...`],
        ["sudo ufw allow 80/tcp comment 'HTTP' && sudo ufw allow 443/tcp comment 'HTTPS'", 'Allowing HTTP and HTTPS traffic...'],
        ['sudo ufw --force enable', 'Enabling firewall...'],
        ['sudo ufw status verbose', 'Displaying firewall status...'],
    ];
}

function fail2banSteps(sshPort: number, os: 'ubuntu' | 'fedora'): Step[] {
    const install = os === 'ubuntu' ? 'sudo apt-get install -y fail2ban' : 'sudo dnf install -y fail2ban';
    const port = sshPort === 22 ? 'ssh' : String(sshPort);
    return [
        [install, 'Installing Fail2ban...'],
        [
            `sed 's/^port = ssh$/port = ${port}/' ${shellQuote(templatePath('jail.local'))} | sudo tee /etc/fail2ban/jail.local > /dev/null`,
            'Creating Fail2ban jail configuration...',
        ],
        ['sudo systemctl enable fail2ban && sudo systemctl restart fail2ban', 'Starting and enabling Fail2ban...'],
        ['sudo fail2ban-client status', 'Checking Fail2ban jail status...'],
    ];
}

function autoUpdateSteps(os: 'ubuntu' | 'fedora'): Step[] {
    if (os === 'fedora') {
        return [
            ['sudo dnf install -y dnf-automatic', 'Installing automatic updates package...'],
            ['sudo systemctl enable --now dnf-automatic.timer', 'Enabling automatic security updates...'],
        ];
    }
    return [
        ['sudo apt-get install -y unattended-upgrades apt-listchanges', 'Installing automatic updates package...'],
        [
            `sudo install -m 644 ${shellQuote(templatePath('20auto-upgrades'))} /etc/apt/apt.conf.d/20auto-upgrades`,
            'Configuring automatic updates...',
        ],
        [
            `sudo install -m 644 ${shellQuote(templatePath('50unattended-upgrades'))} /etc/apt/apt.conf.d/50unattended-upgrades`,
            'Configuring security update policies...',
        ],
        ['sudo systemctl enable --now unattended-upgrades', 'Enabling automatic security updates...'],
    ];
}

// ─── Plans ────────────────────────────────────────────────────────

export function parseSecurityHardening(input: SecurityHardeningInput): SecurityHardeningConfig {
    const parsed = SecurityHardeningSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues[0]?.message ?? 'invalid security configuration');
    }
    return parsed.data;
}

export function planSecurityHardening(
    input: SecurityHardeningInput,
    os: OsFamily,
    now: Date = new Date(),
): CommandPlan {
    if (os === 'unknown') {
        throw new ProviderError(`unsupported operating system: ${os}`);
    }
    const config = parseSecurityHardening(input);
    const sshPort = config.sshPort ?? 22;

    const steps: Step[] = [...sshSteps(config, os, now)];
    if (config.firewall) steps.push(...firewallSteps(sshPort, os));
    if (config.fail2ban) steps.push(...fail2banSteps(sshPort, os));
    if (config.autoUpdates) steps.push(...autoUpdateSteps(os));

    return planOf('Security hardening', steps);
}

export function planSecurityAssessment(): CommandPlan {
    return planOf('Security assessment', [
        [
            `grep -E '^#?(PermitRootLogin|PasswordAuthentication|Port) ' ${SSHD_CONFIG} 2>/dev/null || echo '⚠️  sshd_config not readable (using defaults)'`,
            'Checking SSH daemon configuration...',
        ],
        [
            `if [ -f ~/.ssh/authorized_keys ]; then echo "✅ SSH keys: $(wc -l < ~/.ssh/authorized_keys) key(s) configured"; else echo '❌ SSH keys: No authorized keys found'; fi`,
            'Checking SSH key authentication...',
        ],
        [
            `if command -v ufw >/dev/null 2>&1; then sudo -n ufw status verbose 2>/dev/null || echo '⚠️  UFW installed (status needs sudo)'; elif command -v firewall-cmd >/dev/null 2>&1; then firewall-cmd --state 2>&1 || true; else echo '❌ Firewall: Not installed'; fi`,
            'Checking firewall status...',
        ],
        [
            `if systemctl is-active fail2ban >/dev/null 2>&1; then echo '✅ Fail2ban: Active'; else echo '❌ Fail2ban: Not running'; fi`,
            'Checking Fail2ban intrusion detection...',
        ],
        [
            `(ss -tuln 2>/dev/null || netstat -tuln 2>/dev/null || echo 'ss/netstat unavailable') | head -15`,
            'Scanning for listening network ports...',
        ],
        [
            `awk -F: '$3 >= 1000 && $3 < 65534 {print "  📋 " $1}' /etc/passwd`,
            'Checking regular user accounts...',
        ],
        [`bash ${shellQuote(templatePath('security-summary.sh'))}`, 'Analyzing security posture...'],
    ]);
}
