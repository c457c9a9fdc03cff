/**
 * @srvdeck/tui — Line Styling
 *
 * Colour for report and log lines, picked from their leading marker.
 */

export interface LineStyle {
    readonly color: string;
    readonly bold: boolean;
    readonly dim: boolean;
}

const PLAIN: LineStyle = { color: 'white', bold: false, dim: false };

export function reportLineStyle(line: string): LineStyle {
    if (line.startsWith('===')) return { color: 'cyan', bold: true, dim: false };
    if (line.startsWith('🔧') || line.startsWith('📊') || line.startsWith('💻')) {
        return { color: 'cyan', bold: true, dim: false };
    }
    if (line.startsWith('✅') || line.startsWith('🟢')) return { color: 'green', bold: false, dim: false };
    if (line.startsWith('❌') || line.startsWith('🔴')) return { color: 'red', bold: false, dim: false };
    if (line.startsWith('⚠️')) return { color: 'yellow', bold: false, dim: false };
    if (line.startsWith('  ')) return { color: 'gray', bold: false, dim: true };
    return PLAIN;
}

/** Command log lines, by field and severity */
export function logLineStyle(line: string): LineStyle {
    if (line.startsWith('STATUS: FAILED') || line.startsWith('ERROR:')) return { color: 'red', bold: true, dim: false };
    if (line.startsWith('STATUS: SUCCESS')) return { color: 'green', bold: true, dim: false };
    if (line.startsWith('=== ')) return { color: 'cyan', bold: false, dim: true };
    if (line.startsWith('COMMAND:')) return { color: 'yellow', bold: false, dim: false };
    if (/^(TIMESTAMP|START_TIME|END_TIME|DURATION|EXIT_CODE|OUTPUT):/.test(line)) {
        return { color: 'gray', bold: false, dim: false };
    }
    if (/\b(error|failed|fatal)\b/i.test(line)) return { color: 'red', bold: false, dim: false };
    if (/\bwarn(ing)?\b/i.test(line)) return { color: 'yellow', bold: false, dim: false };
    return PLAIN;
}
