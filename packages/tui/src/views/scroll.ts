/**
 * @srvdeck/tui — Scroll State
 *
 * Vertical scrolling over a list of lines. In follow mode the window
 * stays pinned to the last line as lines are appended; scrolling up
 * leaves follow mode and scrolling back to the bottom re-enters it.
 */

export const PAGE_SIZE = 10;

export class ScrollState {
    private offset = 0;
    private follow: boolean;

    constructor(follow = false) {
        this.follow = follow;
    }

    get following(): boolean {
        return this.follow;
    }

    /** Index of the first visible line */
    top(total: number, height: number): number {
        const max = Math.max(0, total - height);
        return this.follow ? max : Math.min(this.offset, max);
    }

    reset(follow = false): void {
        this.offset = 0;
        this.follow = follow;
    }

    /** Apply a scroll key. Returns false for keys that are not scroll keys. */
    handle(label: string, total: number, height: number): boolean {
        const max = Math.max(0, total - height);
        const top = this.top(total, height);
        switch (label) {
            case 'up':
            case 'k':
                this.moveTo(top - 1, max);
                return true;
            case 'down':
            case 'j':
                this.moveTo(top + 1, max);
                return true;
            case 'pageup':
                this.moveTo(top - PAGE_SIZE, max);
                return true;
            case 'pagedown':
                this.moveTo(top + PAGE_SIZE, max);
                return true;
            case 'home':
            case 'g':
                this.moveTo(0, max);
                return true;
            case 'end':
            case 'G':
                this.moveTo(max, max);
                return true;
            default:
                return false;
        }
    }

    private moveTo(target: number, max: number): void {
        this.offset = Math.min(Math.max(0, target), max);
        this.follow = max > 0 && this.offset === max;
    }
}
