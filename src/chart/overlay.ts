/**
 * ChartOverlay - transient hint shown over the chart
 * ("use Ctrl + scroll to zoom", "use two fingers to move")
 */

import { ScheduledTask, Scheduler, timeoutScheduler } from './scheduler.js';

/**
 * What the canvas needs from an overlay
 */
export interface HintOverlay {
    /** Fade in over `duration` ms, then call `onShown` */
    show(text: string, duration?: number, onShown?: () => void): void;
    /** Wait `delay` ms, then fade out over `duration` ms */
    hide(delay?: number, duration?: number): void;
}

export class ChartOverlay implements HintOverlay {
    private readonly element: HTMLDivElement;
    private readonly tooltip: HTMLParagraphElement;

    // Every show/hide cancels what the previous call left scheduled,
    // so a late hide can no longer blank out a fresh hint
    private pending: ScheduledTask[] = [];

    constructor(container: HTMLElement, private readonly scheduler: Scheduler = timeoutScheduler) {
        const doc = container.ownerDocument;

        this.element = doc.createElement('div');
        this.element.className = 'overlay';
        this.element.style.opacity = '0';

        this.tooltip = doc.createElement('p');
        this.tooltip.className = 'tooltip';

        this.element.appendChild(this.tooltip);
        container.appendChild(this.element);
    }

    show(text: string, duration: number = 0, onShown?: () => void): void {
        this.cancelPending();

        this.tooltip.textContent = text;
        this.fade(1, duration);

        if (onShown) {
            this.later(onShown, duration);
        }
    }

    hide(delay: number = 0, duration: number = 0): void {
        this.cancelPending();

        if (delay > 0) {
            this.later(() => this.fade(0, duration), delay);
        } else {
            this.fade(0, duration);
        }
    }

    isVisible(): boolean {
        return this.element.style.opacity !== '0';
    }

    get text(): string {
        return this.tooltip.textContent ?? '';
    }

    get node(): HTMLDivElement {
        return this.element;
    }

    private fade(opacity: number, duration: number): void {
        this.element.style.transition = duration > 0 ? `opacity ${duration}ms` : '';
        this.element.style.opacity = String(opacity);
    }

    private later(task: () => void, delay: number): void {
        const scheduled = this.scheduler.schedule(() => {
            this.pending = this.pending.filter(p => p !== scheduled);
            task();
        }, delay);
        this.pending.push(scheduled);
    }

    private cancelPending(): void {
        this.pending.forEach(task => task.cancel());
        this.pending = [];
    }
}
