/**
 * Deferred tasks that can be cancelled before they run
 */

export interface ScheduledTask {
    cancel(): void;
}

export interface Scheduler {
    schedule(task: () => void, delay: number): ScheduledTask;
}

export const timeoutScheduler: Scheduler = {
    schedule(task: () => void, delay: number): ScheduledTask {
        const handle = setTimeout(task, delay);
        return { cancel: () => clearTimeout(handle) };
    }
};
