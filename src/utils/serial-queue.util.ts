// utils/serial-queue.util.ts

/**
 * Runs queued tasks one at a time, in submission order.
 * A failing task does not block the ones queued behind it.
 */
export class SerialQueue {
    private tail: Promise<unknown> = Promise.resolve();

    run<T>(task: () => T | Promise<T>): Promise<T> {
        const result = this.tail.then(task);
        // keep the chain alive whatever the task's outcome
        this.tail = result.then(
            () => undefined,
            () => undefined,
        );
        return result;
    }
}
