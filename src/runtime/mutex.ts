/**
 * panebridge: 异步互斥锁
 *
 * 基于 Promise 链的 FIFO 串行化：前一个临界区结束（无论成功失败）后才进入下一个。
 */

export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
        let release!: () => void;
        const done = new Promise<void>((resolve) => { release = resolve; });

        const prev = this.tail;
        this.tail = prev.then(() => done);

        await prev;
        try {
            return await fn();
        } finally {
            release();
        }
    }
}
