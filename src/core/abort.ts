/**
 * Settles with `promise`, unless `signal` aborts first, in which case it rejects with
 * `reason()`. The losing promise keeps running; its eventual rejection is observed here.
 */
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal, reason: () => Error): Promise<T> {
    if (signal.aborted) {
        void promise.catch(() => undefined)
        return Promise.reject(reason())
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(reason())
        signal.addEventListener('abort', onAbort, { once: true })
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort)
                resolve(value)
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort)
                reject(error)
            }
        )
    })
}

/**
 * Resolves after `ms`. With a signal the timer is cleared on abort, and with a
 * `reason` the promise rejects with it. The abort listener is removed once the
 * timer fires.
 */
export function delay(ms: number, signal?: AbortSignal, reason?: () => Error): Promise<void> {
    if (signal?.aborted) {
        return reason ? Promise.reject(reason()) : Promise.resolve()
    }

    const timer = new Promise<void>((resolve) => {
        const onAbort = () => {
            clearTimeout(handle)
            resolve()
        }
        const handle = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort)
            resolve()
        }, ms)
        signal?.addEventListener('abort', onAbort, { once: true })
    })
    if (!signal || !reason) return timer
    return raceSignal(timer, signal, reason)
}
