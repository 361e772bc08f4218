import type { AgentObserver, Logger, ObserverEvents, ObserverHook } from '../types'

/**
 * Fans agent lifecycle events out to observers.
 *
 * Observers are called one after another in registration order. A throw or
 * rejection is logged at `warn` and dropped; the next observer still runs and
 * the caller never sees it.
 */
export class ObserverBus {
    private readonly observers: AgentObserver[] = []

    constructor(
        observers: readonly AgentObserver[] = [],
        private readonly logger: Logger = console,
    ) {
        observers.forEach((o) => this.add(o))
    }

    add(observer: AgentObserver): this {
        this.observers.push(observer)
        return this
    }

    remove(observer: AgentObserver): this {
        const index = this.observers.indexOf(observer)
        if (index !== -1) this.observers.splice(index, 1)
        return this
    }

    get size(): number {
        return this.observers.length
    }

    async notify<K extends ObserverHook>(hook: K, event: ObserverEvents[K]): Promise<void> {
        for (const [index, observer] of [...this.observers].entries()) {
            const handler: AgentObserver[K] = observer[hook]
            if (!handler) continue

            try {
                await handler.call(observer, event)
            } catch (err) {
                this.logger.warn(`Observer ${index} failed in ${hook}`, {
                    error: err instanceof Error ? err.message : String(err),
                })
            }
        }
    }
}
