import type { ResolvedConfig } from '../config/schema.js'
import { HookDispatcher } from '../hooks/dispatcher.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { SessionRegistry } from '../session/registry.js'
import { StepTreeExporter } from '../tracing/exporter.js'
import { MetricsCollector } from '../tracing/metrics.js'
import { LogTransport } from '../transport/log-transport.js'
import type { RuntimeTransport } from '../transport/types.js'
import { errorMessage } from './errors.js'
import { TypedEventEmitter } from './events.js'

export interface RuntimeOptions {
    config: ResolvedConfig
    transport?: RuntimeTransport
    logger?: Logger
}

export interface Runtime {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    transport: RuntimeTransport
    dispatcher: HookDispatcher
    registry: SessionRegistry
    metricsCollector: MetricsCollector
    exporter: StepTreeExporter
    /** Validates and seals the hook table. Sessions can only be created afterwards. */
    start(): Promise<void>
    shutdown(): Promise<void>
}

export function createRuntime(options: RuntimeOptions): Runtime {
    const { config } = options
    const logger = options.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter((event, error) => {
        logger.warn({ event, error: errorMessage(error) }, 'event:listener-failed')
    })
    const transport = options.transport ?? new LogTransport(logger)
    const dispatcher = new HookDispatcher(logger, eventBus)
    const exporter = new StepTreeExporter(logger)
    const registry = new SessionRegistry({ config, logger, eventBus, dispatcher, transport, exporter })
    const metricsCollector = new MetricsCollector(eventBus)

    const runtime: Runtime = {
        config,
        logger,
        eventBus,
        transport,
        dispatcher,
        registry,
        metricsCollector,
        exporter,

        async start() {
            if (dispatcher.isSealed) return
            await dispatcher.validate()
            dispatcher.seal()
            logger.info({ steps: dispatcher.listSteps().length }, 'runtime:start')
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                await registry.shutdown()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                metricsCollector.dispose()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                eventBus.removeAll()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }

    return runtime
}
