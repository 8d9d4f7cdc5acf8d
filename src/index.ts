export { createRuntime, type Runtime, type RuntimeOptions } from './core/container.js'
export * from './core/errors.js'
export { TypedEventEmitter, type EventMap } from './core/events.js'
export { NodeFileSystem, type FileSystem } from './core/fs.js'
export { toJsonValue, type JsonObject, type JsonValue } from './core/types.js'

export { loadConfig, resolveConfig } from './config/loader.js'
export type { Config, ResolvedConfig, StepDisplay } from './config/schema.js'
export { createLogger, type Logger } from './logger/index.js'

export { ActionRegistry, createAction } from './actions/registry.js'
export type { Action, ActionInput } from './actions/types.js'
export { ChatContext } from './chat/context.js'
export type { Message, MessageAuthor, ProviderMessage } from './chat/types.js'

export { HookDispatcher } from './hooks/dispatcher.js'
export type {
    ActionCallback,
    ChatProfile,
    HookContext,
    HookKind,
    HookOutcome,
    LifecycleHooks,
    ProviderHooks,
    Starter,
} from './hooks/types.js'

export { CancellationController, type StopResult } from './session/cancellation.js'
export { SessionRegistry, type CreateSessionOptions, type ResumeSessionOptions } from './session/registry.js'
export { Session, type SendInput } from './session/session.js'
export { Task, TaskList, type TaskInput, type TaskListSnapshot, type TaskStatus } from './session/task-list.js'
export type { SessionState, User } from './session/types.js'

export { StepTreeExporter } from './tracing/exporter.js'
export { MetricsCollector } from './tracing/metrics.js'
export { StepHandle, checkpoint, currentSession, currentStep, sleep, step } from './tracing/step.js'
export { StepTracker } from './tracing/tracker.js'
export type { Step, StepOptions, StepSnapshot, StepStatus, StepTree, StepType } from './tracing/types.js'

export { LogTransport } from './transport/log-transport.js'
export type { RuntimeTransport } from './transport/types.js'
