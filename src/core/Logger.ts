import createDebug from "debug"

const APP_PREFIX = "swarm"

/**
 * Create a namespaced logger instance.
 * All loggers are prefixed with the APP_PREFIX for easy filtering.
 *
 * @param namespace - The subsystem name (e.g., "stage", "ledger")
 * @returns A debug logger function
 */
export function createLogger(namespace: string): createDebug.Debugger {
    return createDebug(`${APP_PREFIX}:${namespace}`)
}

/**
 * Pre-defined loggers for the pipeline subsystems.
 *
 * Usage:
 * ```typescript
 * import { log } from "./core/Logger.js"
 * log.stage("Running %d workers in %s", workers.length, stage)
 * log.ledger("Appended #%d from %s", sequence, workerName)
 * ```
 *
 * Enable via env: `DEBUG=swarm:*`
 * Enable specific: `DEBUG=swarm:pipeline,swarm:reliability`
 */
export const log = {
    app: createLogger("app"),
    ledger: createLogger("ledger"),
    stage: createLogger("stage"),
    pipeline: createLogger("pipeline"),
    reliability: createLogger("reliability"),
    worker: createLogger("worker"),
    llm: createLogger("llm"),
    delivery: createLogger("delivery"),
    persistence: createLogger("persistence"),
}
