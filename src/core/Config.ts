import { resolve } from "node:path"

import { z } from "zod"

import type {
    DomainRole,
    LLMProviderType,
    ModelConfig,
    ReliabilityPolicy,
    RendererType,
    SwarmConfig,
    WorkerRole,
} from "../types.js"
import { ConfigurationError } from "./errors.js"

export const DOMAIN_ROLES = [
    "macro",
    "equities",
    "fixed_income",
    "commodities",
    "political",
] as const satisfies readonly DomainRole[]

const DEFAULT_MODELS: Record<"domain" | "aggregator", ModelConfig> = {
    domain: {
        provider: "openai",
        model: "gpt-4o",
        temperature: 0.3,
        maxTokens: 4096,
    },
    aggregator: {
        provider: "openai",
        model: "gpt-4o",
        temperature: 0.2,
        maxTokens: 8192,
    },
}

const DEFAULT_MODEL_BY_PROVIDER: Record<LLMProviderType, string> = {
    openai: "gpt-4o",
    anthropic: "claude-sonnet-4-20250514",
}

export function getDefaultModel(
    role: WorkerRole,
    overrideProvider?: LLMProviderType,
    overrideModel?: string
): ModelConfig {
    const base = DEFAULT_MODELS[role === "aggregator" ? "aggregator" : "domain"]
    const provider = overrideProvider ?? base.provider
    const model =
        overrideModel ??
        (provider === base.provider
            ? base.model
            : DEFAULT_MODEL_BY_PROVIDER[provider])
    return { ...base, provider, model }
}

export const reliabilityPolicySchema = z
    .object({
        quorumFraction: z.number().gt(0).lte(1),
        maxRetriesPerStage: z.number().int().gte(0),
        allowDegrade: z.boolean(),
        timeoutPerWorkerMs: z.number().int().positive(),
        stageDeadlineMs: z.number().int().positive().optional(),
    })
    .strict()

const contextLimitsSchema = z
    .object({
        maxEntries: z.number().int().gte(0).optional(),
        maxChars: z.number().int().positive().optional(),
    })
    .strict()

export const rcConfigSchema = z
    .object({
        policy: reliabilityPolicySchema.partial().optional(),
        openaiApiKey: z.string().optional(),
        anthropicApiKey: z.string().optional(),
        domains: z.array(z.enum(DOMAIN_ROLES)).nonempty().optional(),
        defaultProvider: z.enum(["openai", "anthropic"]).optional(),
        defaultModel: z.string().min(1).optional(),
        renderer: z.enum(["terminal", "log", "none"]).optional(),
        verbose: z.boolean().optional(),
        maxConcurrency: z.number().int().positive().optional(),
        contextLimits: contextLimitsSchema.optional(),
        outDir: z.string().min(1).optional(),
    })
    .strict()

export type RcConfig = z.infer<typeof rcConfigSchema>

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) =>
            issue.path.length > 0
                ? `${issue.path.join(".")}: ${issue.message}`
                : issue.message
        )
        .join("; ")
}

/**
 * Every policy field is required configuration; nothing here fills in a
 * default quorum or retry budget.
 */
export function validatePolicy(input: unknown): ReliabilityPolicy {
    const parsed = reliabilityPolicySchema.safeParse(input)
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid reliability policy: ${formatIssues(parsed.error)}`
        )
    }
    return parsed.data
}

export function validateRunOptions(options: {
    maxConcurrency?: number
    contextLimits?: unknown
}): void {
    const { maxConcurrency, contextLimits } = options
    if (
        maxConcurrency !== undefined &&
        (!Number.isInteger(maxConcurrency) || maxConcurrency < 1)
    ) {
        throw new ConfigurationError(
            `maxConcurrency must be a positive integer, got ${maxConcurrency}`
        )
    }
    if (contextLimits !== undefined) {
        const parsed = contextLimitsSchema.safeParse(contextLimits)
        if (!parsed.success) {
            throw new ConfigurationError(
                `Invalid context limits: ${formatIssues(parsed.error)}`
            )
        }
    }
}

export function parseRcConfig(content: string, source: string): RcConfig {
    let raw: unknown
    try {
        raw = JSON.parse(content)
    } catch (parseError) {
        throw new ConfigurationError(
            `Invalid JSON in ${source}: ${parseError instanceof Error ? parseError.message : String(parseError)}`
        )
    }
    const parsed = rcConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigurationError(
            `Invalid config in ${source}: ${formatIssues(parsed.error)}`
        )
    }
    return parsed.data
}

/**
 * Layer CLI overrides on top of the rc file and validate the merged result.
 */
export function resolvePolicy(
    fromFile: Partial<ReliabilityPolicy> | undefined,
    overrides: Partial<ReliabilityPolicy>
): ReliabilityPolicy {
    const merged: Record<string, unknown> = { ...fromFile }
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) merged[key] = value
    }
    return validatePolicy(merged)
}

/**
 * Keeps the caller's order (it becomes the sequential-refine order) and drops
 * repeats.
 */
export function resolveDomains(requested: readonly string[]): DomainRole[] {
    const resolved: DomainRole[] = []
    const unknown: string[] = []
    for (const name of requested) {
        const role = DOMAIN_ROLES.find((r) => r === name.trim())
        if (!role) {
            unknown.push(name)
        } else if (!resolved.includes(role)) {
            resolved.push(role)
        }
    }
    if (unknown.length > 0) {
        throw new ConfigurationError(
            `Unknown domain(s): ${unknown.join(", ")}. Expected one of ${DOMAIN_ROLES.join(", ")}`
        )
    }
    if (resolved.length === 0) {
        throw new ConfigurationError("At least one domain is required")
    }
    return resolved
}

export const DEFAULT_OUT_DIR = ".econ-swarm"

/** Flag values from the command line; each one wins over the rc file. */
export interface CliOverrides {
    domains?: string
    provider?: LLMProviderType
    model?: string
    quorum?: number
    maxRetries?: number
    degrade?: boolean
    timeout?: number
    stageDeadline?: number
    maxConcurrency?: number
    maxContextChars?: number
    renderer?: RendererType
    out?: string
    verbose?: boolean
}

export function buildSwarmConfig(
    overrides: CliOverrides,
    rc: RcConfig,
    env: NodeJS.ProcessEnv,
    projectRoot: string
): SwarmConfig {
    const policy = resolvePolicy(rc.policy, {
        quorumFraction: overrides.quorum,
        maxRetriesPerStage: overrides.maxRetries,
        allowDegrade: overrides.degrade,
        timeoutPerWorkerMs: overrides.timeout,
        stageDeadlineMs: overrides.stageDeadline,
    })
    const domains = overrides.domains
        ? resolveDomains(overrides.domains.split(","))
        : rc.domains
    const contextLimits =
        overrides.maxContextChars !== undefined
            ? { ...rc.contextLimits, maxChars: overrides.maxContextChars }
            : rc.contextLimits

    const config: SwarmConfig = {
        policy,
        openaiApiKey: env.OPENAI_API_KEY || rc.openaiApiKey,
        anthropicApiKey: env.ANTHROPIC_API_KEY || rc.anthropicApiKey,
        domains,
        defaultProvider: overrides.provider ?? rc.defaultProvider,
        defaultModel: overrides.model ?? rc.defaultModel,
        renderer: overrides.renderer ?? rc.renderer ?? "terminal",
        verbose: overrides.verbose ?? rc.verbose ?? env.VERBOSE === "true",
        maxConcurrency: overrides.maxConcurrency ?? rc.maxConcurrency,
        contextLimits,
        outDir: resolve(
            projectRoot,
            overrides.out ?? rc.outDir ?? DEFAULT_OUT_DIR
        ),
    }

    if (!config.openaiApiKey && !config.anthropicApiKey) {
        throw new ConfigurationError(
            "No API keys found. Set OPENAI_API_KEY or ANTHROPIC_API_KEY, add them to .env, or configure .swarmrc.json"
        )
    }
    return config
}
