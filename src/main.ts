#!/usr/bin/env node

import { readFile } from "node:fs/promises"
import { join, resolve } from "node:path"

import { Command, InvalidArgumentError } from "commander"

import {
    buildSwarmConfig,
    type CliOverrides,
    parseRcConfig,
    type RcConfig,
} from "./core/Config.js"
import { toErrorMessage } from "./core/errors.js"
import { formatCost } from "./core/Pricing.js"
import { EconomicSummarySwarm, type SwarmRunResult } from "./index.js"
import type { LLMProviderType, RendererType } from "./types.js"

const RC_FILE = ".swarmrc.json"

async function loadEnvFile(cwd: string): Promise<void> {
    let content: string
    try {
        content = await readFile(join(cwd, ".env"), "utf-8")
    } catch {
        return
    }
    for (const line of content.split("\n")) {
        const trimmed = line.replace(/^export\s+/, "").trim()
        if (!trimmed || trimmed.startsWith("#")) continue
        const eqIndex = trimmed.indexOf("=")
        if (eqIndex === -1) continue
        const key = trimmed.slice(0, eqIndex).trim()
        const value = trimmed
            .slice(eqIndex + 1)
            .trim()
            .replace(/^(["'])(.*)\1$/, "$2")
        process.env[key] ??= value
    }
}

async function loadRcConfig(cwd: string): Promise<RcConfig> {
    const rcPath = join(cwd, RC_FILE)
    let content: string
    try {
        content = await readFile(rcPath, "utf-8")
    } catch {
        return {}
    }
    return parseRcConfig(content, rcPath)
}

function parseNumber(value: string): number {
    const parsed = Number(value)
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError(`Not a number: ${value}`)
    }
    return parsed
}

function parseInteger(value: string): number {
    const parsed = parseNumber(value)
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`Not an integer: ${value}`)
    }
    return parsed
}

function parseChoice<T extends string>(choices: readonly T[]) {
    return (value: string): T => {
        const match = choices.find((c) => c === value)
        if (!match) {
            throw new InvalidArgumentError(
                `Expected one of ${choices.join(", ")}`
            )
        }
        return match
    }
}

function printSummary(result: SwarmRunResult, renderer: RendererType): void {
    if (renderer === "none") {
        console.log(JSON.stringify(result, null, 2))
        return
    }
    if (result.status === "completed") {
        console.log(`\n${result.report}\n`)
    } else {
        console.error(
            `\n${result.failure.kind} in ${result.failure.stage}: ${result.failure.message}`
        )
    }
    if (renderer === "log") {
        console.log(`Status: ${result.status}`)
        console.log(`Duration: ${(result.durationMs / 1000).toFixed(1)}s`)
        console.log(`Cost: ${formatCost(result.cost.cost.totalCost)}`)
    }
}

const program = new Command()

program
    .name("econ-swarm")
    .description("Multi-domain economic summaries from a swarm of analysts")
    .version("0.1.0")

program
    .command("run")
    .description("Produce an economic summary for a task")
    .argument("<task>", "What the summary should cover")
    .option(
        "--domains <list>",
        "Comma-separated domains, in refinement order (macro,equities,fixed_income,commodities,political)"
    )
    .option(
        "--provider <provider>",
        "LLM provider (openai or anthropic)",
        parseChoice<LLMProviderType>(["openai", "anthropic"])
    )
    .option("--model <model>", "Model for every worker")
    .option("--quorum <fraction>", "Quorum fraction in (0, 1]", parseNumber)
    .option("--max-retries <n>", "Retries per stage", parseInteger)
    .option("--degrade", "Continue with the succeeded subset when quorum fails")
    .option("--no-degrade", "Abort when quorum fails after retries")
    .option("--timeout <ms>", "Per-worker timeout in ms", parseInteger)
    .option("--stage-deadline <ms>", "Deadline per stage attempt in ms", parseInteger)
    .option("--max-concurrency <n>", "Workers in flight per parallel stage", parseInteger)
    .option(
        "--max-context-chars <n>",
        "Cap on the context handed to each worker",
        parseInteger
    )
    .option(
        "--renderer <type>",
        "Output renderer (terminal, log, none)",
        parseChoice<RendererType>(["terminal", "log", "none"])
    )
    .option("--out <dir>", "Run output directory (default .econ-swarm)")
    .option("--cwd <path>", "Directory holding .env and the rc file")
    .option("--verbose", "Show model details per worker")
    .action(async (task: string, options: CliOverrides & { cwd?: string }) => {
        const projectRoot = options.cwd ? resolve(options.cwd) : process.cwd()
        await loadEnvFile(projectRoot)
        const rc = await loadRcConfig(projectRoot)
        const config = buildSwarmConfig(options, rc, process.env, projectRoot)

        const swarm = new EconomicSummarySwarm(config)
        process.once("SIGINT", () => {
            swarm.abort()
        })

        const result = await swarm.run(task)
        printSummary(result, config.renderer ?? "terminal")
        process.exitCode = result.status === "completed" ? 0 : 1
    })

program.parseAsync().catch((error: unknown) => {
    console.error("Fatal error:", toErrorMessage(error))
    process.exit(1)
})
