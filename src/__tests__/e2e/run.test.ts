import { mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterAll, beforeAll, describe, expect, it } from "vitest"

import { EconomicSummarySwarm, FileDelivery } from "../../index.js"
import type { ReliabilityPolicy, SwarmConfig } from "../../index.js"
import { createEchoProvider } from "../helpers/mockLLM.js"
import { echoWorker } from "../helpers/stubWorkers.js"

const policy: ReliabilityPolicy = {
    quorumFraction: 1,
    maxRetriesPerStage: 0,
    allowDegrade: false,
    timeoutPerWorkerMs: 5000,
}

describe("e2e run (LLMs mocked)", () => {
    let tempDir: string

    beforeAll(async () => {
        tempDir = await mkdtemp(join(tmpdir(), "econ-swarm-e2e-"))
    })

    afterAll(async () => {
        await rm(tempDir, { recursive: true, force: true })
    })

    function makeConfig(): SwarmConfig {
        const provider = createEchoProvider((_system, user) =>
            user.includes("## Team analyses")
                ? "Final report <DONE>"
                : "Domain view <DONE>"
        )
        return {
            policy,
            domains: ["macro", "equities"],
            providers: { openai: provider },
            renderer: "none",
            outDir: tempDir,
        }
    }

    it("runs every stage and delivers the report to disk", async () => {
        const swarm = new EconomicSummarySwarm(makeConfig())
        const decisions: string[] = []
        swarm.getEventBus().onType("stage:decision", (event) => {
            decisions.push(`${event.stage}:${event.decision}`)
        })
        const result = await swarm.run("Summarise this week")

        expect(decisions).toEqual([
            "parallel_analyze:advance",
            "sequential_refine:advance",
            "parallel_reanalyze:advance",
        ])
        expect(result.status).toBe("completed")
        if (result.status !== "completed") return
        expect(result.report).toBe("Final report")
        expect(result.ledger.map((e) => `${e.stage}:${e.workerName}`)).toEqual([
            "parallel_analyze:MacroAnalyst",
            "parallel_analyze:EquitiesAnalyst",
            "sequential_refine:MacroAnalyst",
            "sequential_refine:EquitiesAnalyst",
            "parallel_reanalyze:MacroAnalyst",
            "parallel_reanalyze:EquitiesAnalyst",
            "aggregate:Aggregator",
        ])
        expect(result.diagnostics).toEqual([])

        // 7 calls at 100 prompt / 50 completion tokens on gpt-4o
        expect(result.cost.usage).toEqual({
            promptTokens: 700,
            completionTokens: 350,
            totalTokens: 1050,
        })
        expect(result.cost.cost.totalCost).toBeCloseTo(0.00525)

        const report = await readFile(
            join(tempDir, "runs", `${result.runId}-report.md`),
            "utf-8"
        )
        expect(report).toBe(
            "# Economic Summary\n\n> Summarise this week\n\nFinal report\n"
        )
        const record = await new FileDelivery(tempDir).load(result.runId)
        expect(record?.status).toBe("completed")
        expect(record?.ledger).toHaveLength(7)
    })

    it("replaces a domain worker in place without changing the order", async () => {
        const swarm = new EconomicSummarySwarm(makeConfig())
        swarm.addDomainWorker("macro", echoWorker("MacroStub"))

        expect(swarm.getDomains()).toEqual(["macro", "equities"])

        const result = await swarm.run("Summarise this week")
        expect(result.status).toBe("completed")
        if (result.status !== "completed") return
        const analyze = result.ledger.filter(
            (e) => e.stage === "parallel_analyze"
        )
        expect(analyze.map((e) => e.content)).toEqual([
            "MacroStub says hi",
            "Domain view",
        ])
    })

    it("rejects a blank domain name", () => {
        const swarm = new EconomicSummarySwarm(makeConfig())
        expect(() => swarm.addDomainWorker("  ", echoWorker("X"))).toThrow(
            "Domain name must be non-empty"
        )
    })
})
