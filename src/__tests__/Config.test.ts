import { resolve } from "node:path"

import { describe, expect, it } from "vitest"

import {
    buildSwarmConfig,
    getDefaultModel,
    parseRcConfig,
    resolveDomains,
    resolvePolicy,
    validatePolicy,
} from "../core/Config.js"
import { ConfigurationError } from "../core/errors.js"

const policy = {
    quorumFraction: 0.6,
    maxRetriesPerStage: 1,
    allowDegrade: true,
    timeoutPerWorkerMs: 30_000,
}

describe("Config", () => {
    describe("validatePolicy", () => {
        it("should accept a complete policy", () => {
            expect(validatePolicy(policy)).toEqual(policy)
        })

        it("should require every field", () => {
            expect(() =>
                validatePolicy({ quorumFraction: 0.6, allowDegrade: true, timeoutPerWorkerMs: 10 })
            ).toThrow(/maxRetriesPerStage/)
        })

        it("should reject unknown fields", () => {
            expect(() => validatePolicy({ ...policy, quorum: 1 })).toThrow(ConfigurationError)
        })

        it("should reject a non-positive stage deadline", () => {
            expect(() => validatePolicy({ ...policy, stageDeadlineMs: 0 })).toThrow(
                /stageDeadlineMs/
            )
        })
    })

    describe("resolvePolicy", () => {
        it("should let overrides win and ignore undefined ones", () => {
            const resolved = resolvePolicy(policy, {
                quorumFraction: 1,
                maxRetriesPerStage: undefined,
            })
            expect(resolved).toEqual({ ...policy, quorumFraction: 1 })
        })

        it("should fail when neither source supplies a field", () => {
            expect(() => resolvePolicy(undefined, { quorumFraction: 1 })).toThrow(
                ConfigurationError
            )
        })
    })

    describe("parseRcConfig", () => {
        it("should parse a valid rc file", () => {
            const rc = parseRcConfig(
                JSON.stringify({ policy: { quorumFraction: 0.5 }, domains: ["macro"] }),
                ".swarmrc.json"
            )
            expect(rc).toEqual({ policy: { quorumFraction: 0.5 }, domains: ["macro"] })
        })

        it("should report invalid JSON with the file name", () => {
            expect(() => parseRcConfig("{", "/tmp/.swarmrc.json")).toThrow(
                /^Invalid JSON in \/tmp\/\.swarmrc\.json/
            )
        })

        it("should reject an unknown domain", () => {
            expect(() =>
                parseRcConfig(JSON.stringify({ domains: ["crypto"] }), "rc")
            ).toThrow(/Invalid config in rc: domains\.0/)
        })
    })

    describe("resolveDomains", () => {
        it("should keep order and drop repeats", () => {
            expect(resolveDomains(["political", " macro", "political"])).toEqual([
                "political",
                "macro",
            ])
        })

        it("should list unknown names", () => {
            expect(() => resolveDomains(["macro", "crypto"])).toThrow(
                "Unknown domain(s): crypto. Expected one of macro, equities, fixed_income, commodities, political"
            )
        })

        it("should refuse an empty list", () => {
            expect(() => resolveDomains([])).toThrow("At least one domain is required")
        })
    })

    describe("getDefaultModel", () => {
        it("should use gpt-4o for every role by default", () => {
            expect(getDefaultModel("macro")).toEqual({
                provider: "openai",
                model: "gpt-4o",
                temperature: 0.3,
                maxTokens: 4096,
            })
            expect(getDefaultModel("aggregator").maxTokens).toBe(8192)
        })

        it("should switch to the provider's default model", () => {
            expect(getDefaultModel("equities", "anthropic").model).toBe(
                "claude-sonnet-4-20250514"
            )
        })

        it("should honor an explicit model", () => {
            expect(getDefaultModel("equities", "openai", "gpt-4o-mini").model).toBe(
                "gpt-4o-mini"
            )
        })
    })

    describe("buildSwarmConfig", () => {
        const rc = { policy, renderer: "log" as const, outDir: "runs-out" }

        it("should layer flags over the rc file and env over rc keys", () => {
            const config = buildSwarmConfig(
                { quorum: 1, domains: "equities,macro" },
                { ...rc, openaiApiKey: "rc-key" },
                { OPENAI_API_KEY: "test-secret" },
                "/project"
            )

            expect(config.policy.quorumFraction).toBe(1)
            expect(config.policy.maxRetriesPerStage).toBe(1)
            expect(config.domains).toEqual(["equities", "macro"])
            expect(config.openaiApiKey).toBe("test-secret")
            expect(config.renderer).toBe("log")
            expect(config.outDir).toBe(resolve("/project", "runs-out"))
        })

        it("should merge the context cap into rc limits", () => {
            const config = buildSwarmConfig(
                { maxContextChars: 500 },
                { ...rc, contextLimits: { maxEntries: 10 } },
                { OPENAI_API_KEY: "test-secret" },
                "/project"
            )
            expect(config.contextLimits).toEqual({ maxEntries: 10, maxChars: 500 })
        })

        it("should read VERBOSE from the environment", () => {
            const config = buildSwarmConfig(
                {},
                rc,
                { OPENAI_API_KEY: "test-secret", VERBOSE: "true" },
                "/project"
            )
            expect(config.verbose).toBe(true)
        })

        it("should insist on at least one API key", () => {
            expect(() => buildSwarmConfig({}, rc, {}, "/project")).toThrow(
                /No API keys found/
            )
        })
    })
})
